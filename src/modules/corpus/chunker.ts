import { createHash } from "node:crypto";
import { z } from "zod";
import { MalformedRecord } from "../errors.js";
import type {
  ChunkReport,
  Document,
  MalformedRecordReport,
  MetadataValue,
  RawRecord
} from "./types.js";

export const EXPECTED_REGIONS = ["NSW", "VIC", "QLD", "SA", "WA", "TAS", "NT", "ACT"] as const;

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

const priceSchema = z.union([
  z.number(),
  z.object({ price: z.number(), currency: z.string().optional() }).transform((value) => value.price)
]);

const pricingFieldsSchema = z.object({
  support_item_number: optionalText,
  support_item_name: optionalText,
  support_category: optionalText,
  registration_group: optionalText,
  unit: optionalText,
  quote_required: z.boolean().optional().default(false),
  price_limits: z.record(z.string(), priceSchema).optional().default({})
});

const frameworkSchema = z.object({
  applicable: z.boolean().optional(),
  assessment_required: z.boolean().optional()
});

const ruleFieldsSchema = z.object({
  rule_name: optionalText,
  section_title: optionalText,
  description: optionalText,
  conditions: z.array(z.string()).optional().default([]),
  applies_to: optionalText,
  framework_specific: z
    .object({
      old_framework: frameworkSchema.optional(),
      new_framework: frameworkSchema.optional()
    })
    .optional()
});

const guidanceFieldsSchema = z.object({
  heading: optionalText,
  title: optionalText,
  body: optionalText,
  section_index: z.number().int().nonnegative().optional()
});

type DraftDocument = {
  id: string;
  content: string;
  metadata: Record<string, MetadataValue>;
};

const toSlug = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");

const toTitleCase = (value: string): string =>
  value
    .replace(/_/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");

const formatPrice = (price: number): string => `$${price.toFixed(2)}`;

const orderRegions = (regions: string[]): string[] => {
  const expected: readonly string[] = EXPECTED_REGIONS;
  const known = expected.filter((region) => regions.includes(region));
  const other = regions.filter((region) => !expected.includes(region)).sort();
  return [...known, ...other];
};

export const hashContent = (content: string): string => createHash("sha256").update(content).digest("hex");

const parseFields = <T extends z.ZodTypeAny>(
  schema: T,
  record: RawRecord,
  recordIndex: number
): z.output<T> => {
  const parsed = schema.safeParse(record.fields ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "fields"}: ${issue.message}`)
      .join("; ");
    throw new MalformedRecord(recordIndex, record.sourceKind, "invalid_fields", `Invalid ${record.sourceKind} record: ${detail}`);
  }
  return parsed.data;
};

const chunkPricing = (record: RawRecord, recordIndex: number): DraftDocument => {
  const fields = parseFields(pricingFieldsSchema, record, recordIndex);
  const prices = new Map<string, number>();
  for (const [region, price] of Object.entries(fields.price_limits)) {
    prices.set(region.trim().toUpperCase(), price);
  }

  if (!fields.support_item_name || (!fields.support_item_number && prices.size === 0)) {
    throw new MalformedRecord(
      recordIndex,
      "pricing",
      "missing_fields",
      "Pricing record needs support_item_name and either support_item_number or price_limits."
    );
  }

  const unit = fields.unit || "unit";
  const regions = orderRegions([...prices.keys()]);
  const lines = [
    `Support Item: ${fields.support_item_name}`,
    `Support Number: ${fields.support_item_number || "N/A"}`,
    `Category: ${fields.support_category || "Not specified"}`,
    `Registration Group: ${fields.registration_group || "Not specified"}`,
    `Unit of Measure: ${fields.unit || "Not specified"}`
  ];
  if (regions.length > 0) {
    lines.push("", "Pricing by Region:");
    for (const region of regions) {
      lines.push(`- ${region}: ${formatPrice(prices.get(region) ?? 0)} per ${unit}`);
    }
  }
  lines.push(
    "",
    fields.quote_required ? "Note: Quote required before claiming this support." : "Note: Price is set, no quote required."
  );

  const metadata: Record<string, MetadataValue> = {
    itemNumber: fields.support_item_number || null,
    title: fields.support_item_name,
    category: fields.support_category || null,
    registrationGroup: fields.registration_group || null,
    unit: fields.unit || null,
    quoteRequired: fields.quote_required,
    regions
  };
  for (const region of regions) {
    metadata[`price.${region}`] = prices.get(region) ?? null;
  }

  return {
    id: `pricing_${fields.support_item_number || toSlug(fields.support_item_name)}`,
    content: lines.join("\n"),
    metadata
  };
};

const chunkRule = (record: RawRecord, recordIndex: number): DraftDocument => {
  const fields = parseFields(ruleFieldsSchema, record, recordIndex);
  const conditions = fields.conditions.map((condition) => condition.trim()).filter(Boolean);
  const ruleName = fields.rule_name || toSlug(fields.section_title);

  if (!ruleName || (conditions.length === 0 && !fields.description)) {
    throw new MalformedRecord(
      recordIndex,
      "rule",
      "missing_fields",
      "Rule record needs rule_name and at least one condition or a description."
    );
  }

  const title = fields.section_title || toTitleCase(ruleName);
  const lines = [`Claiming Rule: ${title}`];
  if (fields.description) {
    lines.push(fields.description);
  }
  if (conditions.length > 0) {
    lines.push("Conditions:", ...conditions.map((condition) => `- ${condition}`));
  }
  if (fields.applies_to) {
    lines.push(`Applies to: ${fields.applies_to.replace(/_/g, " ")}`);
  }

  const frameworks: string[] = [];
  const frameworkSpecific = fields.framework_specific;
  if (frameworkSpecific) {
    for (const [framework, details] of [
      ["old", frameworkSpecific.old_framework],
      ["new", frameworkSpecific.new_framework]
    ] as const) {
      if (!details) {
        continue;
      }
      const applicable = details.applicable !== false;
      if (applicable) {
        frameworks.push(framework);
      }
      const assessment = details.assessment_required === true ? " (assessment required)" : "";
      lines.push(`${toTitleCase(framework)} framework: ${applicable ? "applicable" : "not applicable"}${assessment}`);
    }
  }

  const metadata: Record<string, MetadataValue> = {
    ruleName,
    title,
    appliesTo: fields.applies_to || null
  };
  if (frameworkSpecific) {
    metadata.frameworks = frameworks;
  }

  return {
    id: `rule_${ruleName}`,
    content: lines.join("\n"),
    metadata
  };
};

const chunkGuidance = (record: RawRecord, recordIndex: number): DraftDocument => {
  const fields = parseFields(guidanceFieldsSchema, record, recordIndex);
  const heading = fields.heading || fields.title;
  if (!heading && !fields.body) {
    throw new MalformedRecord(recordIndex, "guidance", "missing_fields", "Guidance record needs a heading or a body.");
  }

  const sectionIndex = fields.section_index ?? recordIndex;
  const title = heading || `Section ${sectionIndex}`;
  const content = [title, fields.body].filter(Boolean).join("\n");

  return {
    id: `guidance_${toSlug(title) || sectionIndex}`,
    content,
    metadata: {
      title,
      sectionIndex
    }
  };
};

type RecordChunker = (record: RawRecord, recordIndex: number) => DraftDocument;

const CHUNKERS: Partial<Record<string, RecordChunker>> = {
  pricing: chunkPricing,
  rule: chunkRule,
  guidance: chunkGuidance
};

export const createDocument = (
  draft: DraftDocument & { sourceKind: RawRecord["sourceKind"] }
): Document =>
  Object.freeze({
    id: draft.id,
    content: draft.content,
    sourceKind: draft.sourceKind,
    metadata: Object.freeze({ ...draft.metadata }),
    contentHash: hashContent(draft.content)
  });

export const withEmbedding = (document: Document, embedding: readonly number[]): Document => {
  if (document.embedding) {
    throw new Error(`Document ${document.id} already carries an embedding.`);
  }
  return Object.freeze({
    ...document,
    embedding: Object.freeze([...embedding])
  });
};

const toReport = (error: MalformedRecord): MalformedRecordReport => ({
  recordIndex: error.recordIndex,
  sourceKind: error.sourceKind,
  reason: error.reason,
  message: error.message
});

/**
 * Converts ingested records into Documents, one per record. Records that
 * cannot form a Document are reported and skipped; the rest of the batch
 * is still chunked.
 */
/** `<id>_<sectionIndex>`, then `_2`, `_3`, ... on top of that until unused. */
const freeGuidanceId = (id: string, sectionIndex: MetadataValue, seenIds: ReadonlySet<string>): string => {
  const base = `${id}_${String(sectionIndex)}`;
  let candidate = base;
  for (let attempt = 2; seenIds.has(candidate); attempt += 1) {
    candidate = `${base}_${attempt}`;
  }
  return candidate;
};

export const chunk = (rawRecords: readonly RawRecord[]): ChunkReport => {
  const documents: Document[] = [];
  const errors: MalformedRecordReport[] = [];
  const seenIds = new Set<string>();

  rawRecords.forEach((record, recordIndex) => {
    try {
      const chunker = CHUNKERS[record.sourceKind];
      if (!chunker) {
        throw new MalformedRecord(
          recordIndex,
          record.sourceKind,
          "invalid_fields",
          `Unknown source kind "${String(record.sourceKind)}".`
        );
      }

      let draft = chunker(record, recordIndex);
      if (record.sourceKind === "guidance" && seenIds.has(draft.id)) {
        draft = { ...draft, id: freeGuidanceId(draft.id, draft.metadata.sectionIndex ?? recordIndex, seenIds) };
      }
      if (draft.content.trim().length === 0) {
        throw new MalformedRecord(recordIndex, record.sourceKind, "empty_content", "Record rendered to empty content.");
      }
      if (seenIds.has(draft.id)) {
        throw new MalformedRecord(
          recordIndex,
          record.sourceKind,
          "duplicate_id",
          `Document id "${draft.id}" is already used by an earlier record.`
        );
      }

      seenIds.add(draft.id);
      documents.push(createDocument({ ...draft, sourceKind: record.sourceKind }));
    } catch (error) {
      if (error instanceof MalformedRecord) {
        errors.push(toReport(error));
        return;
      }
      throw error;
    }
  });

  return { documents, errors };
};
