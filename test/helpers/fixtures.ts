import type { RawRecord } from "../../src/modules/corpus/types.js";
import type { EmbeddingGenerationProvider } from "../../src/modules/provider/types.js";

export const ALL_REGIONS = ["NSW", "VIC", "QLD", "SA", "WA", "TAS", "NT", "ACT"] as const;

export const pricingRecord = (fields: Record<string, unknown>): RawRecord => ({ sourceKind: "pricing", fields });
export const ruleRecord = (fields: Record<string, unknown>): RawRecord => ({ sourceKind: "rule", fields });
export const guidanceRecord = (fields: Record<string, unknown>): RawRecord => ({ sourceKind: "guidance", fields });

export const occupationalTherapy = (): RawRecord =>
  pricingRecord({
    support_item_number: "15_056_0128_1_3",
    support_item_name: "Occupational Therapy - Standard",
    support_category: "Improved Daily Living",
    registration_group: "Therapeutic Supports",
    unit: "hour",
    quote_required: false,
    price_limits: { NSW: 193.99, VIC: 193.99 }
  });

export const selfCare = (): RawRecord =>
  pricingRecord({
    support_item_number: "01_011_0107_1_1",
    support_item_name: "Assistance With Self-Care Activities",
    support_category: "Assistance with Daily Life",
    unit: "hour",
    price_limits: Object.fromEntries(ALL_REGIONS.map((region) => [region, 70.23]))
  });

export const providerTravelRule = (): RawRecord =>
  ruleRecord({
    rule_name: "provider_travel",
    section_title: "Provider Travel",
    description: "Providers can claim for time spent travelling to a participant.",
    conditions: ["Travel time is capped at 30 minutes in city areas"],
    applies_to: "therapy_supports",
    framework_specific: {
      old_framework: { applicable: true },
      new_framework: { applicable: false }
    }
  });

export const priceLimitsGuidance = (): RawRecord =>
  guidanceRecord({
    heading: "Price Limits",
    body: "Price limits are the maximum a registered provider can charge.",
    section_index: 0
  });

export const sampleRecords = (): RawRecord[] => [
  occupationalTherapy(),
  selfCare(),
  providerTravelRule(),
  priceLimitsGuidance()
];

/** Provider stand-in whose embedding is looked up by exact text. */
export const tableProvider = (
  vectors: Record<string, number[]>,
  overrides: Partial<EmbeddingGenerationProvider> = {}
): EmbeddingGenerationProvider => ({
  name: "table",
  async embed(text) {
    const vector = vectors[text];
    if (!vector) {
      throw new Error(`no vector for ${text}`);
    }
    return vector;
  },
  async generate() {
    return "According to Document 1, the answer is in the context.";
  },
  ...overrides
});
