import type { RawRecord } from "./types.js";

export type GuideExport = {
  support_items?: Array<Record<string, unknown>>;
  claiming_rules?: Record<string, Record<string, unknown>>;
  guidance_markdown?: string;
};

const SECTION_SPLIT_PATTERN = /\n##\s+/;

/** Splits guidance markdown on level-two headings; the first line of each section is its heading. */
export const splitGuidanceMarkdown = (markdown: string): RawRecord[] => {
  const records: RawRecord[] = [];
  markdown.split(SECTION_SPLIT_PATTERN).forEach((section, sectionIndex) => {
    if (!section.trim()) {
      return;
    }
    const [firstLine = "", ...rest] = section.split("\n");
    records.push({
      sourceKind: "guidance",
      fields: {
        heading: firstLine.replace(/^#+\s*/, "").trim(),
        body: rest.join("\n").trim(),
        section_index: sectionIndex
      }
    });
  });
  return records;
};

/**
 * Maps the ingestor's export (support item list, claiming rule map, guidance
 * markdown) to raw records in a stable order: pricing, rules, guidance.
 */
export const recordsFromGuideExport = (guideExport: GuideExport): RawRecord[] => {
  const pricing: RawRecord[] = (guideExport.support_items ?? []).map((item) => ({
    sourceKind: "pricing",
    fields: item
  }));
  const rules: RawRecord[] = Object.entries(guideExport.claiming_rules ?? {}).map(([ruleName, rule]) => ({
    sourceKind: "rule",
    fields: { rule_name: ruleName, ...rule }
  }));
  const guidance = splitGuidanceMarkdown(guideExport.guidance_markdown ?? "");
  return [...pricing, ...rules, ...guidance];
};
