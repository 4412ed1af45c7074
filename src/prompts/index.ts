import type { SourceKind } from "../modules/corpus/types.js";

export const ANSWER_SYSTEM_GUARDRAILS = [
  "You are a price-guide assistant answering questions about support item pricing, claiming rules, and guidance.",
  "Answer only from the supplied context documents.",
  "If the answer is not in the context, say so clearly.",
  "Cite the documents you used by their labels exactly as given, for example 'According to Document 1'.",
  "Include support item numbers when discussing pricing and explain claiming rules step by step.",
  "Use plain language and never invent prices, rules, or item numbers."
].join(" ");

export const NO_MATCH_ANSWER =
  "I couldn't find relevant information in the price guide documents to answer your question.";

export type ContextBlockEntry = {
  citationLabel: string;
  documentId: string;
  sourceKind: SourceKind;
  content: string;
};

const SECTION_RULE = "=".repeat(80);
const ENTRY_RULE = "-".repeat(80);

export const renderContextBlock = (entries: readonly ContextBlockEntry[]): string => {
  if (entries.length === 0) {
    return ["CONTEXT FROM PRICE GUIDE DOCUMENTS:", "(none)"].join("\n");
  }

  const lines = ["CONTEXT FROM PRICE GUIDE DOCUMENTS:", SECTION_RULE];
  for (const entry of entries) {
    lines.push(`[${entry.citationLabel} - ${entry.sourceKind.toUpperCase()}] (${entry.documentId})`);
    lines.push(entry.content);
    lines.push(ENTRY_RULE);
  }
  lines.push(SECTION_RULE);
  return lines.join("\n");
};

export const buildGenerationMessages = (
  promptContext: string,
  question: string
): Array<{ role: "system" | "user"; content: string }> => [
  { role: "system", content: ANSWER_SYSTEM_GUARDRAILS },
  {
    role: "user",
    content: [
      promptContext,
      "",
      `USER QUESTION: ${question}`,
      "",
      "Provide a clear, accurate answer based only on the context above and cite your sources."
    ].join("\n")
  }
];
