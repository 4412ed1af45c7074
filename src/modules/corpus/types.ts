export const SOURCE_KINDS = ["pricing", "rule", "guidance"] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export type MetadataValue = string | number | boolean | null | readonly string[];

export type DocumentMetadata = Readonly<Record<string, MetadataValue>>;

export type Document = Readonly<{
  id: string;
  content: string;
  sourceKind: SourceKind;
  metadata: DocumentMetadata;
  contentHash: string;
  embedding?: readonly number[];
}>;

export type RawRecord = {
  sourceKind: SourceKind;
  fields: Record<string, unknown>;
};

export type MalformedRecordReason =
  | "missing_fields"
  | "invalid_fields"
  | "empty_content"
  | "duplicate_id";

export type ChunkReport = {
  documents: Document[];
  errors: MalformedRecordReport[];
};

export type MalformedRecordReport = {
  recordIndex: number;
  sourceKind: SourceKind;
  reason: MalformedRecordReason;
  message: string;
};
