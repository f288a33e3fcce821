/**
 * Document model shared by ingestion, storage and retrieval.
 */

export const PAGE_TYPES = [
  "faq",
  "checklist",
  "admissions",
  "apply",
  "accepting",
  "reddit",
  "general",
] as const;

export type PageType = (typeof PAGE_TYPES)[number];

export function isPageType(value: unknown): value is PageType {
  return PAGE_TYPES.some((pageType) => pageType === value);
}

/**
 * Structured fields extracted upstream from a page. Every documented key has
 * a named field; anything else lands in `extra` and is passed through as-is.
 */
export interface ChunkMetadata {
  minimumGpa?: number;
  toeflMin?: number;
  toeflRequired?: boolean;
  ieltsMin?: number;
  ieltsRequired?: boolean;
  greStatus?: string;
  fallDeadline?: string;
  springDeadline?: string;
  recommendationLetters?: number;
  interviewRequired?: string;
  extra: Record<string, unknown>;
}

export interface Page {
  /** Defaults to the url when the source has no id of its own */
  id: string;
  url: string;
  pageType: PageType;
  ownerId: string;
  rawText: string;
  metadata?: ChunkMetadata;
}

export interface ChunkRecord {
  id: number;
  pageId: string;
  ownerId: string;
  chunkIndex: number;
  text: string;
  pageType: PageType;
  sourceUrl: string;
  metadata: ChunkMetadata;
}

export interface SearchFilters {
  ownerId?: string;
  pageType?: PageType;
}

export type SanityCategory = "gpa" | "toefl" | "ielts" | "gre" | "cost";

export interface SanityWarning {
  /** `<category>_out_of_range` or `<category>_zero` */
  rule: string;
  category: SanityCategory;
  kind: "out_of_range" | "degenerate_zero";
  value: number;
  matchedSnippet: string;
  explanation: string;
}

export interface RetrievalResult {
  readonly chunk: Readonly<ChunkRecord>;
  vectorScore: number;
  rerankScore?: number;
  sanityWarnings: SanityWarning[];
  annotatedText: string;
}

// ── Metadata (de)serialization ──────────────────────────────────────────

type MetadataField = Exclude<keyof ChunkMetadata, "extra">;

interface MetadataKey {
  field: MetadataField;
  column: string;
  type: "number" | "boolean" | "string";
}

const METADATA_KEYS: readonly MetadataKey[] = [
  { field: "minimumGpa", column: "minimum_gpa", type: "number" },
  { field: "toeflMin", column: "toefl_min", type: "number" },
  { field: "toeflRequired", column: "toefl_required", type: "boolean" },
  { field: "ieltsMin", column: "ielts_min", type: "number" },
  { field: "ieltsRequired", column: "ielts_required", type: "boolean" },
  { field: "greStatus", column: "gre_status", type: "string" },
  { field: "fallDeadline", column: "fall_deadline", type: "string" },
  { field: "springDeadline", column: "spring_deadline", type: "string" },
  { field: "recommendationLetters", column: "recommendation_letters", type: "number" },
  { field: "interviewRequired", column: "interview_required", type: "string" },
];

const KEYS_BY_COLUMN = new Map(METADATA_KEYS.map((key) => [key.column, key]));

export function emptyMetadata(): ChunkMetadata {
  return { extra: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build metadata from a snake_case key/value map. Documented keys with a
 * value of the wrong type are kept in `extra` rather than dropped.
 */
export function parseMetadata(raw: unknown): ChunkMetadata {
  const metadata = emptyMetadata();
  if (!isRecord(raw)) return metadata;

  for (const [key, value] of Object.entries(raw)) {
    const known = KEYS_BY_COLUMN.get(key);
    if (value === null || value === undefined) continue;
    if (!known || typeof value !== known.type) {
      metadata.extra[key] = value;
      continue;
    }
    assignField(metadata, known.field, value);
  }

  return metadata;
}

function assignField(
  metadata: ChunkMetadata,
  field: MetadataField,
  value: unknown,
): void {
  switch (field) {
    case "minimumGpa":
    case "toeflMin":
    case "ieltsMin":
    case "recommendationLetters":
      if (typeof value === "number") metadata[field] = value;
      break;
    case "toeflRequired":
    case "ieltsRequired":
      if (typeof value === "boolean") metadata[field] = value;
      break;
    case "greStatus":
    case "fallDeadline":
    case "springDeadline":
    case "interviewRequired":
      if (typeof value === "string") metadata[field] = value;
      break;
  }
}

/**
 * Flatten metadata back to the snake_case map stored in the JSON column.
 */
export function serializeMetadata(metadata: ChunkMetadata): Record<string, unknown> {
  const out: Record<string, unknown> = { ...metadata.extra };
  for (const key of METADATA_KEYS) {
    const value = metadata[key.field];
    if (value !== undefined) {
      out[key.column] = value;
    }
  }
  return out;
}
