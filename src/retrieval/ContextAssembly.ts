/**
 * Prompt context assembly from retrieval results.
 */

import {
  serializeMetadata,
  type RetrievalResult,
} from "../schemas/documents.js";

export interface AssembleOptions {
  maxChars: number;
}

export const BLOCK_SEPARATOR = "\n\n";
const ELLIPSIS = "…";

function formatMetadataValue(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}

export function formatMetadataLine(result: RetrievalResult): string | null {
  const entries = Object.entries(serializeMetadata(result.chunk.metadata));
  if (entries.length === 0) return null;
  return `[Metadata] ${entries
    .map(([key, value]) => `${key}: ${formatMetadataValue(value)}`)
    .join(" | ")}`;
}

/** `index` is zero-based; sources are numbered from 1 */
export function formatResult(result: RetrievalResult, index: number): string {
  const { chunk } = result;
  const lines = [
    `--- Source ${index + 1} (${chunk.ownerId} / ${chunk.pageType}) ${chunk.sourceUrl} ---`,
  ];
  const metadataLine = formatMetadataLine(result);
  if (metadataLine) lines.push(metadataLine);
  lines.push(`[Content] ${result.annotatedText}`);
  return lines.join("\n");
}

export function assembleContext(
  results: readonly RetrievalResult[],
  options: AssembleOptions,
): string {
  let context = "";

  for (let i = 0; i < results.length; i++) {
    const block = formatResult(results[i], i);
    const next = context ? `${context}${BLOCK_SEPARATOR}${block}` : block;

    if (next.length <= options.maxChars) {
      context = next;
      continue;
    }

    if (!context && options.maxChars > 0) {
      context = block.slice(0, Math.max(0, options.maxChars - ELLIPSIS.length)) + ELLIPSIS;
    }
    break;
  }

  return context;
}
