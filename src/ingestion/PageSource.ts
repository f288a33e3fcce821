/**
 * PageSource - reads harvested pages from disk.
 *
 * A page file is a JSON object mapping url → raw page text, as written by
 * the harvester.
 */

import { readFileSync } from "fs";
import { basename } from "path";
import { IngestionError } from "../errors.js";

export interface RawPage {
  url: string;
  rawText: string;
  /** Owner hint taken from the file name */
  ownerHint?: string;
}

export function loadPageFile(path: string): RawPage[] {
  const raw = readFileSync(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new IngestionError(`Invalid JSON in page file: ${String(error)}`, path);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new IngestionError("Page file must be a url → text object", path);
  }

  const ownerHint = ownerHintFromFilename(path);
  const pages: RawPage[] = [];
  for (const [url, text] of Object.entries(parsed)) {
    if (typeof text !== "string") {
      console.warn(`[PageSource] Skipping non-text entry for ${url}`);
      continue;
    }
    pages.push({ url, rawText: text, ownerHint });
  }
  return pages;
}

/** "cmu_admissions.json" → "cmu" */
export function ownerHintFromFilename(path: string): string | undefined {
  const stem = basename(path).replace(/\.json$/i, "");
  const [head] = stem.split(/[_\-.]/);
  return head ? head.toLowerCase() : undefined;
}
