/**
 * Page-type rules: URL classification and per-type chunk profiles.
 *
 * Both tables are plain data so they can be tuned and tested on their own.
 * Order matters in PAGE_TYPE_RULES: the first matching rule wins.
 */

import type { PageType } from "../schemas/documents.js";

export interface PageTypeRule {
  pageType: PageType;
  /** Substrings matched against the lower-cased URL */
  markers: string[];
}

export const PAGE_TYPE_RULES: PageTypeRule[] = [
  { pageType: "reddit", markers: ["reddit.com"] },
  { pageType: "faq", markers: ["faq", "frequently-asked"] },
  { pageType: "checklist", markers: ["checklist", "requirements"] },
  { pageType: "admissions", markers: ["admissions", "graduate-admissions"] },
  { pageType: "apply", markers: ["apply"] },
  { pageType: "accepting", markers: ["accepting", "acceptance"] },
];

export interface ChunkProfile {
  /** Maximum fresh characters per window */
  targetSize: number;
  overlapFraction: number;
}

export const CHUNK_PROFILES: Record<PageType, ChunkProfile> = {
  faq: { targetSize: 1200, overlapFraction: 0.1 },
  checklist: { targetSize: 600, overlapFraction: 0.1 },
  admissions: { targetSize: 1600, overlapFraction: 0.2 },
  apply: { targetSize: 800, overlapFraction: 0.1 },
  accepting: { targetSize: 700, overlapFraction: 0.1 },
  reddit: { targetSize: 1500, overlapFraction: 0.1 },
  general: { targetSize: 700, overlapFraction: 0.1 },
};

export const OVERLAP_FLOOR = 50;

export function inferPageType(url: string): PageType {
  const lower = url.toLowerCase();
  for (const rule of PAGE_TYPE_RULES) {
    if (rule.markers.some((marker) => lower.includes(marker))) {
      return rule.pageType;
    }
  }
  return "general";
}

export function getChunkProfile(pageType: PageType): ChunkProfile {
  return CHUNK_PROFILES[pageType];
}

export function overlapCharsFor(profile: ChunkProfile): number {
  return Math.max(
    OVERLAP_FLOOR,
    Math.floor(profile.targetSize * profile.overlapFraction),
  );
}
