/**
 * Sanity rules: numeric plausibility checks for admissions figures.
 *
 * Each rule pairs a pattern that captures one number (group 1) with the
 * range(s) a real value can fall in. A value outside every range is flagged.
 * Patterns stop at the first number after the keyword and never look past
 * a line break, so a keyword is not paired with an unrelated figure.
 *
 * The table is conservative: it flags only values that cannot be right
 * (a 9.2 GPA, a 130 TOEFL iBT), not values that are merely unusual.
 */

import type { SanityCategory } from "../schemas/documents.js";

export interface NumericRange {
  min: number;
  max: number;
}

export interface SanityRule {
  category: SanityCategory;
  /** Global pattern; capture group 1 holds the value */
  pattern: RegExp;
  /** Plausible if the value falls inside any range (inclusive) */
  ranges: NumericRange[];
  /** Zero is a placeholder or parse failure for this category */
  zeroIsImplausible: boolean;
  outOfRange: (value: number) => string;
  zero?: string;
}

export const SANITY_BANNER_HEADER =
  "⚠️ [Suspicious data: search again or cite with caution]";

export const MAX_SNIPPET_CHARS = 80;

const GPA_RULE: SanityRule = {
  category: "gpa",
  pattern:
    /\b(?:gpa|grade\s+point\s+average)\b[^\d\n]{0,40}?(\d{1,3}(?!\d)(?:\.\d{1,2})?)(?:\s*\/\s*\d{1,3}(?:\.\d{1,2})?)?/gi,
  ranges: [{ min: 0, max: 4.5 }],
  zeroIsImplausible: true,
  outOfRange: (value) =>
    `GPA ${value} exceeds the 4.5 ceiling of US 4.0/4.3 scales; likely a percentage or non-US grade mixed in, or a scraping error.`,
  zero: "GPA of 0 is likely a placeholder or a parsing error.",
};

const TOEFL_RULE: SanityRule = {
  category: "toefl",
  pattern: /\btoefl\b[^\d\n]{0,40}?(\d{2,3})\b/gi,
  ranges: [{ min: 0, max: 120 }],
  zeroIsImplausible: false,
  outOfRange: (value) =>
    `TOEFL score ${value} exceeds the iBT maximum of 120; possibly an old paper-based score labelled as iBT.`,
};

const IELTS_RULE: SanityRule = {
  category: "ielts",
  pattern: /\bielts\b[^\d\n]{0,40}?(\d{1,2}(?:\.\d)?)\b/gi,
  ranges: [{ min: 0, max: 9 }],
  zeroIsImplausible: false,
  outOfRange: (value) => `IELTS score ${value} exceeds the band maximum of 9.0.`,
};

const GRE_RULE: SanityRule = {
  category: "gre",
  pattern: /\bgre\b[^\d\n]{0,40}?\b(\d{3})\b/gi,
  ranges: [
    { min: 130, max: 170 },
    { min: 260, max: 340 },
  ],
  zeroIsImplausible: false,
  outOfRange: (value) =>
    `GRE value ${value} is outside known ranges (130-170 per section, 260-340 total).`,
};

const COST_RULE: SanityRule = {
  category: "cost",
  pattern: /\$\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?/g,
  ranges: [{ min: 0, max: 100_000 }],
  zeroIsImplausible: false,
  outOfRange: (value) =>
    `Cost of $${value.toLocaleString("en-US")} is above $100,000 for a single figure; likely a multi-year total or a parsing error.`,
};

export const SANITY_RULES: SanityRule[] = [
  GPA_RULE,
  TOEFL_RULE,
  IELTS_RULE,
  GRE_RULE,
  COST_RULE,
];
