/**
 * SanityAuditor: flags implausible numbers in retrieved chunk text.
 *
 * Warnings are data. The stored chunk is never touched: annotate() returns
 * new results whose annotatedText carries a banner ahead of the original.
 */

import type { RetrievalResult, SanityWarning } from "../schemas/documents.js";
import {
  MAX_SNIPPET_CHARS,
  SANITY_BANNER_HEADER,
  SANITY_RULES,
  type SanityRule,
} from "./sanity_rules.js";

function parseNumber(raw: string): number | null {
  const value = Number(raw.replace(/,/g, ""));
  return Number.isFinite(value) ? value : null;
}

function inRange(rule: SanityRule, value: number): boolean {
  return rule.ranges.some((range) => value >= range.min && value <= range.max);
}

export function formatBanner(warnings: SanityWarning[]): string {
  const lines = warnings.map(
    (warning) => `  - [${warning.rule}] ${warning.explanation}`,
  );
  return [SANITY_BANNER_HEADER, ...lines].join("\n");
}

export class SanityAuditor {
  constructor(private rules: SanityRule[] = SANITY_RULES) {}

  audit(text: string): SanityWarning[] {
    const warnings: SanityWarning[] = [];

    for (const rule of this.rules) {
      for (const match of text.matchAll(rule.pattern)) {
        const value = parseNumber(match[1] ?? "");
        if (value === null) continue;

        const matchedSnippet = match[0].trim().slice(0, MAX_SNIPPET_CHARS);

        if (value === 0 && rule.zeroIsImplausible) {
          warnings.push({
            rule: `${rule.category}_zero`,
            category: rule.category,
            kind: "degenerate_zero",
            value,
            matchedSnippet,
            explanation: rule.zero ?? `${rule.category} value of 0 is implausible.`,
          });
        } else if (!inRange(rule, value)) {
          warnings.push({
            rule: `${rule.category}_out_of_range`,
            category: rule.category,
            kind: "out_of_range",
            value,
            matchedSnippet,
            explanation: rule.outOfRange(value),
          });
        }
      }
    }

    return warnings;
  }

  annotate(results: readonly RetrievalResult[]): RetrievalResult[] {
    return results.map((result) => {
      const sanityWarnings = this.audit(result.chunk.text);
      const annotatedText =
        sanityWarnings.length > 0
          ? `${formatBanner(sanityWarnings)}\n\n${result.chunk.text}`
          : result.chunk.text;
      return { ...result, sanityWarnings, annotatedText };
    });
  }
}
