/**
 * Chunker - page-type-aware text segmentation
 *
 * Generic pages go through a recursive separator split followed by greedy
 * windowing with overlap. FAQ pages are first cut at question boundaries so
 * each question stays with its answer.
 */

import type { PageType } from "../schemas/documents.js";
import {
  getChunkProfile,
  overlapCharsFor,
  type ChunkProfile,
} from "./pageTypes.js";

/** Chunks shorter than this after trimming are dropped as noise */
export const MIN_CHUNK_CHARS = 30;

/** FAQ fragments shorter than this are merged into their neighbour */
export const FAQ_MIN_FRAGMENT_CHARS = 80;

// Paragraph break → line break → sentence end → space. Each separator stays
// attached to the piece before it so pieces always concatenate to the input.
const SEPARATORS: RegExp[] = [
  /\n[ \t]*\n\s*/g,
  /\n/g,
  /(?:[.!?]+(?=\s|$)|。)\s*/g,
  / +/g,
];

const QUESTION_WORDS = [
  "what",
  "how",
  "when",
  "where",
  "why",
  "who",
  "whom",
  "whose",
  "which",
  "can",
  "could",
  "do",
  "does",
  "did",
  "is",
  "are",
  "was",
  "were",
  "will",
  "would",
  "should",
  "shall",
  "may",
  "might",
  "must",
  "has",
  "have",
];

// A sentence start (text start or after a terminator) whose sentence opens
// with a question word and ends in "?". Decimal points do not end a sentence.
const QUESTION_START = new RegExp(
  `(?:^|(?<=[.!?:\\n]))\\s*(?=(?:${QUESTION_WORDS.join("|")})\\b(?:[^.!?\\n]|\\.(?=\\d))*\\?)`,
  "gi",
);

export function chunk(text: string, pageType: PageType = "general"): string[] {
  if (!text || !text.trim()) {
    return [];
  }

  const profile = getChunkProfile(pageType);
  const segments =
    pageType === "faq" ? splitFaq(text, profile) : splitWindows(text, profile);

  return segments
    .map((segment) => segment.trim())
    .filter((segment) => segment.length >= MIN_CHUNK_CHARS);
}

/**
 * Generic splitter: pieces ≤ targetSize, greedy windows of ≤ targetSize
 * fresh characters, each window after the first prefixed with the tail of
 * the previous one.
 */
export function splitWindows(text: string, profile: ChunkProfile): string[] {
  const pieces = splitToPieces(text, profile.targetSize, 0);
  const windows = buildWindows(pieces, profile.targetSize);
  const overlapChars = overlapCharsFor(profile);

  return windows.map((window, i) =>
    i === 0 ? window : overlapTail(windows[i - 1], overlapChars) + window,
  );
}

function splitFaq(text: string, profile: ChunkProfile): string[] {
  const fragments = mergeShortFragments(splitAtQuestions(text));
  return fragments.flatMap((fragment) =>
    fragment.trim().length > profile.targetSize
      ? splitWindows(fragment, profile)
      : [fragment],
  );
}

export function splitAtQuestions(text: string): string[] {
  const boundaries: number[] = [];
  for (const match of text.matchAll(QUESTION_START)) {
    const boundary = (match.index ?? 0) + match[0].length;
    if (boundary > 0 && boundary !== boundaries[boundaries.length - 1]) {
      boundaries.push(boundary);
    }
  }

  const fragments: string[] = [];
  let start = 0;
  for (const boundary of boundaries) {
    fragments.push(text.slice(start, boundary));
    start = boundary;
  }
  fragments.push(text.slice(start));
  return fragments.filter((fragment) => fragment.trim().length > 0);
}

function mergeShortFragments(fragments: string[]): string[] {
  const merged: string[] = [];
  for (const fragment of fragments) {
    const last = merged.length - 1;
    if (last >= 0 && fragment.trim().length < FAQ_MIN_FRAGMENT_CHARS) {
      merged[last] += fragment;
    } else {
      merged.push(fragment);
    }
  }

  // A short preamble has nothing before it; fold it into the first question.
  if (merged.length > 1 && merged[0].trim().length < FAQ_MIN_FRAGMENT_CHARS) {
    const [head, next, ...rest] = merged;
    return [head + next, ...rest];
  }
  return merged;
}

function splitToPieces(text: string, size: number, level: number): string[] {
  if (text.length <= size) {
    return [text];
  }

  if (level >= SEPARATORS.length) {
    const slices: string[] = [];
    for (let i = 0; i < text.length; i += size) {
      slices.push(text.slice(i, i + size));
    }
    return slices;
  }

  const parts = splitKeeping(text, SEPARATORS[level]);
  if (parts.length <= 1) {
    return splitToPieces(text, size, level + 1);
  }

  return parts.flatMap((part) =>
    part.length <= size ? [part] : splitToPieces(part, size, level + 1),
  );
}

function splitKeeping(text: string, separator: RegExp): string[] {
  const parts: string[] = [];
  let start = 0;
  for (const match of text.matchAll(separator)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end <= start) continue;
    parts.push(text.slice(start, end));
    start = end;
  }
  if (start < text.length) {
    parts.push(text.slice(start));
  }
  return parts;
}

function buildWindows(pieces: string[], size: number): string[] {
  const windows: string[] = [];
  let current = "";
  for (const piece of pieces) {
    if (current && current.length + piece.length > size) {
      windows.push(current);
      current = piece;
    } else {
      current += piece;
    }
  }
  if (current) {
    windows.push(current);
  }
  return windows;
}

/**
 * Last `overlapChars` of a window, moved forward to the next word boundary
 * when the cut lands inside a word.
 */
function overlapTail(window: string, overlapChars: number): string {
  if (overlapChars <= 0) return "";
  if (window.length <= overlapChars) return window;

  const cut = window.length - overlapChars;
  const tail = window.slice(cut);
  if (/\S/.test(window.charAt(cut - 1)) && /\S/.test(tail.charAt(0))) {
    const boundary = tail.search(/\s/);
    if (boundary !== -1) {
      return tail.slice(boundary);
    }
  }
  return tail;
}
