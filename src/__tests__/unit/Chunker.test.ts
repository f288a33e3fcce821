/**
 * Chunker Unit Tests
 *
 * Covers the generic window splitter (size bounds, overlap, coverage),
 * the FAQ question-boundary split and the noise filter.
 */

import {
  chunk,
  splitAtQuestions,
  MIN_CHUNK_CHARS,
} from "../../ingestion/Chunker.js";
import {
  CHUNK_PROFILES,
  overlapCharsFor,
} from "../../ingestion/pageTypes.js";
import { PAGE_TYPES } from "../../schemas/documents.js";

const TRANSCRIPT_SENTENCE =
  "Applicants must submit official transcripts from every institution attended. ";

function repeatTo(sentence: string, length: number): string {
  return sentence.repeat(Math.ceil(length / sentence.length)).slice(0, length);
}

const FAQ_TEXT = [
  "Frequently asked questions.",
  "What is the minimum GPA for admission? We do not set a minimum GPA, but most admitted students have a GPA above 3.5 on a 4.0 scale.",
  "When is the application deadline for fall? The deadline for fall admission is December 15 and late applications are not reviewed.",
  "Do I need to submit GRE scores? GRE scores are optional for the 2025 cycle and will not affect the admission decision.",
  "How many recommendation letters are required? Three letters of recommendation are required, at least two from academic referees.",
].join("\n");

const PROGRAM_TEXT = [
  "The Master of Science in Computer Science is a full-time program.",
  "Students complete eight courses and a capstone project over three semesters.",
  "",
  "Funding is not guaranteed for master's students. Teaching assistant positions are posted each semester.",
  "",
  "International applicants must hold a valid student visa before the program start date. The graduate office issues the I-20 after the deposit is paid.",
  "",
  "Applications open on September 1 and close on December 15. Decisions are released by the end of March.",
  "",
  "Admitted students confirm their place by paying a deposit of five hundred dollars. The deposit is credited toward the first semester of tuition.",
  "",
  "Orientation takes place during the week before classes begin. Attendance is required for all incoming graduate students.",
].join("\n");

describe("chunk", () => {
  describe("edge cases", () => {
    it("should return no chunks for empty or whitespace input", () => {
      expect(chunk("", "general")).toEqual([]);
      expect(chunk("   \n\n  ", "faq")).toEqual([]);
    });

    it("should drop text shorter than the noise floor", () => {
      expect(chunk("Apply now.", "general")).toEqual([]);
    });

    it("should return one trimmed chunk for text below the target size", () => {
      const text = "  Applications close on December 15 for the fall term.  ";

      expect(chunk(text, "general")).toEqual([
        "Applications close on December 15 for the fall term.",
      ]);
    });
  });

  describe("admissions page of 3,000 characters", () => {
    const text = repeatTo(TRANSCRIPT_SENTENCE, 3000);
    const profile = CHUNK_PROFILES.admissions;
    const overlap = overlapCharsFor(profile);

    it("should use a 1600 target with 320 characters of overlap", () => {
      expect(profile.targetSize).toBe(1600);
      expect(overlap).toBe(320);
    });

    it("should produce exactly two chunks", () => {
      expect(chunk(text, "admissions")).toHaveLength(2);
    });

    it("should keep every chunk within target plus overlap and above the floor", () => {
      for (const piece of chunk(text, "admissions")) {
        expect(piece.length).toBeLessThanOrEqual(profile.targetSize + overlap);
        expect(piece.length).toBeGreaterThanOrEqual(MIN_CHUNK_CHARS);
      }
    });

    it("should start the second chunk with text from the end of the first", () => {
      const [first, second] = chunk(text, "admissions");

      expect(first).toContain(second.slice(0, 100));
      expect(second.startsWith("attended. Applicants must")).toBe(true);
    });
  });

  describe("generic splitting", () => {
    it("should respect size bounds for every page type", () => {
      const text = repeatTo(TRANSCRIPT_SENTENCE, 5000);

      for (const pageType of PAGE_TYPES) {
        if (pageType === "faq") continue;
        const profile = CHUNK_PROFILES[pageType];
        const limit = profile.targetSize + overlapCharsFor(profile);
        for (const piece of chunk(text, pageType)) {
          expect(piece.length).toBeLessThanOrEqual(limit);
        }
      }
    });

    it("should cover every sentence of the input", () => {
      const chunks = chunk(PROGRAM_TEXT, "checklist");
      const sentences = PROGRAM_TEXT.split(/(?<=\.)\s+/).filter(Boolean);

      expect(chunks.length).toBeGreaterThan(1);
      for (const sentence of sentences) {
        expect(chunks.some((piece) => piece.includes(sentence.trim()))).toBe(true);
      }
    });

    it("should be deterministic", () => {
      const text = repeatTo(TRANSCRIPT_SENTENCE, 4000);

      expect(chunk(text, "reddit")).toEqual(chunk(text, "reddit"));
    });

    it("should hard-cut text with no separators", () => {
      const text = "x".repeat(1500);
      const chunks = chunk(text, "general");
      const limit = 700 + overlapCharsFor(CHUNK_PROFILES.general);

      expect(chunks.length).toBeGreaterThan(1);
      for (const piece of chunks) {
        expect(piece.length).toBeLessThanOrEqual(limit);
      }
    });
  });

  describe("faq pages", () => {
    it("should emit one chunk per question", () => {
      expect(chunk(FAQ_TEXT, "faq")).toHaveLength(4);
    });

    it("should start each chunk after the first at its question", () => {
      const chunks = chunk(FAQ_TEXT, "faq");

      expect(chunks[0]).toContain("What is the minimum GPA for admission?");
      expect(chunks[1].startsWith("When is the application deadline for fall?")).toBe(true);
      expect(chunks[2].startsWith("Do I need to submit GRE scores?")).toBe(true);
      expect(chunks[3].startsWith("How many recommendation letters are required?")).toBe(true);
    });

    it("should fold a short preamble into the first question", () => {
      const [first] = chunk(FAQ_TEXT, "faq");

      expect(first.startsWith("Frequently asked questions.\nWhat is the minimum GPA")).toBe(true);
    });

    it("should not add overlap between questions", () => {
      const chunks = chunk(FAQ_TEXT, "faq");

      expect(chunks[1]).not.toContain("3.5 on a 4.0 scale");
    });

    it("should merge short answers into the previous question", () => {
      const text =
        "What documents do international applicants need to provide with the application? A passport copy, bank statements and transcripts.\nIs there a fee? Yes.";

      expect(chunk(text, "faq")).toHaveLength(1);
    });

    it("should not treat a decimal point as a sentence end", () => {
      const fragments = splitAtQuestions(
        "Intro text here. Is a GPA of 3.0 enough for admission? Usually not.",
      );

      expect(fragments).toEqual([
        "Intro text here. ",
        "Is a GPA of 3.0 enough for admission? Usually not.",
      ]);
    });
  });
});
