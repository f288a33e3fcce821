/**
 * QueryExpander Unit Tests
 *
 * Paraphrase parsing, multi-query candidate merging, reranking against the
 * original query, and partial / total failure handling.
 */

import { DatabaseAdapter } from "../../storage/Database.js";
import { VectorStore, type ScoredChunk } from "../../retrieval/VectorStore.js";
import { HybridRetriever } from "../../retrieval/HybridRetriever.js";
import {
  cleanParaphraseLine,
  mergePools,
  parseParaphrases,
  QueryExpander,
} from "../../retrieval/QueryExpander.js";
import { EventBus } from "../../orchestrator/EventBus.js";
import type { Event } from "../../schemas/events.js";
import {
  FakeEmbeddings,
  FakeReranker,
  ScriptedModel,
  textResponse,
} from "../helpers/fakes.js";

beforeAll(() => {
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "warn").mockImplementation(() => {});
  jest.spyOn(console, "error").mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});

// ── Parsing ────────────────────────────────────────────────────────────

describe("cleanParaphraseLine", () => {
  it.each([
    ["1. TOEFL minimum score", "TOEFL minimum score"],
    ["2) english test waiver", "english test waiver"],
    ["- IELTS requirement", "IELTS requirement"],
    ["* language proficiency", "language proficiency"],
    ["• \"English test policy\"", "English test policy"],
    ["   ", ""],
  ])("should clean %j", (line, expected) => {
    expect(cleanParaphraseLine(line)).toBe(expected);
  });
});

describe("parseParaphrases", () => {
  it("should put the original first and drop blanks and duplicates", () => {
    const output = "1. TOEFL minimum score\n\n2. TOEFL minimum score\n3. IELTS requirement";

    expect(parseParaphrases("english test", output, 3)).toEqual([
      "english test",
      "TOEFL minimum score",
      "IELTS requirement",
    ]);
  });

  it("should cap the list at n paraphrases plus the original", () => {
    expect(parseParaphrases("q", "a\nb\nc\nd", 2)).toEqual(["q", "a", "b"]);
  });

  it("should not repeat the original query", () => {
    expect(parseParaphrases("english test", "english test\nother", 3)).toEqual([
      "english test",
      "other",
    ]);
  });
});

describe("mergePools", () => {
  function scored(id: number, text: string, score: number): ScoredChunk {
    return {
      chunk: {
        id,
        pageId: `p${id}`,
        ownerId: "cmu",
        chunkIndex: 0,
        text,
        pageType: "general",
        sourceUrl: `https://www.cmu.edu/p${id}`,
        metadata: { extra: {} },
      },
      score,
    };
  }

  it("should keep the first occurrence of each chunk text", () => {
    const merged = mergePools([
      [scored(1, "alpha", 0.9), scored(2, "beta", 0.5)],
      [scored(3, "beta", 0.8), scored(4, "gamma", 0.4)],
    ]);

    expect(merged.map((c) => c.chunk.id)).toEqual([1, 2, 4]);
  });
});

// ── Expanded search ────────────────────────────────────────────────────

const PAGES = [
  "International applicants must submit TOEFL scores of at least 100.",
  "IELTS scores of 7.0 are accepted in place of the TOEFL.",
  "English proficiency tests are waived for degrees taught in English.",
  "The application deadline for the fall term is December 15.",
  "Three letters of recommendation are required for every program.",
  "Funding for master's students is not guaranteed by the department.",
  "The statement of purpose should describe your research interests.",
  "Official transcripts are required only after an offer of admission.",
];

describe("QueryExpander", () => {
  let database: DatabaseAdapter;
  let embeddings: FakeEmbeddings;
  let reranker: FakeReranker;
  let eventBus: EventBus;
  let store: VectorStore;
  let retriever: HybridRetriever;

  beforeEach(async () => {
    database = new DatabaseAdapter({ path: ":memory:", walMode: false });
    database.initialize();
    embeddings = new FakeEmbeddings();
    store = new VectorStore(database, embeddings);
    for (const [i, text] of PAGES.entries()) {
      const url = `https://www.cmu.edu/page/${i}`;
      await store.upsert({ id: url, url, ownerId: "cmu", pageType: "general", rawText: text });
    }
    embeddings.calls.length = 0;
    reranker = new FakeReranker();
    eventBus = new EventBus();
    retriever = new HybridRetriever(store, embeddings, reranker, {
      oversampleFactor: 3,
      eventBus,
    });
  });

  afterEach(() => {
    database.close();
  });

  describe("generateParaphrases()", () => {
    it("should request n paraphrases at a higher temperature", async () => {
      const model = new ScriptedModel([textResponse("a\nb")]);
      const expander = new QueryExpander(retriever, model);
      const generate = jest.spyOn(model, "generate");

      const queries = await expander.generateParaphrases("toefl", 2);

      expect(queries).toEqual(["toefl", "a", "b"]);
      expect(generate).toHaveBeenCalledWith(expect.objectContaining({ temperature: 0.7 }));
    });

    it("should fall back to the original query when generation fails", async () => {
      const expander = new QueryExpander(retriever, new ScriptedModel());

      expect(await expander.generateParaphrases("toefl", 3)).toEqual(["toefl"]);
    });

    it("should skip generation when n is 0", async () => {
      const model = new ScriptedModel();
      const expander = new QueryExpander(retriever, model);

      expect(await expander.generateParaphrases("toefl", 0)).toEqual(["toefl"]);
      expect(model.requests).toHaveLength(0);
    });
  });

  describe("searchExpanded()", () => {
    it("should search the original and every paraphrase", async () => {
      const model = new ScriptedModel([
        textResponse("1. TOEFL minimum score\n2. IELTS requirement\n3. English proficiency waiver"),
      ]);
      const expander = new QueryExpander(retriever, model);

      await expander.searchExpanded("english test scores", 2);

      expect(embeddings.calls).toEqual([
        ["english test scores"],
        ["TOEFL minimum score"],
        ["IELTS requirement"],
        ["English proficiency waiver"],
      ]);
    });

    it("should rerank the merged pool once against the original query", async () => {
      const model = new ScriptedModel([textResponse("TOEFL minimum score\nIELTS requirement")]);
      const expander = new QueryExpander(retriever, model);

      const outcome = await expander.searchExpanded("  english test scores  ", 2);

      expect(reranker.calls).toHaveLength(1);
      expect(reranker.calls[0].query).toBe("english test scores");
      expect(new Set(reranker.calls[0].texts).size).toBe(reranker.calls[0].texts.length);
      expect(outcome.results).toHaveLength(2);
      expect(outcome.error).toBeNull();
    });

    it("should rerank a merged pool that already fits in topK", async () => {
      const model = new ScriptedModel([textResponse("TOEFL minimum score")]);
      const expander = new QueryExpander(retriever, model);

      const outcome = await expander.searchExpanded("english test scores", 10);

      expect(reranker.calls).toHaveLength(1);
      expect(reranker.calls[0].texts).toHaveLength(PAGES.length);
      expect(outcome.results).toHaveLength(PAGES.length);
      expect(outcome.results.every((r) => r.rerankScore !== undefined)).toBe(true);
    });

    it("should break rerank ties by first-seen order, not by paraphrase similarity", async () => {
      const flatReranker = new FakeReranker(() => 0);
      const narrow = new HybridRetriever(store, embeddings, flatReranker, {
        oversampleFactor: 1,
      });
      const model = new ScriptedModel([textResponse(PAGES[4])]);
      const expander = new QueryExpander(narrow, model);

      const outcome = await expander.searchExpanded("deadline fall term", 1);

      expect(flatReranker.calls[0].texts).toEqual([PAGES[3], PAGES[4]]);
      expect(outcome.results.map((r) => r.chunk.text)).toEqual([PAGES[3]]);
    });

    it("should sort the merged pool by vector score when reranking is off", async () => {
      const vectorOnly = new HybridRetriever(store, embeddings, reranker, {
        oversampleFactor: 1,
        rerankEnabled: false,
      });
      const model = new ScriptedModel([textResponse(PAGES[4])]);
      const expander = new QueryExpander(vectorOnly, model);

      const outcome = await expander.searchExpanded("deadline fall term", 1);

      expect(reranker.calls).toHaveLength(0);
      expect(outcome.results.map((r) => r.chunk.text)).toEqual([PAGES[4]]);
    });

    it("should still return results when some searches fail", async () => {
      const model = new ScriptedModel([textResponse("IELTS requirement")]);
      const expander = new QueryExpander(retriever, model);
      const events: Event[] = [];
      eventBus.on("retrieval.error", (event) => {
        events.push(event);
      });
      embeddings.failOn = (text) => text === "IELTS requirement";

      const outcome = await expander.searchExpanded("english test scores", 2);

      expect(outcome.error).toBeNull();
      expect(outcome.results).toHaveLength(2);
      expect(events).toHaveLength(1);
      expect(events[0].source).toBe("expander");
    });

    it("should report an error when every search fails", async () => {
      const model = new ScriptedModel([textResponse("IELTS requirement")]);
      const expander = new QueryExpander(retriever, model);
      embeddings.failOn = () => true;

      const outcome = await expander.searchExpanded("english test scores", 2);

      expect(outcome.results).toEqual([]);
      expect(outcome.error?.kind).toBe("embedding");
    });

    it("should return nothing for an empty query", async () => {
      const model = new ScriptedModel();
      const expander = new QueryExpander(retriever, model);

      expect(await expander.searchExpanded("  ", 5)).toEqual({ results: [], error: null });
      expect(model.requests).toHaveLength(0);
    });
  });
});
