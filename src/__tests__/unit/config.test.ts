/**
 * Server configuration tests
 *
 * loadConfig() takes the environment as an argument, so every test passes
 * its own map instead of touching process.env.
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, loadEnvFile } from "../../config/index.js";
import { ConfigurationError } from "../../errors.js";

const BASE_ENV = {
  OPENAI_API_KEY: "test-secret",
  RERANK_URL: "http://reranker.test",
};

describe("loadConfig", () => {
  it("should apply defaults for everything but the API key", () => {
    const config = loadConfig(BASE_ENV);

    expect(config.port).toBe(3000);
    expect(config.openai).toEqual({
      apiKey: "test-secret",
      chatModel: "gpt-4o-mini",
      embeddingModel: "text-embedding-3-small",
      embeddingDimensions: 1024,
    });
    expect(config.rerank.enabled).toBe(true);
    expect(config.retrieval).toEqual({
      topK: 5,
      oversampleFactor: 3,
      contextMaxChars: 12000,
      expansionCount: 3,
    });
    expect(config.agent).toEqual({ maxSteps: 5, toolTopK: 4, deadlineMs: 60000 });
    expect(config.timeouts).toEqual({ requestMs: 30000, ingestMs: 300000 });
    expect(config.storage.enableWalMode).toBe(true);
  });

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      ...BASE_ENV,
      PORT: "8080",
      RAG_TOP_K: "8",
      RAG_OVERSAMPLE_FACTOR: "4",
      AGENT_MAX_STEPS: "2",
      AGENT_DEADLINE_MS: "0",
      REQUEST_TIMEOUT_MS: "0",
      INGEST_TIMEOUT_MS: "45000",
      DATABASE_PATH: ":memory:",
      DATABASE_WAL_MODE: "false",
    });

    expect(config.port).toBe(8080);
    expect(config.retrieval.topK).toBe(8);
    expect(config.retrieval.oversampleFactor).toBe(4);
    expect(config.agent.maxSteps).toBe(2);
    expect(config.agent.deadlineMs).toBe(0);
    expect(config.timeouts).toEqual({ requestMs: 0, ingestMs: 45000 });
    expect(config.storage).toEqual({ databasePath: ":memory:", enableWalMode: false });
  });

  it("should require OPENAI_API_KEY", () => {
    expect(() => loadConfig({ RERANK_URL: "http://reranker.test" })).toThrow(
      "Missing required environment variable: OPENAI_API_KEY",
    );
  });

  it("should require RERANK_URL while rerank is enabled", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret" })).toThrow(ConfigurationError);
  });

  it("should allow a missing RERANK_URL when rerank is disabled", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret", ENABLE_RERANK: "false" });

    expect(config.rerank.enabled).toBe(false);
    expect(config.rerank.url).toBe("");
  });

  it.each([
    ["RAG_TOP_K", "many"],
    ["PORT", "-1"],
    ["ENABLE_RERANK", "yes"],
    ["RAG_OVERSAMPLE_FACTOR", "0"],
  ])("should reject %s=%s", (key, value) => {
    expect(() => loadConfig({ ...BASE_ENV, [key]: value })).toThrow(ConfigurationError);
  });
});

describe("loadEnvFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "env-"));
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env.ADMISSIONS_TEST_MARKER;
    jest.restoreAllMocks();
  });

  it("should load a .env file from the given directory", () => {
    writeFileSync(join(dir, ".env"), "ADMISSIONS_TEST_MARKER=loaded\n");

    expect(loadEnvFile(dir)).toBe(join(dir, ".env"));
    expect(process.env.ADMISSIONS_TEST_MARKER).toBe("loaded");
  });

  it("should return null when no file exists", () => {
    const nested = mkdtempSync(join(dir, "nested-"));

    expect(loadEnvFile(nested)).toBeNull();
  });
});
