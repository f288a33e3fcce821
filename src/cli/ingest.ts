/**
 * Ingest harvested page files into the vector store
 *
 * Each file is a JSON map of url → page text; the file name doubles as
 * the owner hint ("cmu_pages.json" → "cmu").
 *
 * Usage:
 *   npm run ingest -- data/pages/cmu_pages.json data/pages/mit_pages.json
 */

import { basename } from "path";
import { loadConfig, loadEnvFile } from "../config/index.js";
import { createPipelineContext, type PipelineContext } from "../context.js";
import type { IngestionReport } from "../ingestion/IngestionPipeline.js";
import { describeError } from "../errors.js";

export interface FileReport {
  path: string;
  report: IngestionReport | null;
  error?: string;
}

/**
 * Ingest files one after another. An unreadable file is reported and the
 * remaining files still run.
 */
export async function ingestFiles(
  ctx: PipelineContext,
  paths: string[],
  signal?: AbortSignal,
): Promise<FileReport[]> {
  const reports: FileReport[] = [];
  for (const path of paths) {
    try {
      const report = await ctx.ingestion.ingestFile(path, {
        signal,
        sessionId: `ingest-${basename(path)}`,
      });
      reports.push({ path, report });
    } catch (error) {
      console.error(`[Ingest] ${path}: ${describeError(error)}`);
      reports.push({ path, report: null, error: describeError(error) });
    }
  }
  return reports;
}

export function summarize(reports: FileReport[]): string {
  const lines = reports.map(({ path, report, error }) =>
    report
      ? `${path}: ${report.pagesWritten} pages, ${report.chunksWritten} chunks, ${report.skipped.length} skipped`
      : `${path}: failed (${error ?? "unknown error"})`,
  );
  return lines.join("\n");
}

async function main(): Promise<void> {
  const paths = process.argv.slice(2);
  if (paths.length === 0) {
    console.error("Usage: ingest <pages.json> [more.json ...]");
    process.exitCode = 1;
    return;
  }

  loadEnvFile();
  const config = loadConfig();
  const ctx = createPipelineContext(config);
  const signal =
    config.timeouts.ingestMs > 0 ? AbortSignal.timeout(config.timeouts.ingestMs) : undefined;

  try {
    const reports = await ingestFiles(ctx, paths, signal);
    console.log(summarize(reports));
    if (reports.some((entry) => entry.report === null)) {
      process.exitCode = 1;
    }
  } finally {
    ctx.database.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`[Ingest] ${describeError(error)}`);
    process.exit(1);
  });
}
