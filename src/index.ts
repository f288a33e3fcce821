/**
 * Admissions RAG Server Entry Point
 */

import express from "express";
import { createServer } from "http";
import { loadConfig, loadEnvFile, type ServerConfig } from "./config/index.js";
import { createPipelineContext } from "./context.js";
import { createRouter } from "./api/routes.js";
import { ConfigurationError } from "./errors.js";

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[Server] Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  loadEnvFile();
  const config = readConfig();
  const ctx = createPipelineContext(config);
  const app = express();
  const server = createServer(app);

  app.use(express.json({ limit: "20mb" }));

  // CORS for development
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header(
      "Access-Control-Allow-Headers",
      "Origin, X-Requested-With, Content-Type, Accept",
    );
    next();
  });

  app.use(createRouter(ctx));

  server.listen(config.port, () => {
    console.log(`[Server] Listening on port ${config.port}`);
    console.log(`[Server] Environment: ${config.nodeEnv}`);
    console.log(`[Server] Database: ${config.storage.databasePath}`);
    console.log(
      `[Server] Rerank: ${config.rerank.enabled ? `✓ ${config.rerank.url}` : "✗"}`,
    );
    console.log(`[Server] Health: http://localhost:${config.port}/health\n`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] ${signal} received, shutting down gracefully...`);
    server.close(() => {
      ctx.database.close();
      console.log("[Server] HTTP server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main();
