import type { Server } from "http";
import { getConfig } from "./infrastructure/config/app.config";
import { InMemorySessionRepository } from "./infrastructure/session/in.memory.session.repository";
import { OpenAIExtractionProvider } from "./infrastructure/openai/openai.extraction.provider";
import { SessionCleanupCron } from "./infrastructure/cron/session-cleanup.cron";
import { createApp } from "./app";

let server: Server | null = null;
let sessionCleanupCron: SessionCleanupCron | null = null;

function main(): void {
  try {
    const config = getConfig();

    // Initialize infrastructure
    const sessionRepository = new InMemorySessionRepository();
    const extractionProvider = new OpenAIExtractionProvider(config.ai.baseUrl);

    const app = createApp({ config, sessionRepository, extractionProvider });

    // End idle sessions periodically
    sessionCleanupCron = new SessionCleanupCron(sessionRepository, config.session.idleTimeoutMinutes);
    sessionCleanupCron.start();

    // Start server
    server = app.listen(config.port, () => {
      console.log(`Just Draft running on port ${config.port}`);
      console.log(`Health check: http://localhost:${config.port}/health`);
      console.log(`Candidate models: ${config.ai.candidateModels.join(", ")}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

// Handle graceful shutdown
function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down gracefully`);
  sessionCleanupCron?.stop();
  if (!server) {
    process.exit(0);
  }
  server.close(() => process.exit(0));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

main();
