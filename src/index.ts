// Load environment variables FIRST, before any other imports
import "./config/env.js";

import http from "http";
import { createApp } from "./app.js";
import { loadSettings } from "./config/settings.js";
import { connectToDatabase, disconnectFromDatabase } from "./db/connection.js";
import { createPipeline } from "./pipeline.js";
import logger from "./utils/logger.js";

/* ────────────────────────────────────  Start-up  ───────────── */
async function main(): Promise<void> {
  const settings = loadSettings();
  if (!settings.apiToken) {
    logger.warn("API_TOKEN is not set; protected routes will answer 503");
  }

  if (settings.mongoUrl) {
    await connectToDatabase(settings.mongoUrl);
  } else {
    logger.info("MONGODB_URL not set; processing logs are not persisted");
  }

  const pipeline = createPipeline(settings);
  const server = http.createServer(createApp(pipeline, settings));

  /* ────────────────────────────────────  Shutdown  ───────────── */
  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, "Shutting down");

    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await pipeline.shutdown();
    if (settings.mongoUrl) await disconnectFromDatabase();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "Shutdown failed");
          process.exit(1);
        });
    });
  }

  server.listen(settings.port, () =>
    logger.info(
      { provider: settings.models.provider, embeddingModel: settings.models.embeddingModel },
      `Server running on http://localhost:${settings.port}`
    )
  );
}

main().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
