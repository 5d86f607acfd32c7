import { serve } from "@hono/node-server";
import { createApp } from "./server.ts";
import { loadConfig } from "./config/index.ts";
import { createGitHubManager } from "./github/index.ts";
import { createContentGenerator } from "./generator/index.ts";
import { createCallbackNotifier } from "./callback/index.ts";
import { createPipeline } from "./pipeline/index.ts";
import { createChildLogger, logger } from "./lib/logger.ts";

const log = createChildLogger("main");

async function main() {
  const config = loadConfig();

  const pipeline = createPipeline({
    github: createGitHubManager(config.github),
    generator: createContentGenerator(config.anthropic),
    callback: createCallbackNotifier(config.callback),
  });

  const app = createApp({
    tasks: { pipeline, secret: config.security.submissionSecret },
  });

  if (config.security.submissionSecret) {
    log.info("Shared secret check enabled");
  }

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    log.info(
      { model: config.anthropic.model, owner: config.github.owner || null },
      `Server running on http://localhost:${info.port}`,
    );
  });

  const shutdown = () => {
    log.info("Shutting down...");
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
});
