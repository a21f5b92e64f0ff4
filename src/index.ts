import { loadConfig } from "./config/environment";
import { Orchestrator } from "./engine/Orchestrator";
import { logger } from "./utils/logger";

async function main() {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const orchestrator = new Orchestrator(config);

  try {
    await orchestrator.start();
  } catch (err) {
    logger.critical("Failed to start trading core", err);
    await orchestrator.shutdown();
    process.exit(1);
  }

  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await orchestrator.shutdown();
      process.exit(0);
    } catch (err) {
      logger.error("Shutdown failed", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void stop("SIGINT"));
  process.on("SIGTERM", () => void stop("SIGTERM"));
}

main().catch((err) => {
  logger.critical("Fatal error", err);
  process.exit(1);
});
