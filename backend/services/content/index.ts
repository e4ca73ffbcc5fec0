// backend/services/content/index.ts

/**
 * Start-up: load env (bootstrap), build the store and controllers, seed if
 * configured, then start HTTP with the shared startHttpService.
 */

import "./src/bootstrap"; // loads env + sets SERVICE_NAME

import { startHttpService } from "@shared/bootstrap/startHttpService";
import { MemoryResourceStore } from "@shared/store/MemoryResourceStore";
import { logger } from "@shared/utils/logger";
import { Validator } from "@shared/validation/Validator";
import { createApp } from "./src/app";
import { loadConfig } from "./src/config";
import { createControllers } from "./src/controllers/createControllers";
import type { ContentKinds } from "./src/kinds";
import { loadSeedFile, seedStore } from "./src/seed";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled Promise Rejection");
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, "Uncaught Exception");
});

async function start() {
  const config = loadConfig();
  const store = new MemoryResourceStore<ContentKinds>();
  const validator = new Validator();

  if (config.seedFile) {
    const counts = await seedStore(
      { store, validator },
      await loadSeedFile(config.seedFile)
    );
    logger.info({ file: config.seedFile, ...counts }, "store seeded");
  }

  const controllers = createControllers({
    store,
    validator,
    updateStatus: config.updateStatus,
  });
  const app = createApp({
    serviceName: config.serviceName,
    controllers,
    store,
  });

  await startHttpService({
    app,
    port: config.port,
    serviceName: config.serviceName,
    logger,
  });
}

start().catch((err: unknown) => {
  logger.error({ err }, "failed to start content service");
  process.exit(1);
});
