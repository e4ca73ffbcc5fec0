// backend/services/content/src/config.ts

/**
 * Service config:
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Required vars fail fast; only the update status has a default.
 */

import type { UpdateStatus } from "@shared/base/ResourceController";
import { optionalEnv, requireEnv, requireNumber } from "@shared/env";

export interface ContentConfig {
  env?: string;
  serviceName: string;
  port: number;
  logLevel: string;
  /** Seed JSON loaded into the store at start-up. */
  seedFile?: string;
  updateStatus: UpdateStatus;
}

function requirePort(name: string): number {
  const port = requireNumber(name);
  if (port > 65535) {
    throw new Error(`Env var ${name} must be a port (0-65535), got ${port}`);
  }
  return port;
}

function updateStatusFrom(name: string): UpdateStatus {
  const raw = optionalEnv(name);
  if (raw === undefined || raw === "200") return 200;
  if (raw === "201") return 201;
  throw new Error(`Invalid env var ${name}="${raw}". Allowed: 200, 201`);
}

export function loadConfig(): ContentConfig {
  return {
    env: process.env.NODE_ENV,
    serviceName: requireEnv("CONTENT_SERVICE_NAME"),
    port: requirePort("CONTENT_PORT"),
    logLevel: requireEnv("LOG_LEVEL"),
    seedFile: optionalEnv("CONTENT_SEED_FILE"),
    updateStatus: updateStatusFrom("CONTENT_UPDATE_STATUS"),
  };
}
