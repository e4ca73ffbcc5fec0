// backend/services/content/src/bootstrap.ts

/**
 * Load envs via the shared cascade (repo → family → service) and assert the
 * minimum required variables. Must be imported before anything that logs.
 */

import path from "node:path";
import { assertEnv, loadEnvCascadeForService, requireEnv } from "@shared/env";

// 1) Shared env cascade (later wins)
loadEnvCascadeForService(path.resolve(__dirname, ".."));

// 2) Fail fast on required envs
assertEnv(["LOG_LEVEL", "CONTENT_SERVICE_NAME", "CONTENT_PORT"]);

// 3) Logger base binding
process.env.SERVICE_NAME = requireEnv("CONTENT_SERVICE_NAME");
