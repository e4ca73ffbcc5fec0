// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, { type LevelWithSilent, type LoggerOptions } from "pino";

// ─────────────────────────── Env (fail fast for required) ─────────────────────
const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function requireLevel(name: string): LevelWithSilent {
  const v = process.env[name]?.trim();
  if (!v) throw new Error(`Missing required env var: ${name}`);
  if (!isLevel(v)) throw new Error(`Invalid ${name}: "${v}"`);
  return v;
}

const LOG_LEVEL = requireLevel("LOG_LEVEL");
const SERVICE_NAME = process.env.SERVICE_NAME?.trim();

// ────────────────────────────── Pino (stdout only) ────────────────────────────
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.headers['x-api-key']",
      "res.headers['set-cookie']",
    ],
  },
};
export const logger = pino(pinoOptions);

// ───────────────────────────── Request context helper ─────────────────────────
export interface LogContext {
  requestId: string | null;
  path: string;
  method: string;
  entityId?: string;
  ip?: string;
}

export function extractLogContext(req: Request): LogContext {
  const hdr = req.headers["x-request-id"];
  const hdrId = Array.isArray(hdr) ? hdr[0] : hdr;
  const reqId = req.id === undefined ? undefined : String(req.id);
  return {
    requestId: reqId || hdrId || null,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    ip: req.ip,
  };
}
