// backend/services/shared/env.ts

/**
 * Env loading + fail-fast getters shared by every service.
 *
 * Cascade order (later wins):
 *   1) repo root           → project-wide defaults
 *   2) service family dir  → backend/services
 *   3) service root        → service-specific overrides
 * Within each layer the mode-specific file is tried first, then `.env`.
 * `${VAR}` references are expanded across files via dotenv-expand.
 *
 * Dev/docker must find at least one file. Production and test may rely on
 * injected env only.
 */

import fs from "node:fs";
import path from "node:path";
import { parse } from "dotenv";
import { expand } from "dotenv-expand";

export type EnvMode = "dev" | "docker" | "test" | "production";

const MODE_FILES: Record<EnvMode, string[]> = {
  dev: [".env.dev", ".env"],
  docker: [".env.docker", ".env"],
  test: [".env.test", ".env"],
  production: [".env"],
};

function isEnvMode(v: string): v is EnvMode {
  return Object.prototype.hasOwnProperty.call(MODE_FILES, v);
}

/** Find the first directory upward from `start` that contains any of the markers. */
function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Parse a single env file if it exists. */
function parseIfExists(absPath: string): Record<string, string> | null {
  if (!fs.existsSync(absPath)) return null;
  try {
    return parse(fs.readFileSync(absPath));
  } catch (err) {
    throw new Error(`Failed to load env file: ${absPath}: ${String(err)}`);
  }
}

/** Candidate files for a service root, in load order. */
export function envCascadeCandidates(
  serviceRootAbs: string,
  mode: EnvMode
): string[] {
  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot =
    findRootWithMarkers(serviceRoot, [".git", "package.json"]) ||
    path.resolve(serviceRoot, "..", "..", "..");

  const candidates: string[] = [];
  for (const dir of [repoRoot, serviceFamilyDir, serviceRoot]) {
    for (const name of MODE_FILES[mode]) {
      candidates.push(path.join(dir, name));
    }
  }
  return candidates;
}

/**
 * Cascading loader for a service. Returns the files actually loaded.
 */
export function loadEnvCascadeForService(serviceRootAbs: string): string[] {
  const mode = requireEnum("NODE_ENV", Object.keys(MODE_FILES));
  if (!isEnvMode(mode)) {
    throw new Error(`Unsupported NODE_ENV "${mode}"`);
  }

  const candidates = envCascadeCandidates(serviceRootAbs, mode);
  const loaded: string[] = [];
  const merged: Record<string, string> = {};
  for (const p of candidates) {
    const parsed = parseIfExists(p);
    if (!parsed) continue;
    Object.assign(merged, parsed);
    loaded.push(p);
  }

  // Injected env always beats file values; expand() leaves those alone.
  expand({ parsed: merged });

  const allowMissing = mode === "production" || mode === "test";
  if (!loaded.length && !allowMissing) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}

/** Assertions / getters */
export function assertEnv(keys: string[]): void {
  const missing = keys.filter(
    (k) => !process.env[k] || !String(process.env[k]).trim()
  );
  if (missing.length)
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
}

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

export function optionalEnv(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function requireEnum(name: string, allowed: string[]): string {
  const v = requireEnv(name);
  if (!allowed.includes(v)) {
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  }
  return v;
}

export function requireNumber(name: string): number {
  const v = requireEnv(name);
  if (!/^\d+$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}
