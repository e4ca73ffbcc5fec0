// backend/services/shared/health.ts
import { Router } from "express";
import { handle } from "./http/handle";
import type { IResourceStore, KindMap, KindOf } from "./store/IResourceStore";

export interface HealthOptions<TKinds extends KindMap> {
  service: string;
  store: IResourceStore<TKinds>;
  /** Collection name → kind; readiness reports one record count per entry. */
  collections: Record<string, KindOf<TKinds>>;
}

/**
 * GET /health/live  → 200 while the process serves requests
 * GET /health/ready → 200 with record counts once the store answers, 503 if
 *                     any store read fails
 */
export function createHealthRouter<TKinds extends KindMap>(
  opts: HealthOptions<TKinds>
): Router {
  const { service, store, collections } = opts;
  const router = Router();
  const base = () => ({ service, env: process.env.NODE_ENV });

  async function counts(): Promise<Record<string, number>> {
    const entries = await Promise.all(
      Object.entries(collections).map(
        async ([name, kind]) => [name, (await store.list(kind)).length] as const
      )
    );
    return Object.fromEntries(entries);
  }

  router.get(
    "/health/live",
    handle(async () => ({ status: 200, body: { ...base(), ok: true } }))
  );

  router.get(
    "/health/ready",
    handle(async () => {
      try {
        const body = { ...base(), ok: true, counts: await counts() };
        return { status: 200, body };
      } catch (err) {
        return {
          status: 503,
          body: {
            ...base(),
            ok: false,
            error: err instanceof Error ? err.message : String(err),
          },
        };
      }
    })
  );

  return router;
}
