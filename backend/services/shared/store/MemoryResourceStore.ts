// backend/services/shared/store/MemoryResourceStore.ts

/**
 * In-process IResourceStore.
 *
 * - One Map per kind, insertion ordered (list returns creation order).
 * - Every mutation completes synchronously inside its async method, so two
 *   writes to the same id can never interleave on Node's event loop.
 * - An id is never reissued, across kinds and after deletion; the generator
 *   is re-polled if it hands back one already issued.
 * - Reads hand out copies; callers cannot mutate stored records.
 * - The stored id is always the server-assigned one, even if `fields`
 *   carries an `id` of its own.
 */

import { randomUUID } from "node:crypto";
import type { Resource } from "../contracts/resource";
import type { IResourceStore, KindMap, KindOf } from "./IResourceStore";

type Tables<TKinds extends KindMap> = {
  [K in KindOf<TKinds>]?: Map<string, Resource<TKinds[K]>>;
};

export interface MemoryResourceStoreOptions {
  /** Identifier source. Default: random UUID. */
  generateId?: () => string;
  /** Attempts before giving up on a colliding generator. Default 5. */
  maxIdAttempts?: number;
}

export class MemoryResourceStore<TKinds extends KindMap>
  implements IResourceStore<TKinds>
{
  private readonly tables: Tables<TKinds> = {};
  private readonly issued = new Set<string>();
  private readonly generateId: () => string;
  private readonly maxIdAttempts: number;

  constructor(opts: MemoryResourceStoreOptions = {}) {
    this.generateId = opts.generateId ?? (() => randomUUID());
    this.maxIdAttempts = opts.maxIdAttempts ?? 5;
  }

  public async list<K extends KindOf<TKinds>>(
    kind: K
  ): Promise<Array<Resource<TKinds[K]>>> {
    return Array.from(this.table(kind).values(), (r) => ({ ...r }));
  }

  public async get<K extends KindOf<TKinds>>(
    kind: K,
    id: string
  ): Promise<Resource<TKinds[K]> | null> {
    const found = this.table(kind).get(id);
    return found ? { ...found } : null;
  }

  public async create<K extends KindOf<TKinds>>(
    kind: K,
    fields: TKinds[K]
  ): Promise<Resource<TKinds[K]>> {
    const id = this.nextId();
    const record: Resource<TKinds[K]> = { ...fields, id };
    this.table(kind).set(id, record);
    return { ...record };
  }

  public async update<K extends KindOf<TKinds>>(
    kind: K,
    id: string,
    fields: TKinds[K]
  ): Promise<Resource<TKinds[K]> | null> {
    const table = this.table(kind);
    if (!table.has(id)) return null;
    const record: Resource<TKinds[K]> = { ...fields, id };
    table.set(id, record);
    return { ...record };
  }

  public async delete<K extends KindOf<TKinds>>(
    kind: K,
    id: string
  ): Promise<boolean> {
    return this.table(kind).delete(id);
  }

  private table<K extends KindOf<TKinds>>(
    kind: K
  ): Map<string, Resource<TKinds[K]>> {
    const existing = this.tables[kind];
    if (existing) return existing;
    const created = new Map<string, Resource<TKinds[K]>>();
    this.tables[kind] = created;
    return created;
  }

  private nextId(): string {
    for (let i = 0; i < this.maxIdAttempts; i++) {
      const id = this.generateId();
      if (id && !this.issued.has(id)) {
        this.issued.add(id);
        return id;
      }
    }
    throw new Error(
      `MemoryResourceStore: no unused id after ${this.maxIdAttempts} attempts`
    );
  }
}
