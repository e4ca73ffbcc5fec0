// backend/services/shared/store/IResourceStore.ts
import type { Resource } from "../contracts/resource";

/** Kind name → editable field set, e.g. `{ user: UserFields; article: ArticleFields }`. */
export type KindMap = Record<string, object>;

export type KindOf<TKinds extends KindMap> = keyof TKinds & string;

/**
 * Persistence contract the resource controllers delegate to.
 *
 * Implementations own their concurrency control: writes to the same
 * identifier must be mutually exclusive. A missing resource is reported as
 * `null` (reads/updates) or `false` (delete), never thrown.
 */
export interface IResourceStore<TKinds extends KindMap> {
  list<K extends KindOf<TKinds>>(kind: K): Promise<Array<Resource<TKinds[K]>>>;
  get<K extends KindOf<TKinds>>(
    kind: K,
    id: string
  ): Promise<Resource<TKinds[K]> | null>;
  /** Assigns a fresh identifier. */
  create<K extends KindOf<TKinds>>(
    kind: K,
    fields: TKinds[K]
  ): Promise<Resource<TKinds[K]>>;
  /** Full replace of the editable fields; the identifier is preserved. */
  update<K extends KindOf<TKinds>>(
    kind: K,
    id: string,
    fields: TKinds[K]
  ): Promise<Resource<TKinds[K]> | null>;
  delete<K extends KindOf<TKinds>>(kind: K, id: string): Promise<boolean>;
}
