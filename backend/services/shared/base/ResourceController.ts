// backend/services/shared/base/ResourceController.ts

/**
 * Generic CRUD controller for one resource kind.
 *
 * Transport-agnostic: every operation takes plain values (id, parsed body)
 * and returns a HandlerResult; the router adapter writes it to the wire.
 *
 * Update order of checks:
 *   1) id shape          → 404
 *   2) body not object   → 400
 *   3) field rules       → 422 (all failing fields)
 *   4) reference checks  → 422
 *   5) id not in store   → 404
 *
 * Store failures are not caught here; they reach errorProblemJson as 500s.
 */

import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";
import { zResourceId } from "../contracts/common";
import type {
  Resource,
  ValidationErrorDetail,
} from "../contracts/resource";
import {
  badRequest,
  notFound,
  validationFailed,
  type HandlerResult,
} from "../http/errors";
import type { IResourceStore, KindMap, KindOf } from "../store/IResourceStore";
import { logger } from "../utils/logger";
import type { Validator } from "../validation/Validator";

export type UpdateStatus = 200 | 201;

export interface ResourceControllerOptions<
  TKinds extends KindMap,
  K extends KindOf<TKinds>
> {
  kind: K;
  /** Collection key for list responses, e.g. "users". */
  plural: string;
  schema: ZodType<TKinds[K], ZodTypeDef, unknown>;
  store: IResourceStore<TKinds>;
  validator: Validator;
  /** Status for a successful update. Default 200. */
  updateStatus?: UpdateStatus;
  log?: Logger;
}

/** What a router needs from a controller. */
export interface ResourceHandlers {
  list(): Promise<HandlerResult>;
  get(id: string): Promise<HandlerResult>;
  create(body: unknown): Promise<HandlerResult>;
  update(id: string, body: unknown): Promise<HandlerResult>;
  remove(id: string): Promise<HandlerResult>;
}

/**
 * Canonical (lower-case) form of a well-formed id, or `null` when the string
 * is not a UUID. Ids differing only in hex case name the same resource.
 */
export function normalizeId(id: string): string | null {
  return zResourceId.safeParse(id).success ? id.toLowerCase() : null;
}

export class ResourceController<
  TKinds extends KindMap,
  K extends KindOf<TKinds>
> implements ResourceHandlers
{
  protected readonly kind: K;
  protected readonly plural: string;
  protected readonly schema: ZodType<TKinds[K], ZodTypeDef, unknown>;
  protected readonly store: IResourceStore<TKinds>;
  protected readonly validator: Validator;
  protected readonly updateStatus: UpdateStatus;
  protected readonly log: Logger;

  constructor(opts: ResourceControllerOptions<TKinds, K>) {
    this.kind = opts.kind;
    this.plural = opts.plural;
    this.schema = opts.schema;
    this.store = opts.store;
    this.validator = opts.validator;
    this.updateStatus = opts.updateStatus ?? 200;
    this.log = opts.log ?? logger.child({ kind: opts.kind });
  }

  public async list(): Promise<HandlerResult> {
    const items = await this.store.list(this.kind);
    return this.many(items);
  }

  public async get(rawId: string): Promise<HandlerResult> {
    const id = normalizeId(rawId);
    if (!id) return notFound();
    const found = await this.store.get(this.kind, id);
    return found ? this.one(200, found) : notFound();
  }

  public async create(body: unknown): Promise<HandlerResult> {
    const checked = await this.check(body);
    if (!checked.ok) return checked.result;

    const created = await this.store.create(this.kind, checked.value);
    this.log.debug({ id: created.id }, "resource created");
    return this.one(201, created);
  }

  public async update(rawId: string, body: unknown): Promise<HandlerResult> {
    const id = normalizeId(rawId);
    if (!id) return notFound();

    const checked = await this.check(body);
    if (!checked.ok) return checked.result;

    const updated = await this.store.update(this.kind, id, checked.value);
    if (!updated) return notFound();
    this.log.debug({ id }, "resource updated");
    return this.one(this.updateStatus, updated);
  }

  public async remove(rawId: string): Promise<HandlerResult> {
    const id = normalizeId(rawId);
    if (!id) return notFound();
    const removed = await this.store.delete(this.kind, id);
    if (!removed) return notFound();
    this.log.debug({ id }, "resource deleted");
    return { status: 204 };
  }

  /** `{ "<kind>": resource }` */
  protected one(status: number, resource: Resource<TKinds[K]>): HandlerResult {
    return { status, body: { [this.kind]: resource } };
  }

  /** `{ "<plural>": [...] }` */
  protected many(resources: Array<Resource<TKinds[K]>>): HandlerResult {
    return { status: 200, body: { [this.plural]: resources } };
  }

  /**
   * Cross-resource checks that need the store (e.g. a referenced parent
   * exists). Runs only once the field rules pass.
   */
  protected async checkReferences(
    _value: TKinds[K]
  ): Promise<ValidationErrorDetail[]> {
    return [];
  }

  private async check(
    body: unknown
  ): Promise<
    { ok: true; value: TKinds[K] } | { ok: false; result: HandlerResult }
  > {
    const outcome = this.validator.validate(this.schema, body);
    if (!outcome.ok) {
      return {
        ok: false,
        result: outcome.malformed
          ? badRequest(outcome.detail)
          : validationFailed(outcome.errors),
      };
    }

    const refErrors = await this.checkReferences(outcome.value);
    if (refErrors.length) {
      return { ok: false, result: validationFailed(refErrors) };
    }
    return { ok: true, value: outcome.value };
  }
}
