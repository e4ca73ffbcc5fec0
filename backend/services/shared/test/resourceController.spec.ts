// backend/services/shared/test/resourceController.spec.ts
import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ResourceController } from "../base/ResourceController";
import type { ValidationErrorDetail } from "../contracts/resource";
import { JSON_API, PROBLEM_JSON } from "../http/errors";
import type { IResourceStore } from "../store/IResourceStore";
import { MemoryResourceStore } from "../store/MemoryResourceStore";
import { text } from "../validation/rules";
import { Validator } from "../validation/Validator";

type Kinds = { note: { text: string } };

const noteFields = z.object({ text: text({ max: 10 }) });
const ID = "2f1a7c1e-3b4d-4e5f-8a6b-7c8d9e0f1a2b";
const UNKNOWN = "9b2e4f60-1c3d-4a5b-9c6d-0e1f2a3b4c5d";

function build(
  opts: { store?: IResourceStore<Kinds>; updateStatus?: 200 | 201 } = {}
) {
  const store =
    opts.store ??
    new MemoryResourceStore<Kinds>({ generateId: () => ID });
  const ctl = new ResourceController<Kinds, "note">({
    kind: "note",
    plural: "notes",
    schema: noteFields,
    store,
    validator: new Validator(),
    updateStatus: opts.updateStatus,
  });
  return { ctl, store };
}

describe("ResourceController", () => {
  it("lists under the plural key", async () => {
    const { ctl } = build();
    expect(await ctl.list()).toEqual({ status: 200, body: { notes: [] } });
    await ctl.create({ text: "hi" });
    expect(await ctl.list()).toEqual({
      status: 200,
      body: { notes: [{ id: ID, text: "hi" }] },
    });
  });

  it("creates under the singular key", async () => {
    const { ctl } = build();
    expect(await ctl.create({ text: "hi" })).toEqual({
      status: 201,
      body: { note: { id: ID, text: "hi" } },
    });
    expect(await ctl.get(ID)).toEqual({
      status: 200,
      body: { note: { id: ID, text: "hi" } },
    });
  });

  it("rejects invalid fields with 422 and writes nothing", async () => {
    const { ctl, store } = build();
    expect(await ctl.create({ text: "far too long here" })).toEqual({
      status: 422,
      contentType: JSON_API,
      body: {
        errors: [
          {
            status: 422,
            source: { pointer: "/data/attributes/text" },
            title: "Invalid Attribute",
            detail: "max validation failed for field: text",
          },
        ],
      },
    });
    expect(await store.list("note")).toEqual([]);
  });

  it("rejects a missing body with 400", async () => {
    const { ctl } = build();
    expect(await ctl.create(undefined)).toEqual({
      status: 400,
      contentType: PROBLEM_JSON,
      body: {
        type: "about:blank",
        title: "Bad Request",
        status: 400,
        code: "BAD_REQUEST",
        detail: "Request body is required",
      },
    });
  });

  it("404s malformed ids before looking at the body", async () => {
    const { ctl } = build();
    for (const result of [
      await ctl.get("not-a-uuid"),
      await ctl.update("not-a-uuid", undefined),
      await ctl.remove("not-a-uuid"),
    ]) {
      expect(result.status).toBe(404);
      expect(result.contentType).toBe(PROBLEM_JSON);
    }
  });

  it("validates before checking existence on update", async () => {
    const { ctl } = build();
    expect((await ctl.update(UNKNOWN, undefined)).status).toBe(400);
    expect((await ctl.update(UNKNOWN, { text: "" })).status).toBe(422);
    expect((await ctl.update(UNKNOWN, { text: "ok" })).status).toBe(404);
  });

  it("replaces fields and uses the configured update status", async () => {
    const { ctl } = build({ updateStatus: 201 });
    await ctl.create({ text: "old" });
    expect(await ctl.update(ID, { text: "new", id: "ignored" })).toEqual({
      status: 201,
      body: { note: { id: ID, text: "new" } },
    });
  });

  it("deletes with 204 and no body, then 404s", async () => {
    const { ctl } = build();
    await ctl.create({ text: "bye" });
    expect(await ctl.remove(ID)).toEqual({ status: 204 });
    expect((await ctl.get(ID)).status).toBe(404);
    expect((await ctl.remove(ID)).status).toBe(404);
  });

  it("lets store failures propagate", async () => {
    class BrokenStore extends MemoryResourceStore<Kinds> {
      public async list(): Promise<never> {
        throw new Error("disk on fire");
      }
    }
    const { ctl } = build({ store: new BrokenStore() });
    await expect(ctl.list()).rejects.toThrow("disk on fire");
  });

  it("merges reference errors into a 422", async () => {
    class Guarded extends ResourceController<Kinds, "note"> {
      protected async checkReferences(value: {
        text: string;
      }): Promise<ValidationErrorDetail[]> {
        return value.text === "taken"
          ? [this.validator.fieldError("text", "exists")]
          : [];
      }
    }
    const ctl = new Guarded({
      kind: "note",
      plural: "notes",
      schema: noteFields,
      store: new MemoryResourceStore<Kinds>(),
      validator: new Validator(),
    });
    expect(await ctl.create({ text: "taken" })).toEqual({
      status: 422,
      contentType: JSON_API,
      body: {
        errors: [
          {
            status: 422,
            source: { pointer: "/data/attributes/text" },
            title: "Invalid Attribute",
            detail: "exists validation failed for field: text",
          },
        ],
      },
    });
    expect((await ctl.create({ text: "free" })).status).toBe(201);
  });
});
