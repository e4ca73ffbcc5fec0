// backend/services/shared/test/validator.spec.ts
import { describe, it, expect } from "vitest";
import { z } from "zod";
import { flag, isRuleTag, text } from "../validation/rules";
import { Validator } from "../validation/Validator";

const person = z.object({
  name: text({ min: 5, max: 100 }),
  email: text({ email: true }),
});

const post = z.object({
  title: text({ max: 10 }),
  parentId: text({ uuid: true }),
  published: flag(),
});

const err = (field: string, rule: string) => ({
  status: 422,
  source: { pointer: `/data/attributes/${field}` },
  title: "Invalid Attribute",
  detail: `${rule} validation failed for field: ${field}`,
});

describe("Validator", () => {
  const v = new Validator();

  it("reports every failing field, one error each", () => {
    const out = v.validate(person, { name: "Jo", email: "not-an-email" });
    expect(out).toEqual({
      ok: false,
      malformed: false,
      errors: [err("name", "min"), err("email", "email")],
    });
  });

  it("treats missing, null and empty string as required", () => {
    const out = v.validate(person, { name: null, email: "" });
    expect(out).toEqual({
      ok: false,
      malformed: false,
      errors: [err("name", "required"), err("email", "required")],
    });
    expect(v.validate(person, {})).toEqual({
      ok: false,
      malformed: false,
      errors: [err("name", "required"), err("email", "required")],
    });
  });

  it("reports the type rule for non-string text and non-boolean flags", () => {
    const out = v.validate(post, {
      title: 42,
      parentId: "2f1a7c1e-3b4d-4e5f-8a6b-7c8d9e0f1a2b",
      published: "yes",
    });
    expect(out).toEqual({
      ok: false,
      malformed: false,
      errors: [err("title", "string"), err("published", "boolean")],
    });
  });

  it("checks max and uuid", () => {
    const out = v.validate(post, { title: "x".repeat(11), parentId: "abc" });
    expect(out).toEqual({
      ok: false,
      malformed: false,
      errors: [err("title", "max"), err("parentId", "uuid")],
    });
  });

  it("strips unknown keys and applies defaults", () => {
    const out = v.validate(post, {
      id: "client-id",
      title: "Hello",
      parentId: "2f1a7c1e-3b4d-4e5f-8a6b-7c8d9e0f1a2b",
      extra: true,
    });
    expect(out).toEqual({
      ok: true,
      value: {
        title: "Hello",
        parentId: "2f1a7c1e-3b4d-4e5f-8a6b-7c8d9e0f1a2b",
        published: false,
      },
    });
  });

  it("flags absent and non-object payloads as malformed", () => {
    expect(v.validate(person, undefined)).toEqual({
      ok: false,
      malformed: true,
      detail: "Request body is required",
    });
    for (const payload of [null, [], "text", 7]) {
      expect(v.validate(person, payload)).toEqual({
        ok: false,
        malformed: true,
        detail: "Request body must be a JSON object",
      });
    }
  });

  it("honours a custom pointer prefix", () => {
    const custom = new Validator({ pointerPrefix: "/attrs/" });
    expect(custom.fieldError("name", "exists")).toEqual({
      status: 422,
      source: { pointer: "/attrs/name" },
      title: "Invalid Attribute",
      detail: "exists validation failed for field: name",
    });
  });
});

describe("rule tags", () => {
  it("recognises known tags only", () => {
    expect(isRuleTag("email")).toBe(true);
    expect(isRuleTag("exists")).toBe(true);
    expect(isRuleTag("Invalid email")).toBe(false);
  });
});
