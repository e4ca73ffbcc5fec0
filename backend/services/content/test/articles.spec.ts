// backend/services/content/test/articles.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { buildTestApp, invalid, notFoundBody } from "./helpers/app";

const draft = { title: "Release notes", author: "Avery Stone" };

describe("articles", () => {
  it("defaults published to false", async () => {
    const { app } = buildTestApp();
    const res = await request(app).post("/articles").send(draft);
    expect(res.status).toBe(201);
    expect(res.body.article).toEqual({
      id: res.body.article.id,
      title: "Release notes",
      author: "Avery Stone",
      published: false,
    });
  });

  it("checks title length, author presence and the published type", async () => {
    const { app } = buildTestApp();
    const res = await request(app)
      .post("/articles")
      .send({ title: "t".repeat(201), published: "yes" });
    expect(res.status).toBe(422);
    expect(res.body.errors).toEqual([
      invalid("title", "max"),
      invalid("author", "required"),
      invalid("published", "boolean"),
    ]);
  });

  it("deletes and then 404s", async () => {
    const { app } = buildTestApp();
    const created = await request(app).post("/articles").send(draft);
    const id: string = created.body.article.id;

    expect((await request(app).delete(`/articles/${id}`)).status).toBe(204);
    const gone = await request(app).get(`/articles/${id}`);
    expect(gone.status).toBe(404);
    expect(gone.body).toEqual(notFoundBody());
  });

  it("lists in creation order", async () => {
    const { app } = buildTestApp();
    await request(app).post("/articles").send({ ...draft, title: "First" });
    await request(app)
      .post("/articles")
      .send({ ...draft, title: "Second", published: true });
    const res = await request(app).get("/articles");
    expect(res.status).toBe(200);
    expect(
      res.body.articles.map((a: { title: string; published: boolean }) => [
        a.title,
        a.published,
      ])
    ).toEqual([
      ["First", false],
      ["Second", true],
    ]);
  });

  it("answers updates with the configured status", async () => {
    const { app } = buildTestApp({ updateStatus: 201 });
    const created = await request(app).post("/articles").send(draft);
    const id: string = created.body.article.id;

    const res = await request(app)
      .put(`/articles/${id}`)
      .send({ ...draft, published: true });
    expect(res.status).toBe(201);
    expect(res.body.article).toEqual({ id, ...draft, published: true });
  });
});
