/**
 * Unit tests for the in-memory sender used in mock mode
 */

import { describe, it, expect } from "vitest";
import { createInMemorySender } from "@/clients/fake/inMemorySender";
import { HttpError } from "@/clients/http";

describe("createInMemorySender", () => {
  it("serves seeded documents and 404s unknown targets", async () => {
    const send = createInMemorySender([["/issue/A-1", { key: "A-1" }]]);

    await expect(send({ method: "GET", target: "/issue/A-1" })).resolves.toEqual({
      status: 200,
      body: { key: "A-1" },
    });
    await expect(send({ method: "GET", target: "/issue/A-2" })).rejects.toBeInstanceOf(HttpError);
    await expect(send({ method: "GET", target: "/issue/A-2" })).rejects.toMatchObject({
      status: 404,
    });
  });

  it("creates, replaces, patches and deletes documents", async () => {
    const send = createInMemorySender();

    expect((await send({ method: "PUT", target: "/issue/A-1", json: { a: 1 } })).status).toBe(201);
    expect((await send({ method: "PUT", target: "/issue/A-1", json: { a: 2 } })).status).toBe(200);

    const patched = await send({ method: "PATCH", target: "/issue/A-1", json: { b: 3 } });
    expect(patched.body).toEqual({ a: 2, b: 3 });
    expect(send.documents.get("/issue/A-1")).toEqual({ a: 2, b: 3 });

    expect((await send({ method: "DELETE", target: "/issue/A-1" })).status).toBe(204);
    expect(send.documents.has("/issue/A-1")).toBe(false);
    await expect(send({ method: "PATCH", target: "/issue/A-1", json: {} })).rejects.toMatchObject({
      status: 404,
    });
  });

  it("records every request in order", async () => {
    const send = createInMemorySender();

    await send({ method: "POST", target: "/issue", json: null });
    await send({ method: "GET", target: "/issue" });

    expect(send.requests.map((r) => `${r.method} ${r.target}`)).toEqual([
      "POST /issue",
      "GET /issue",
    ]);
  });
});
