/**
 * Unit tests for the fetch sender (fetch stubbed, no network)
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { HttpError, buildUrl, createFetchSender } from "@/clients/http";

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("buildUrl", () => {
  it("joins base and target and repeats array query params", () => {
    expect(
      buildUrl("https://api.example.test/rest/", "/issue/A-1", {
        fields: ["summary", "status"],
        expand: "names",
      }),
    ).toBe("https://api.example.test/rest/issue/A-1?fields=summary&fields=status&expand=names");
  });

  it("adds a missing leading slash to the target", () => {
    expect(buildUrl("https://api.example.test", "search", { maxResults: 50 })).toBe(
      "https://api.example.test/search?maxResults=50",
    );
  });
});

describe("createFetchSender", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends JSON bodies with default, content and idempotency headers", async () => {
    const fetchMock = stubFetch(
      new Response(JSON.stringify({ id: "10001" }), {
        status: 201,
        headers: { "content-type": "application/json" },
      }),
    );
    const send = createFetchSender({
      baseUrl: "https://api.example.test",
      headers: { Authorization: "Bearer test-secret" },
    });

    const response = await send({
      method: "POST",
      target: "/issue",
      json: { summary: "Test issue" },
      idempotencyKey: "create-A-1",
    });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({ id: "10001" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.example.test/issue");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ summary: "Test issue" }));
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Content-Type": "application/json",
      Accept: "application/json",
      "Idempotency-Key": "create-A-1",
    });
  });

  it("throws HttpError with a body snippet on non-2xx", async () => {
    stubFetch(new Response("Issue does not exist", { status: 404, statusText: "Not Found" }));
    const send = createFetchSender({ baseUrl: "https://api.example.test" });

    const attempt = send({ method: "GET", target: "/issue/A-9" });

    await expect(attempt).rejects.toBeInstanceOf(HttpError);
    await expect(attempt).rejects.toMatchObject({
      status: 404,
      url: "https://api.example.test/issue/A-9",
      bodySnippet: "Issue does not exist",
    });
  });

  it("returns an undefined body for 204", async () => {
    stubFetch(new Response(null, { status: 204 }));
    const send = createFetchSender({ baseUrl: "https://api.example.test" });

    const response = await send({ method: "DELETE", target: "/issue/A-1" });

    expect(response).toMatchObject({ status: 204, body: undefined });
  });

  it("returns text bodies as strings", async () => {
    stubFetch(new Response("pong", { status: 200, headers: { "content-type": "text/plain" } }));
    const send = createFetchSender({ baseUrl: "https://api.example.test" });

    const response = await send({ method: "GET", target: "/ping" });

    expect(response.body).toBe("pong");
  });
});
