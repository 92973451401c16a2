import { describe, it, expect, vi } from "vitest";
import { HttpResourceSource } from "./http-resource-source.js";
import { TransientError, ValidationError } from "../errors.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const request = { resourceType: "seo_data" as const, key: "example.com", parameters: { depth: 2 } };
const signal = new AbortController().signal;

describe("HttpResourceSource", () => {
  it("posts a get_resource query and returns the data", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ status: "success", data: { domain_rating: 45 } }));
    const source = new HttpResourceSource({ url: "http://primary.test/", token: "test-secret", fetch: fetchMock });

    await expect(source.fetch(request, signal)).resolves.toEqual({ domain_rating: 45 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://primary.test/query");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    const body = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      method: "get_resource",
      resource_type: "seo_data",
      resource_id: "example.com",
      parameters: { depth: 2 },
    });
    expect(typeof body.request_id).toBe("string");
  });

  it("wraps list data in an items field", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ status: "success", data: [{ a: 1 }, { a: 2 }] }));
    const source = new HttpResourceSource({ url: "http://primary.test", fetch: fetchMock });
    await expect(source.fetch(request, signal)).resolves.toEqual({ items: [{ a: 1 }, { a: 2 }] });
  });

  it("treats not_found and invalid_request as permanent", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ status: "error", error_code: "not_found", error_message: "missing" }));
    const source = new HttpResourceSource({ url: "http://primary.test", fetch: fetchMock });

    const error = await source.fetch(request, signal).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty("message", "Primary source error (not_found): missing");
  });

  it("treats other protocol errors as transient", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ status: "error", error_code: "backend_down", error_message: "try later" }));
    const source = new HttpResourceSource({ url: "http://primary.test", fetch: fetchMock });
    await expect(source.fetch(request, signal)).rejects.toBeInstanceOf(TransientError);
  });

  it("classifies HTTP status codes", async () => {
    const busy = new HttpResourceSource({
      url: "http://primary.test",
      fetch: vi.fn<typeof fetch>(async () => new Response("busy", { status: 503 })),
    });
    const error = await busy.fetch(request, signal).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({ status: 503, message: "Primary source responded 503: busy" });

    const missing = new HttpResourceSource({
      url: "http://primary.test",
      fetch: vi.fn<typeof fetch>(async () => new Response("", { status: 404 })),
    });
    await expect(missing.fetch(request, signal)).rejects.toThrow(ValidationError);
  });

  it("reports a network failure as transient", async () => {
    const source = new HttpResourceSource({
      url: "http://primary.test",
      fetch: vi.fn<typeof fetch>(async () => { throw new TypeError("fetch failed"); }),
    });
    await expect(source.fetch(request, signal)).rejects.toThrow("Primary source unreachable: fetch failed");
  });

  it("rejects bodies that do not follow the protocol", async () => {
    const source = new HttpResourceSource({
      url: "http://primary.test",
      fetch: vi.fn<typeof fetch>(async () => jsonResponse({ hello: "world" })),
    });
    await expect(source.fetch(request, signal)).rejects.toBeInstanceOf(TransientError);
  });

  it("searches and pings", async () => {
    const fetchMock = vi.fn<typeof fetch>(async (input) =>
      String(input).endsWith("/health")
        ? new Response("ok", { status: 200 })
        : jsonResponse({ status: "success", data: [{ domain: "example.com" }] }));
    const source = new HttpResourceSource({ url: "http://primary.test", fetch: fetchMock });

    await expect(source.search("seo_data", "example", {}, signal)).resolves.toEqual([{ domain: "example.com" }]);
    await expect(source.ping(signal)).resolves.toBe(true);
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toMatchObject({
      method: "search_resources",
      parameters: { query: "example" },
    });
  });
});
