import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { FetchTransport } from "./fetch-transport.js";

describe("FetchTransport", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return status, headers and raw body", async () => {
    fetchMock.mockResolvedValue(
      new Response('{"ok":true}', { status: 404, headers: { "Content-Type": "application/json" } })
    );
    const transport = new FetchTransport();

    const response = await transport.get("https://example.test/search?q=x");

    expect(response.status).toBe(404);
    expect(response.headers["content-type"]).toBe("application/json");
    expect(response.body.toString("utf-8")).toBe('{"ok":true}');
  });

  it("should drop content-encoding since fetch decodes the body itself", async () => {
    fetchMock.mockResolvedValue(
      new Response("{}", { status: 200, headers: { "Content-Encoding": "gzip" } })
    );
    const transport = new FetchTransport();

    const response = await transport.get("https://example.test/");

    expect(response.headers).not.toHaveProperty("content-encoding");
  });

  it("should merge default headers under per-request headers", async () => {
    fetchMock.mockResolvedValue(new Response("{}"));
    const transport = new FetchTransport({
      defaultHeaders: { "User-Agent": "web-search-test", Accept: "*/*" },
    });

    await transport.get("https://example.test/", { Accept: "application/json", Authorization: "Basic dGVzdA==" });

    expect(fetchMock).toHaveBeenCalledWith("https://example.test/", {
      method: "GET",
      headers: {
        "User-Agent": "web-search-test",
        Accept: "application/json",
        Authorization: "Basic dGVzdA==",
      },
      signal: undefined,
    });
  });

  it("should pass an abort signal when a timeout is set", async () => {
    fetchMock.mockResolvedValue(new Response("{}"));
    const transport = new FetchTransport({ timeoutMs: 5000 });

    await transport.get("https://example.test/");

    const init: unknown = fetchMock.mock.calls[0][1];
    expect(init).toMatchObject({ signal: expect.any(AbortSignal) });
  });

  it("should propagate network errors", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const transport = new FetchTransport();

    await expect(transport.get("https://example.test/")).rejects.toThrow("fetch failed");
  });
});
