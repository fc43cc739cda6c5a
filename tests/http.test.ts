import { describe, expect, it } from "vitest";
import { fetchJson } from "../src/adapters/http.js";
import { NetworkError } from "../src/errors.js";
import { fakeFetch, jsonResponse } from "./helpers.js";

describe("fetchJson", () => {
  it("returns the parsed body and sends JSON headers", async () => {
    const { fetch, calls } = fakeFetch(() => jsonResponse({ ok: true }));

    expect(await fetchJson("https://example.test/a", { source: "kev", fetch })).toEqual({ ok: true });
    const headers = new Headers(calls[0].init?.headers);
    expect(headers.get("Accept")).toBe("application/json");
    expect(headers.get("User-Agent")).toBe("vuln-risk/0.1.0");
    expect(calls[0].init?.method).toBe("GET");
  });

  it("turns a non-2xx status into a NetworkError carrying the status", async () => {
    const { fetch } = fakeFetch(() => jsonResponse({}, 404));

    const error = await fetchJson("https://example.test/a", { source: "epss", fetch }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ source: "epss", status: 404, message: "epss request failed: HTTP 404" });
  });

  it("treats an unparseable body as a network failure", async () => {
    const { fetch } = fakeFetch(() => new Response("<html>maintenance</html>", { status: 200 }));

    await expect(fetchJson("https://example.test/a", { source: "epss", fetch })).rejects.toThrow(
      new NetworkError("epss", "epss returned a malformed response"),
    );
  });

  it("wraps transport errors", async () => {
    const { fetch } = fakeFetch(() => {
      throw new TypeError("fetch failed");
    });

    await expect(fetchJson("https://example.test/a", { source: "kev", fetch })).rejects.toThrow(
      "kev request failed: fetch failed",
    );
  });

  it("times out a hanging request", async () => {
    const hanging = (_url: string, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });

    await expect(
      fetchJson("https://example.test/a", { source: "exploit", fetch: hanging, timeoutMs: 20 }),
    ).rejects.toThrow("exploit request failed: timed out after 20ms");
  });

  it("reports a caller cancellation as such", async () => {
    const controller = new AbortController();
    controller.abort();
    const { fetch } = fakeFetch((_url, init) => {
      if (init?.signal?.aborted) throw new Error("aborted");
      return jsonResponse({});
    });

    await expect(
      fetchJson("https://example.test/a", { source: "ghsa", fetch, signal: controller.signal }),
    ).rejects.toThrow("ghsa request failed: request cancelled");
  });
});
