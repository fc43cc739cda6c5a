import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { CacheStore, decodeWith } from "../src/cache/store.js";
import { Inflight } from "../src/cache/inflight.js";
import { NetworkError, UpstreamSchemaError } from "../src/errors.js";
import { ageFile, makeTempDir, removeDir } from "./helpers.js";

let dir: string;

const store = (options: { dir?: string; ttlMs?: number } = {}) =>
  new CacheStore({ dir: options.dir ?? dir, file: "numbers.json", ttlMs: options.ttlMs, decode: decodeWith(z.number()) });

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

describe("CacheStore", () => {
  it("reads back what was put, across instances", async () => {
    await store().put("a", 1);

    expect(await store().get("a")).toEqual({ found: true, value: 1 });
    expect(await store().get("b")).toEqual({ found: false });
  });

  it("writes value and fetchedAt per key", async () => {
    await store().putMany([["a", 1], ["b", 2]]);

    const body = JSON.parse(await readFile(join(dir, "numbers.json"), "utf-8"));
    expect(Object.keys(body)).toEqual(["a", "b"]);
    expect(body.a.value).toBe(1);
    expect(typeof body.a.fetchedAt).toBe("string");
  });

  it("reports an expired file as not found with a stale value", async () => {
    await store().put("a", 1);
    await ageFile(join(dir, "numbers.json"), 25);

    expect(await store().get("a")).toEqual({ found: false, stale: 1 });
  });

  it("honours a custom TTL", async () => {
    await store().put("a", 1);
    await ageFile(join(dir, "numbers.json"), 2);

    expect(await store({ ttlMs: 60 * 60 * 1000 }).get("a")).toEqual({ found: false, stale: 1 });
    expect(await store({ ttlMs: 3 * 60 * 60 * 1000 }).get("a")).toEqual({ found: true, value: 1 });
  });

  it("does not call fetch on a fresh hit", async () => {
    await store().put("a", 1);
    const fetch = vi.fn(async () => 2);

    expect(await store().resolve("a", fetch)).toBe(1);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("refetches once after the TTL and stores the new value", async () => {
    await store().put("a", 1);
    await ageFile(join(dir, "numbers.json"), 25);
    const fetch = vi.fn(async () => 2);

    const s = store();
    expect(await s.resolve("a", fetch)).toBe(2);
    expect(await s.resolve("a", fetch)).toBe(2);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(await store().get("a")).toEqual({ found: true, value: 2 });
  });

  it("expires entries put earlier in the same process", async () => {
    let clock = Date.now();
    const s = new CacheStore({ dir, file: "numbers.json", decode: decodeWith(z.number()), now: () => clock });
    await s.put("a", 1);
    clock += 25 * 60 * 60 * 1000;
    const fetch = vi.fn(async () => 2);

    expect(await s.get("a")).toEqual({ found: false, stale: 1 });
    expect(await s.describe()).toMatchObject({ entries: 1, fresh: 0 });
    expect(await s.resolve("a", fetch)).toBe(2);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(await s.get("a")).toEqual({ found: true, value: 2 });
  });

  it("serves the stale value when the refetch fails with a network error", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await store().put("a", 1);
    await ageFile(join(dir, "numbers.json"), 25);

    const value = await store().resolve("a", async () => {
      throw new NetworkError("epss", "epss request failed: HTTP 503", { status: 503 });
    });

    expect(value).toBe(1);
    expect(warn).toHaveBeenCalledWith("[vuln-risk:numbers.json] epss request failed: HTTP 503; serving stale cache for a");
  });

  it("propagates a network error when nothing is cached", async () => {
    await expect(
      store().resolve("a", async () => {
        throw new NetworkError("kev", "kev request failed: HTTP 500");
      }),
    ).rejects.toBeInstanceOf(NetworkError);
  });

  it("does not fall back on schema errors", async () => {
    await store().put("a", 1);
    await ageFile(join(dir, "numbers.json"), 25);

    await expect(
      store().resolve("a", async () => {
        throw new UpstreamSchemaError("kev", "bad shape");
      }),
    ).rejects.toBeInstanceOf(UpstreamSchemaError);
  });

  it("treats a corrupt file as empty", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await writeFile(join(dir, "numbers.json"), "{not json", "utf-8");

    expect(await store().resolve("a", async () => 7)).toBe(7);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(await store().get("a")).toEqual({ found: true, value: 7 });
  });

  it("drops entries the decoder rejects", async () => {
    await writeFile(
      join(dir, "numbers.json"),
      JSON.stringify({ a: { value: "one", fetchedAt: "x" }, b: { value: 2, fetchedAt: "x" } }),
      "utf-8",
    );

    expect(await store().get("a")).toEqual({ found: false });
    expect(await store().get("b")).toEqual({ found: true, value: 2 });
  });

  it("shares one fetch between concurrent callers", async () => {
    const s = store();
    let release: (v: number) => void = () => undefined;
    const fetch = vi.fn(() => new Promise<number>((resolve) => (release = resolve)));

    const first = s.resolve("a", fetch);
    const second = s.resolve("a", fetch);
    await vi.waitFor(() => expect(fetch).toHaveBeenCalled());
    release(5);

    expect(await Promise.all([first, second])).toEqual([5, 5]);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("creates the cache directory on first write", async () => {
    const nested = join(dir, "deep", "er");
    await store({ dir: nested }).put("a", 1);

    expect(await store({ dir: nested }).get("a")).toEqual({ found: true, value: 1 });
  });

  it("logs and survives a failed write", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "a file where a directory should be", "utf-8");

    await expect(store({ dir: blocker }).put("a", 1)).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("Failed to persist cache"));
  });

  it("keeps concurrent writes consistent", async () => {
    const s = store();
    await mkdir(dir, { recursive: true });
    await Promise.all([s.put("a", 1), s.put("b", 2), s.put("c", 3)]);

    const body = JSON.parse(await readFile(join(dir, "numbers.json"), "utf-8"));
    expect(Object.keys(body).sort()).toEqual(["a", "b", "c"]);
  });

  it("describes its entries", async () => {
    await store().putMany([["a", 1], ["b", 2]]);

    expect(await store().describe()).toEqual({ path: join(dir, "numbers.json"), entries: 2, fresh: 2 });
  });
});

describe("Inflight", () => {
  it("hands later callers the pending promise", async () => {
    const inflight = new Inflight<number>();
    const work = vi.fn(async () => 1);

    const [a, b] = await Promise.all([inflight.run("k", work), inflight.run("k", work)]);

    expect([a, b]).toEqual([1, 1]);
    expect(work).toHaveBeenCalledTimes(1);
    expect(inflight.size).toBe(0);
  });

  it("shares a failure and then starts fresh", async () => {
    const inflight = new Inflight<number>();
    const failing = vi.fn(async (): Promise<number> => {
      throw new Error("down");
    });

    const results = await Promise.allSettled([inflight.run("k", failing), inflight.run("k", failing)]);
    expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);
    expect(failing).toHaveBeenCalledTimes(1);

    expect(await inflight.run("k", async () => 2)).toBe(2);
  });

  it("tracks externally created promises", async () => {
    const inflight = new Inflight<number>();
    const tracked = inflight.track("k", Promise.resolve(3));

    expect(inflight.get("k")).toBe(tracked);
    expect(await tracked).toBe(3);
    expect(inflight.get("k")).toBeUndefined();
  });
});
