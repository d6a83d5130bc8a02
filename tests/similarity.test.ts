import { afterEach, describe, test, expect, vi } from "vitest";
import {
  clampUnit,
  cosineSimilarity,
  createEmbeddingSimilarityOracle,
  createHttpSimilarityOracle,
  withSimilarityCache,
} from "@/lib/similarity";
import type { CallPolicy } from "@/lib/retry";
import { DEFAULT_RETRY_POLICY } from "@/lib/retry";
import { HttpError } from "@/lib/errors";
import type { SimilarityOracle } from "@/lib/oracles";

const policy: CallPolicy = { retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 }, timeoutMs: 1000 };

describe("withSimilarityCache", () => {
  test("concurrent lookups of one pair share a single call", async () => {
    let calls = 0;
    const inner: SimilarityOracle = {
      async score() {
        calls++;
        return 0.42;
      },
    };
    const cached = withSimilarityCache(inner);
    const scores = await Promise.all([cached.score("a", "b"), cached.score("a", "b"), cached.score("b", "a")]);

    expect(scores).toEqual([0.42, 0.42, 0.42]);
    expect(calls).toBe(2);
    expect(cached.size).toBe(2);
    expect(cached.entries()).toContainEqual(["a", "b", 0.42]);
  });

  test("failures are not cached", async () => {
    let calls = 0;
    const inner: SimilarityOracle = {
      async score() {
        calls++;
        if (calls === 1) throw new Error("flaky");
        return 0.7;
      },
    };
    const cached = withSimilarityCache(inner);
    await expect(cached.score("a", "b")).rejects.toThrow("flaky");
    expect(await cached.score("a", "b")).toBe(0.7);
    expect(calls).toBe(2);
  });
});

describe("vector helpers", () => {
  test("cosine similarity", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1], [1, 2])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  test("clampUnit", () => {
    expect(clampUnit(-0.5)).toBe(0);
    expect(clampUnit(1.5)).toBe(1);
    expect(clampUnit(Number.NaN)).toBe(0);
  });
});

describe("createEmbeddingSimilarityOracle", () => {
  test("embeds each text once and clamps negative cosine to 0", async () => {
    const vectors: Record<string, number[]> = { a: [1, 0], b: [0, 1], c: [-1, 0] };
    const embedded: string[] = [];
    const oracle = createEmbeddingSimilarityOracle(async (text) => {
      embedded.push(text);
      return vectors[text] ?? [];
    }, policy);

    expect(await oracle.score("a", "b")).toBe(0);
    expect(await oracle.score("a", "c")).toBe(0);
    expect(await oracle.score("c", "c")).toBe(1);
    expect(embedded).toEqual(["a", "b", "c"]);
  });
});

describe("createHttpSimilarityOracle", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("posts both texts and clamps the returned score", async () => {
    const requests: { url: unknown; body: unknown }[] = [];
    vi.stubGlobal("fetch", async (url: unknown, init?: { body?: unknown }) => {
      requests.push({ url, body: init?.body });
      return new Response(JSON.stringify({ score: 1.3 }), { status: 200 });
    });
    const oracle = createHttpSimilarityOracle({ endpoint: "http://similarity.test/score", apiKey: "test-secret" }, policy);

    expect(await oracle.score("Gout", "Pseudogout")).toBe(1);
    expect(requests).toEqual([
      { url: "http://similarity.test/score", body: JSON.stringify({ text_a: "Gout", text_b: "Pseudogout" }) },
    ]);
  });

  test("non-2xx responses raise HttpError", async () => {
    vi.stubGlobal("fetch", async () => new Response("down", { status: 503, statusText: "Service Unavailable" }));
    const oracle = createHttpSimilarityOracle({ endpoint: "http://similarity.test/score" }, policy);
    await expect(oracle.score("a", "b")).rejects.toBeInstanceOf(HttpError);
  });

  test("a body without a numeric score is an oracle failure", async () => {
    vi.stubGlobal("fetch", async () => new Response(JSON.stringify({ similarity: 0.5 }), { status: 200 }));
    const oracle = createHttpSimilarityOracle({ endpoint: "http://similarity.test/score" }, policy);
    await expect(oracle.score("a", "b")).rejects.toThrow("similarity: response has no numeric score");
  });
});
