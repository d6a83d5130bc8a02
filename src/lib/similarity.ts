/**
 * Similarity oracles and the dataset-wide similarity cache.
 *
 * The cache is write-once per text pair and shared by concurrent case
 * evaluations; in-flight lookups are shared too, so two cases asking for
 * the same pair trigger one oracle call.
 */

import OpenAI, { AzureOpenAI } from "openai";
import type { SimilarityOracle } from "@/lib/oracles";
import type { CallPolicy } from "@/lib/retry";
import { guardedCall } from "@/lib/retry";
import { HttpError, OracleFailure } from "@/lib/errors";

// ─── Cache ───────────────────────────────────────────────

export interface CachedSimilarityOracle extends SimilarityOracle {
  readonly size: number;
  /** Settled scores, for reports. */
  entries(): [string, string, number][];
}

export function pairKey(a: string, b: string): string {
  return `${a}\u0000${b}`;
}

export function withSimilarityCache(inner: SimilarityOracle): CachedSimilarityOracle {
  const pending = new Map<string, Promise<number>>();
  const settled = new Map<string, [string, string, number]>();

  return {
    get size() {
      return settled.size;
    },
    entries: () => [...settled.values()],
    score(a, b, signal) {
      const key = pairKey(a, b);
      const hit = settled.get(key);
      if (hit) return Promise.resolve(hit[2]);
      let p = pending.get(key);
      if (!p) {
        p = inner.score(a, b, signal).then(
          (s) => {
            settled.set(key, [a, b, s]);
            pending.delete(key);
            return s;
          },
          (err: unknown) => {
            // failures are not cached; the next case may retry the pair
            pending.delete(key);
            throw err;
          },
        );
        pending.set(key, p);
      }
      return p;
    },
  };
}

// ─── Vector math ─────────────────────────────────────────

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}

// ─── Embedding oracle ────────────────────────────────────

export type EmbedFn = (text: string, signal: AbortSignal) => Promise<number[]>;

/** Cosine similarity of text embeddings; embeddings memoized per text. */
export function createEmbeddingSimilarityOracle(embed: EmbedFn, policy: CallPolicy): SimilarityOracle {
  const vectors = new Map<string, Promise<number[]>>();
  const vectorFor = (text: string, signal?: AbortSignal) => {
    let v = vectors.get(text);
    if (!v) {
      v = guardedCall("embedding", (callSignal) => embed(text, callSignal), policy, signal);
      vectors.set(text, v);
      v.catch(() => vectors.delete(text));
    }
    return v;
  };
  return {
    async score(a, b, signal) {
      if (a === b) return 1;
      const [va, vb] = await Promise.all([vectorFor(a, signal), vectorFor(b, signal)]);
      return clampUnit(cosineSimilarity(va, vb));
    },
  };
}

export interface EmbeddingClientConfig {
  model: string;
  apiKey: string;
  /** Set for Azure OpenAI; omitted → api.openai.com. */
  azureEndpoint?: string;
  apiVersion?: string;
}

export function createOpenAiEmbedFn(config: EmbeddingClientConfig): EmbedFn {
  const client = config.azureEndpoint
    ? new AzureOpenAI({
        endpoint: config.azureEndpoint,
        apiKey: config.apiKey,
        apiVersion: config.apiVersion,
        deployment: config.model,
        maxRetries: 0,
      })
    : new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });

  return async (text, signal) => {
    const res = await client.embeddings.create({ model: config.model, input: text }, { signal });
    const vector = res.data[0]?.embedding;
    if (!vector) throw new OracleFailure("embedding", `no embedding returned for "${text}"`);
    return vector;
  };
}

// ─── HTTP oracle ─────────────────────────────────────────

export interface HttpSimilarityConfig {
  endpoint: string;
  apiKey?: string;
}

/** POST `{ text_a, text_b }` → `{ score }`. */
export function createHttpSimilarityOracle(config: HttpSimilarityConfig, policy: CallPolicy): SimilarityOracle {
  return {
    async score(a, b, signal) {
      const body = await guardedCall(
        "similarity",
        async (callSignal) => {
          const headers: Record<string, string> = { "Content-Type": "application/json" };
          if (config.apiKey) headers.Authorization = `Bearer ${config.apiKey}`;
          const res = await fetch(config.endpoint, {
            method: "POST",
            headers,
            body: JSON.stringify({ text_a: a, text_b: b }),
            signal: callSignal,
          });
          if (!res.ok) throw new HttpError(res.status, `Similarity API error: ${res.status} ${res.statusText}`);
          const json: unknown = await res.json();
          return json;
        },
        policy,
        signal,
      );
      const score: unknown = typeof body === "object" && body !== null ? Reflect.get(body, "score") : body;
      if (typeof score !== "number") throw new OracleFailure("similarity", `response has no numeric score`);
      return clampUnit(score);
    },
  };
}
