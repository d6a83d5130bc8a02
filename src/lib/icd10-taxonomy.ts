/**
 * ICD-10 taxonomy — CodeOracle over a flat node list.
 *
 * Node file: JSON array of `{ code, parent, type, title }`, or
 * `{ nodes: [...] }`. `type` is chapter | range | category | subcategory.
 * Chapters and ranges are groupings: codes whose immediate parent is one
 * have no siblings.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CodeOracle } from "@/lib/oracles";
import { ConfigurationError, errorMessage } from "@/lib/errors";

export const ICD10_NODE_TYPES = ["chapter", "range", "category", "subcategory"] as const;

export type Icd10NodeType = (typeof ICD10_NODE_TYPES)[number];

const nodeSchema = z.object({
  code: z.string().trim().min(1),
  parent: z.string().trim().nullish(),
  type: z.enum(ICD10_NODE_TYPES),
  title: z.string().default(""),
});

const fileSchema = z.union([z.array(nodeSchema), z.object({ nodes: z.array(nodeSchema) }).transform((f) => f.nodes)]);

export interface Icd10Node {
  code: string;
  parent: string | null;
  type: Icd10NodeType;
  title: string;
}

const GROUPING_TYPES: ReadonlySet<Icd10NodeType> = new Set(["chapter", "range"]);

export interface Icd10Taxonomy extends CodeOracle {
  get(code: string): Icd10Node | undefined;
  readonly size: number;
}

export function buildIcd10Taxonomy(nodes: Icd10Node[]): Icd10Taxonomy {
  const byCode = new Map<string, Icd10Node>();
  const childrenOf = new Map<string, Set<string>>();
  for (const n of nodes) {
    byCode.set(n.code, n);
  }
  for (const n of byCode.values()) {
    if (!n.parent) continue;
    let set = childrenOf.get(n.parent);
    if (!set) {
      set = new Set();
      childrenOf.set(n.parent, set);
    }
    set.add(n.code);
  }

  const parentsSync = (code: string): string[] => {
    const out: string[] = [];
    const seen = new Set<string>([code]);
    let cur = byCode.get(code)?.parent ?? null;
    while (cur && !seen.has(cur)) {
      out.push(cur);
      seen.add(cur);
      cur = byCode.get(cur)?.parent ?? null;
    }
    return out;
  };

  return {
    size: byCode.size,
    get: (code) => byCode.get(code),
    async parents(code) {
      return parentsSync(code);
    },
    async children(code) {
      return new Set(childrenOf.get(code));
    },
    async siblings(code) {
      const parent = byCode.get(code)?.parent;
      if (!parent) return new Set();
      const parentNode = byCode.get(parent);
      if (!parentNode || GROUPING_TYPES.has(parentNode.type)) return new Set();
      const out = new Set(childrenOf.get(parent));
      out.delete(code);
      return out;
    },
  };
}

export function parseIcd10Nodes(raw: unknown): Icd10Node[] {
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid ICD-10 taxonomy",
      parsed.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return parsed.data.map((n) => ({ code: n.code, parent: n.parent || null, type: n.type, title: n.title }));
}

export async function loadIcd10Taxonomy(path: string): Promise<Icd10Taxonomy> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ICD-10 taxonomy at ${path}: ${errorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`ICD-10 taxonomy at ${path} is not valid JSON`);
  }
  return buildIcd10Taxonomy(parseIcd10Nodes(raw));
}

/** Oracle for runs without a taxonomy: only exact ICD-10 identity can match. */
export const emptyCodeOracle: CodeOracle = {
  parents: async () => [],
  children: async () => new Set(),
  siblings: async () => new Set(),
};
