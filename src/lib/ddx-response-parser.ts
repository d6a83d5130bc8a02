/**
 * DDX response decoding — model output → ordered diagnosis names.
 *
 * Envelope handling first (code fences, `<diagnosis_output>` tags), then
 * JSON with a single-quoted-literal fallback, then the known shapes in
 * fixed order:
 *   1. [{ "diagnosis": "..." }, ...]
 *   2. [{ "dx": "..." }, ...]
 *   3. ["...", ...]
 *   4. { "diagnoses": [...] }
 * Anything else is a ParseError. Empty names are dropped.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type DdxShape = "diagnosis_objects" | "dx_objects" | "string_list" | "diagnoses_object";

export interface ParseError {
  reason: "empty_response" | "invalid_json" | "unknown_shape" | "no_diagnoses";
  message: string;
}

export interface ParsedDdx {
  shape: DdxShape;
  diagnoses: string[];
}

const FENCE = /```(?:json|JSON)?\s*([\s\S]*?)```/;
const OUTPUT_TAG = /<diagnosis_output>([\s\S]*?)<\/diagnosis_output>/;

function fail(reason: ParseError["reason"], message: string): Result<ParsedDdx, ParseError> {
  return { ok: false, error: { reason, message } };
}

export function unwrapEnvelope(raw: string): string {
  let text = raw.trim();
  const tagged = OUTPUT_TAG.exec(text);
  if (tagged) text = tagged[1].trim();
  const fenced = FENCE.exec(text);
  if (fenced) text = fenced[1].trim();
  return text;
}

/** `['a', 'b']` → `["a", "b"]`; also maps None/True/False. */
function singleQuotedToJson(text: string): string {
  return text
    .replace(/'((?:[^'\\]|\\.)*)'/g, (_, body: string) => JSON.stringify(body.replace(/\\'/g, "'")))
    .replace(/\bNone\b/g, "null")
    .replace(/\bTrue\b/g, "true")
    .replace(/\bFalse\b/g, "false");
}

function parseLoose(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return JSON.parse(singleQuotedToJson(text));
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Non-string entries are dropped, never stringified. */
function names(values: unknown[]): string[] {
  const out: string[] = [];
  for (const v of values) {
    if (typeof v !== "string") continue;
    const s = v.trim();
    if (s) out.push(s);
  }
  return out;
}

function fromObjects(items: unknown[], key: string): string[] {
  return names(items.filter(isRecord).map((item) => item[key]));
}

function decodeShape(parsed: unknown): ParsedDdx | null {
  if (Array.isArray(parsed)) {
    const first: unknown = parsed[0];
    if (isRecord(first) && "diagnosis" in first) {
      return { shape: "diagnosis_objects", diagnoses: fromObjects(parsed, "diagnosis") };
    }
    if (isRecord(first) && "dx" in first) {
      return { shape: "dx_objects", diagnoses: fromObjects(parsed, "dx") };
    }
    if (parsed.every((v) => typeof v === "string")) {
      return { shape: "string_list", diagnoses: names(parsed) };
    }
    return null;
  }
  const list: unknown = isRecord(parsed) ? parsed.diagnoses : undefined;
  if (Array.isArray(list)) {
    const inner = decodeShape(list);
    return inner ? { shape: "diagnoses_object", diagnoses: inner.diagnoses } : null;
  }
  return null;
}

export function parseDdxResponse(raw: string): Result<ParsedDdx, ParseError> {
  const text = unwrapEnvelope(raw);
  if (!text) return fail("empty_response", "Empty model response");

  let parsed: unknown;
  try {
    parsed = parseLoose(text);
  } catch {
    return fail("invalid_json", `Response is not JSON: ${text.slice(0, 80)}`);
  }

  const decoded = decodeShape(parsed);
  if (!decoded) return fail("unknown_shape", `Unrecognized response shape: ${text.slice(0, 80)}`);
  if (decoded.diagnoses.length === 0) return fail("no_diagnoses", "Response contained no diagnoses");
  return { ok: true, value: decoded };
}
