import { describe, test, expect } from "vitest";
import { parseDdxResponse, unwrapEnvelope } from "@/lib/ddx-response-parser";

function decoded(raw: string) {
  const result = parseDdxResponse(raw);
  if (!result.ok) throw new Error(`expected a decoded response, got ${result.error.reason}`);
  return result.value;
}

function reason(raw: string) {
  const result = parseDdxResponse(raw);
  return result.ok ? null : result.error.reason;
}

describe("unwrapEnvelope", () => {
  test("strips the output tag, then a code fence", () => {
    const raw = 'Reasoning first.\n<diagnosis_output>\n```json\n["A"]\n```\n</diagnosis_output>\nThanks';
    expect(unwrapEnvelope(raw)).toBe('["A"]');
  });
});

describe("parseDdxResponse — shapes", () => {
  test("diagnosis objects drop blank names", () => {
    expect(decoded('[{"diagnosis": "Pneumonia", "rank": 1}, {"diagnosis": " "}, {"diagnosis": "Asthma"}]')).toEqual({
      shape: "diagnosis_objects",
      diagnoses: ["Pneumonia", "Asthma"],
    });
  });

  test("dx objects", () => {
    expect(decoded('[{"dx": "Gout"}, {"dx": "Pseudogout"}]')).toEqual({
      shape: "dx_objects",
      diagnoses: ["Gout", "Pseudogout"],
    });
  });

  test("plain string list", () => {
    expect(decoded('["Gout", "Cellulitis"]').shape).toBe("string_list");
  });

  test("diagnoses wrapper decodes its inner list", () => {
    expect(decoded('{"diagnoses": [{"diagnosis": "Lupus"}]}')).toEqual({
      shape: "diagnoses_object",
      diagnoses: ["Lupus"],
    });
  });

  test("non-string names are dropped, not stringified", () => {
    expect(decoded('[{"diagnosis": {"label": "Lupus"}}, {"diagnosis": 5}, {"diagnosis": "Gout"}]').diagnoses).toEqual([
      "Gout",
    ]);
  });

  test("single-quoted literals with True/None", () => {
    expect(decoded("[{'diagnosis': 'Lupus', 'confirmed': True, 'note': None}]").diagnoses).toEqual(["Lupus"]);
  });

  test("fenced response", () => {
    expect(decoded('```json\n["Migraine"]\n```').diagnoses).toEqual(["Migraine"]);
  });
});

describe("parseDdxResponse — failures", () => {
  test("empty response", () => {
    expect(reason("   ")).toBe("empty_response");
  });

  test("not JSON", () => {
    expect(reason("I think it is pneumonia")).toBe("invalid_json");
  });

  test("unknown shapes", () => {
    expect(reason('{"answer": "Gout"}')).toBe("unknown_shape");
    expect(reason("[1, 2]")).toBe("unknown_shape");
  });

  test("a diagnoses wrapper around an undocumented list", () => {
    expect(reason('{"diagnoses": [{"name": "Lupus"}, {"name": "Gout"}]}')).toBe("unknown_shape");
  });

  test("empty list", () => {
    expect(reason("[]")).toBe("no_diagnoses");
  });
});
