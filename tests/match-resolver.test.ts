import { describe, test, expect } from "vitest";
import {
  DEFAULT_RESOLVER_OPTIONS,
  createMatchResolver,
  matchIcd10,
  matchSnomed,
  resolveMatch,
  scorePositions,
} from "@/lib/match-resolver";
import type { ResolverDeps } from "@/lib/match-resolver";
import type { CodeOracle } from "@/lib/oracles";
import { ConfigurationError } from "@/lib/errors";
import { emptyCodeOracle } from "@/lib/icd10-taxonomy";
import {
  dx,
  failingJudge,
  failingSimilarity,
  fixedJudge,
  forbiddenJudge,
  tableSimilarity,
  taxonomy,
} from "./fakes";

function deps(overrides: Partial<ResolverDeps> = {}): ResolverDeps {
  return {
    codes: taxonomy,
    similarity: tableSimilarity({}).oracle,
    judge: forbiddenJudge,
    ...overrides,
  };
}

function statuses(outcome: Awaited<ReturnType<typeof resolveMatch>>) {
  return outcome.attempts.map((a) => `${a.family}:${a.status}`);
}

// ─── End-to-end scenarios ────────────────────────────────

describe("resolveMatch — reference scenarios", () => {
  test("exact ICD-10 code at the second position", async () => {
    const gdx = dx("Pneumonia", { icd10: ["J18.9"] });
    const ddx = [dx("Bronchitis", { icd10: ["J20.9"] }), dx("Pneumonia", { icd10: ["J18.9"] })];

    const outcome = await resolveMatch(gdx, ddx, deps({ codes: emptyCodeOracle }));

    expect(outcome.status).toBe("SUCCESS");
    expect(outcome.method).toBe("ICD10_EXACT");
    expect(outcome.matchedPosition).toBe(2);
    expect(outcome.matchedValue).toBe("J18.9");
    expect(statuses(outcome)).toEqual([
      "snomed:SKIPPED",
      "icd10:SUCCESS",
      "other_codes:SKIPPED",
      "semantic:SKIPPED",
    ]);
    expect(outcome.attempts[2].details).toBe("ICD10_EXACT match found first");
  });

  test("similarity above autoconfirm accepts without consulting the judge", async () => {
    const gdx = dx("Rare Disease X");
    const ddx = [dx("Rare Disease X variant")];
    const { oracle } = tableSimilarity({ "Rare Disease X|Rare Disease X variant": 0.95 });

    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge: forbiddenJudge }));

    expect(outcome.method).toBe("BERT_AUTOCONFIRM");
    expect(outcome.matchedPosition).toBe(1);
    expect(outcome.matchedValue).toBe("0.95");
    const semantic = outcome.attempts[3];
    expect(semantic.semantic?.judgePosition).toBeNull();
    expect(semantic.details).toBe("BERT score 0.950 >= autoconfirm threshold 0.9. Judge skipped.");
  });
});

// ─── Family precedence ───────────────────────────────────

describe("resolveMatch — family precedence", () => {
  test("SNOMED wins even when ICD-10 matches at an earlier position", async () => {
    const gdx = dx("Pneumonia", { snomed: ["233604007"], icd10: ["J18.9"] });
    const ddx = [dx("Pneumonia", { icd10: ["J18.9"] }), dx("Pneumonia, unspecified", { snomed: ["233604007"] })];

    const outcome = await resolveMatch(gdx, ddx, deps());

    expect(outcome.method).toBe("SNOMED_MATCH");
    expect(outcome.matchedPosition).toBe(2);
    expect(outcome.attempts[1]).toEqual({
      family: "icd10",
      status: "SKIPPED",
      details: "SNOMED_MATCH match found first",
    });
  });

  test("a GDX without codes skips the coded families and reaches similarity", async () => {
    const gdx = dx("Gout");
    const ddx = [dx("Pseudogout")];
    const { oracle } = tableSimilarity({ "Gout|Pseudogout": 0.85 });
    const { judge, calls } = fixedJudge(0);

    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge }));

    expect(statuses(outcome)).toEqual([
      "snomed:SKIPPED",
      "icd10:SKIPPED",
      "other_codes:SKIPPED",
      "semantic:SUCCESS",
    ]);
    expect(outcome.attempts[0].details).toBe("GDX has no SNOMED codes");
    expect(outcome.method).toBe("BERT_MATCH");
    expect(calls).toEqual([{ reference: "Gout", candidates: ["Pseudogout"] }]);
  });

  test("OMIM exact replaces a weaker ICD-10 parent match", async () => {
    const gdx = dx("Disorder A", { icd10: ["J18.9"], omim: ["600001"] });
    const ddx = [dx("Pneumonia", { icd10: ["J18"] }), dx("Disorder A", { omim: ["600001"] })];

    const outcome = await resolveMatch(gdx, ddx, deps());

    expect(outcome.method).toBe("OMIM_MATCH");
    expect(outcome.matchedPosition).toBe(2);
    expect(outcome.attempts[1].status).toBe("SUCCESS");
    expect(outcome.attempts[1].details).toBe(
      "Found ICD10_PARENT match with DDX at P1 (J18.9 -> J18); superseded by exact OMIM_MATCH",
    );
    expect(outcome.attempts[3].status).toBe("SKIPPED");
  });

  test("OMIM exact never displaces ICD10_EXACT", async () => {
    const gdx = dx("Disorder A", { icd10: ["J18.9"], omim: ["600001"] });
    const ddx = [dx("Disorder A", { omim: ["600001"] }), dx("Pneumonia", { icd10: ["J18.9"] })];

    const outcome = await resolveMatch(gdx, ddx, deps());

    expect(outcome.method).toBe("ICD10_EXACT");
    expect(outcome.matchedPosition).toBe(2);
    expect(outcome.attempts[2].status).toBe("SKIPPED");
  });

  test("ORPHA matches when OMIM does not", async () => {
    const gdx = dx("Rare syndrome", { orpha: ["ORPHA:558"] });
    const ddx = [dx("Other"), dx("Rare syndrome", { orpha: ["ORPHA:558"] })];

    const outcome = await resolveMatch(gdx, ddx, deps());

    expect(outcome.method).toBe("ORPHA_MATCH");
    expect(outcome.matchedValue).toBe("ORPHA:558");
  });
});

// ─── Leftmost position ───────────────────────────────────

describe("leftmost position wins within a family", () => {
  const filler = (i: number) => dx(`Filler ${i}`);

  test("SNOMED matches at 3, 5 and 7 report position 3", () => {
    const ddx = [1, 2, 3, 4, 5, 6, 7].map((i) =>
      [3, 5, 7].includes(i) ? dx(`Match ${i}`, { snomed: ["123"] }) : filler(i),
    );
    const attempt = matchSnomed(dx("Target", { snomed: ["123"] }), ddx);
    expect(attempt.match?.position).toBe(3);
    expect(attempt.details).toBe("Found match with DDX at P3 (code: 123)");
  });

  test("ICD-10 exact matches at 3, 5 and 7 report position 3", async () => {
    const ddx = [1, 2, 3, 4, 5, 6, 7].map((i) =>
      [3, 5, 7].includes(i) ? dx(`Match ${i}`, { icd10: ["E11.9"] }) : filler(i),
    );
    const attempt = await matchIcd10(dx("Diabetes", { icd10: ["E11.9"] }), ddx, taxonomy, DEFAULT_RESOLVER_OPTIONS);
    expect(attempt.match).toEqual({ method: "ICD10_EXACT", position: 3, value: "E11.9" });
  });
});

// ─── ICD-10 relations ────────────────────────────────────

describe("matchIcd10 — hierarchy relations", () => {
  test("more specific DDX code is a CHILD match", async () => {
    const attempt = await matchIcd10(
      dx("Pneumonia", { icd10: ["J18"] }),
      [dx("Bronchitis", { icd10: ["J20.9"] }), dx("Lobar pneumonia", { icd10: ["J18.1"] })],
      taxonomy,
      DEFAULT_RESOLVER_OPTIONS,
    );
    expect(attempt.match).toEqual({ method: "ICD10_CHILD", position: 2, value: "J18 -> J18.1" });
  });

  test("EXACT at a later position beats CHILD at an earlier one", async () => {
    const attempt = await matchIcd10(
      dx("Pneumonia", { icd10: ["J18"] }),
      [dx("Lobar pneumonia", { icd10: ["J18.1"] }), dx("Pneumonia", { icd10: ["J18"] })],
      taxonomy,
      DEFAULT_RESOLVER_OPTIONS,
    );
    expect(attempt.match?.method).toBe("ICD10_EXACT");
    expect(attempt.match?.position).toBe(2);
  });

  test("each GDX code runs every relation before the next GDX code is tried", async () => {
    const attempt = await matchIcd10(
      dx("Pneumonia or bronchitis", { icd10: ["J18", "J20.9"] }),
      [dx("Acute bronchitis", { icd10: ["J20.9"] }), dx("Lobar pneumonia", { icd10: ["J18.1"] })],
      taxonomy,
      DEFAULT_RESOLVER_OPTIONS,
    );
    expect(attempt.match).toEqual({ method: "ICD10_CHILD", position: 2, value: "J18 -> J18.1" });
  });

  test("codes sharing a category parent are SIBLING matches", async () => {
    const attempt = await matchIcd10(
      dx("Pneumonia", { icd10: ["J18.9"] }),
      [dx("Lobar pneumonia", { icd10: ["J18.1"] })],
      taxonomy,
      DEFAULT_RESOLVER_OPTIONS,
    );
    expect(attempt.match).toEqual({ method: "ICD10_SIBLING", position: 1, value: "J18.9 <-> J18.1" });
  });

  test("codes sharing only a range grouping are not siblings", async () => {
    const attempt = await matchIcd10(
      dx("Myocardial infarction", { icd10: ["I21"] }),
      [dx("Chronic ischaemic heart disease", { icd10: ["I25"] })],
      taxonomy,
      DEFAULT_RESOLVER_OPTIONS,
    );
    expect(attempt.status).toBe("FAILED");
  });

  test("disabled parent and sibling searches leave only EXACT and CHILD", async () => {
    const options = { enableParentSearch: false, enableSiblingSearch: false };
    const parent = await matchIcd10(dx("A", { icd10: ["J18.9"] }), [dx("B", { icd10: ["J18"] })], taxonomy, options);
    const sibling = await matchIcd10(dx("A", { icd10: ["J18.9"] }), [dx("B", { icd10: ["J18.1"] })], taxonomy, options);
    expect(parent.status).toBe("FAILED");
    expect(sibling.status).toBe("FAILED");
  });

  test("taxonomy failure fails the family and the cascade continues", async () => {
    const broken: CodeOracle = {
      parents: async () => {
        throw new Error("taxonomy down");
      },
      children: async () => new Set(),
      siblings: async () => new Set(),
    };
    const { oracle } = tableSimilarity({ "Pneumonia|Lobar pneumonia": 0.93 });

    const outcome = await resolveMatch(
      dx("Pneumonia", { icd10: ["J18"] }),
      [dx("Lobar pneumonia", { icd10: ["J18.1"] })],
      deps({ codes: broken, similarity: oracle }),
    );

    expect(outcome.attempts[1].status).toBe("FAILED");
    expect(outcome.attempts[1].error).toBe("taxonomy down");
    expect(outcome.method).toBe("BERT_AUTOCONFIRM");
  });
});

// ─── Semantic family ─────────────────────────────────────

describe("semantic family — judge tie-break", () => {
  const gdx = dx("Lupus");
  const ddx = [dx("Arthritis"), dx("Systemic lupus erythematosus")];

  test("judge rescues a match the similarity scores missed", async () => {
    const { oracle } = tableSimilarity({ "Lupus|Arthritis": 0.2, "Lupus|Systemic lupus erythematosus": 0.5 });
    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge: fixedJudge(2).judge }));
    expect(outcome.method).toBe("LLM_JUDGMENT");
    expect(outcome.matchedPosition).toBe(2);
    expect(outcome.matchedValue).toBe("0.5");
  });

  test("accepted similarity at or before the judge's choice wins", async () => {
    const { oracle } = tableSimilarity({ "Lupus|Arthritis": 0.85 });
    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge: fixedJudge(2).judge }));
    expect(outcome.method).toBe("BERT_MATCH");
    expect(outcome.matchedPosition).toBe(1);
  });

  test("judge choice strictly earlier than the similarity best wins", async () => {
    const { oracle } = tableSimilarity({ "Lupus|Arthritis": 0.1, "Lupus|Systemic lupus erythematosus": 0.85 });
    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge: fixedJudge(1).judge }));
    expect(outcome.method).toBe("LLM_JUDGMENT");
    expect(outcome.matchedPosition).toBe(1);
    expect(outcome.matchedValue).toBe("0.1");
  });

  test("judge failure falls back to the acceptance threshold", async () => {
    const { oracle } = tableSimilarity({ "Lupus|Systemic lupus erythematosus": 0.82 });
    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge: failingJudge }));
    expect(outcome.method).toBe("BERT_MATCH");
    expect(outcome.matchedPosition).toBe(2);
    expect(outcome.attempts[3].semantic?.judgePosition).toBe(0);
    expect(outcome.attempts[3].details).toContain("Judge error: judge offline; treated as none.");
    expect(outcome.attempts[3].judgeError).toBe("judge offline");
  });

  test("out-of-range judge answer counts as none", async () => {
    const { oracle } = tableSimilarity({});
    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge: fixedJudge(7).judge }));
    expect(outcome.status).toBe("FAILED");
    expect(outcome.attempts[3].semantic?.judgePosition).toBe(0);
  });

  test("similarity outage is recorded and the judge may still match", async () => {
    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: failingSimilarity, judge: fixedJudge(2).judge }));
    expect(outcome.method).toBe("LLM_JUDGMENT");
    expect(outcome.matchedPosition).toBe(2);
    expect(outcome.attempts[3].error).toBe("embedding service unreachable");
  });

  test("both signals below bar fail the family", async () => {
    const { oracle } = tableSimilarity({ "Lupus|Arthritis": 0.4 });
    const outcome = await resolveMatch(gdx, ddx, deps({ similarity: oracle, judge: fixedJudge(0).judge }));
    expect(outcome.status).toBe("FAILED");
    expect(outcome.method).toBeUndefined();
    expect(outcome.attempts[3].details).toBe("Both BERT (best: 0.400) and judge found no acceptable match.");
  });

  test("the judge sees at most five normalized candidate texts", async () => {
    const many = [1, 2, 3, 4, 5, 6, 7].map((i) => dx(`Dx ${i}`, {}, { normalizedText: `Normalized ${i}` }));
    const { judge, calls } = fixedJudge(0);
    await resolveMatch(dx("Target"), many, deps({ judge }));
    expect(calls[0].candidates).toEqual(["Normalized 1", "Normalized 2", "Normalized 3", "Normalized 4", "Normalized 5"]);
  });

  test("an empty differential fails the semantic family", async () => {
    const outcome = await resolveMatch(dx("Target"), [], deps());
    expect(outcome.status).toBe("FAILED");
    expect(outcome.attempts[3].details).toBe("No DDX candidates to compare");
  });
});

describe("scorePositions", () => {
  test("identical name and normalized text collapse to one query per pair", async () => {
    const { oracle, calls } = tableSimilarity({ "A|B2": 0.7, "A|B": 0.3 });
    const scores = await scorePositions(dx("A"), [dx("B", {}, { normalizedText: "B2" })], oracle);
    expect(calls).toEqual([
      ["A", "B"],
      ["A", "B2"],
    ]);
    expect(scores).toEqual([{ position: 1, score: 0.7 }]);
  });
});

describe("createMatchResolver — configuration", () => {
  test("rejects acceptance above autoconfirm", () => {
    expect(() =>
      createMatchResolver(deps(), { ...DEFAULT_RESOLVER_OPTIONS, acceptanceThreshold: 0.95, autoconfirmThreshold: 0.9 }),
    ).toThrow(ConfigurationError);
  });

  test("rejects thresholds outside [0,1]", () => {
    expect(() => createMatchResolver(deps(), { ...DEFAULT_RESOLVER_OPTIONS, autoconfirmThreshold: 1.2 })).toThrow(
      ConfigurationError,
    );
  });

  test("accepts equal thresholds", () => {
    const resolver = createMatchResolver(deps(), {
      ...DEFAULT_RESOLVER_OPTIONS,
      acceptanceThreshold: 0.85,
      autoconfirmThreshold: 0.85,
    });
    expect(resolver.options.acceptanceThreshold).toBe(0.85);
  });
});
