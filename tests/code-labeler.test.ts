import { describe, test, expect } from "vitest";
import type { Case } from "@/types/diagnosis";
import type { CodeExtractor, ExtractedCodes } from "@/lib/oracles";
import { collectUnlabeledNames, createCodeLabeler } from "@/lib/code-labeler";
import { emptyCodes } from "@/lib/diagnosis-accessors";
import { dx } from "./fakes";

function fakeExtractor(known: Record<string, ExtractedCodes>) {
  const batches: string[][] = [];
  const extractor: CodeExtractor = {
    async extractBatch(texts) {
      batches.push(texts);
      if (texts.includes("Broken")) throw new Error("service unavailable");
      const out = new Map<string, ExtractedCodes>();
      for (const t of texts) {
        const hit = known[t];
        if (hit) out.set(t, hit);
      }
      return out;
    },
    async extract(text) {
      return known[text] ?? { normalizedText: text, medicalCodes: emptyCodes() };
    },
  };
  return { extractor, batches };
}

const cases: Case[] = [
  {
    caseId: "c1",
    caseDescription: "",
    gdxList: [],
    ddxList: [dx("Pneumonia"), dx("Asthma", { icd10: ["J45"] })],
  },
  {
    caseId: "c2",
    caseDescription: "",
    gdxList: [],
    ddxList: [dx("Pneumonia"), dx("Gout"), dx("Broken")],
  },
];

describe("collectUnlabeledNames", () => {
  test("unique uncoded names in first-seen order", () => {
    expect(collectUnlabeledNames(cases)).toEqual(["Pneumonia", "Gout", "Broken"]);
  });
});

describe("createCodeLabeler", () => {
  test("attaches extracted codes and tolerates failed batches", async () => {
    const { extractor, batches } = fakeExtractor({
      Pneumonia: {
        normalizedText: "Pneumonia, unspecified",
        medicalCodes: { ...emptyCodes(), icd10: ["J18.9"] },
      },
    });
    const labeler = createCodeLabeler(extractor, undefined, 2);

    const [c1, c2] = await labeler.label(cases);

    expect(batches).toEqual([["Pneumonia", "Gout"], ["Broken"]]);
    expect(c1.ddxList[0].medicalCodes.icd10).toEqual(["J18.9"]);
    expect(c1.ddxList[0].normalizedText).toBe("Pneumonia, unspecified");
    expect(c1.ddxList[1]).toBe(cases[0].ddxList[1]);
    expect(c2.ddxList[1].medicalCodes).toEqual(emptyCodes());
    expect(c2.ddxList[2].medicalCodes).toEqual(emptyCodes());
    expect(labeler.cache.size).toBe(3);
  });

  test("cached names are not sent again", async () => {
    const { extractor, batches } = fakeExtractor({});
    const labeler = createCodeLabeler(extractor, undefined, 5);
    await labeler.label(cases);
    await labeler.label(cases);
    expect(batches).toEqual([["Pneumonia", "Gout", "Broken"]]);
  });
});
