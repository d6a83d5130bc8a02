import { describe, test, expect } from "vitest";
import { buildJudgePrompt, createLlmJudge, parseJudgeAnswer } from "@/lib/judge";
import { JudgeFailure } from "@/lib/errors";
import { scriptedLlm } from "./fakes";

describe("parseJudgeAnswer", () => {
  test("accepts a bare integer with stray quotes or a trailing dot", () => {
    expect(parseJudgeAnswer("2", 5)).toBe(2);
    expect(parseJudgeAnswer(" 3. ", 5)).toBe(3);
    expect(parseJudgeAnswer('"0"', 5)).toBe(0);
  });

  test("rejects prose and out-of-range answers", () => {
    expect(() => parseJudgeAnswer("Option 2", 5)).toThrow(JudgeFailure);
    expect(() => parseJudgeAnswer("6", 5)).toThrow("judge answer 6 exceeds 5 candidates");
  });
});

describe("createLlmJudge", () => {
  test("numbers the candidates and returns the parsed answer", async () => {
    const { llm, prompts } = scriptedLlm({ text: ["2"] });
    const answer = await createLlmJudge(llm).rank("Lupus", ["Arthritis", "SLE"]);
    expect(answer).toBe(2);
    expect(prompts[0]).toBe(buildJudgePrompt("Lupus", ["Arthritis", "SLE"]));
    expect(prompts[0]).toContain("1. Arthritis\n2. SLE");
    expect(prompts[0]).toContain("Respond with ONLY the number (1-2)");
  });

  test("no candidates answers 0 without a call", async () => {
    const { llm, prompts } = scriptedLlm({});
    expect(await createLlmJudge(llm).rank("Lupus", [])).toBe(0);
    expect(prompts).toEqual([]);
  });

  test("a failed call surfaces as JudgeFailure", async () => {
    const { llm } = scriptedLlm({});
    await expect(createLlmJudge(llm).rank("Lupus", ["SLE"])).rejects.toThrow(
      "judge call failed: no scripted text answer left",
    );
  });
});
