import { describe, test, expect } from "vitest";
import { createLogger, shorten } from "@/lib/logger";
import { memorySink } from "./fakes";

describe("createLogger", () => {
  test("filters below the minimum level and formats context", () => {
    const { sink, lines } = memorySink();
    const logger = createLogger("Pipeline", "warn", sink);
    logger.info("hidden");
    logger.warn("careful", { count: 2, skipped: undefined, name: "x" });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe("warn");
    expect(lines[0].line).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] WARN \[Pipeline\] careful count=2 name=x$/);
  });

  test("children share the sink under their own tag", () => {
    const { sink, lines } = memorySink();
    createLogger("Root", "debug", sink).child("Judge").debug("ready");
    expect(lines[0].line.endsWith("DEBUG [Judge] ready")).toBe(true);
  });
});

describe("shorten", () => {
  test("truncates past the limit", () => {
    expect(shorten("abcdef", 3)).toBe("abc...");
    expect(shorten("abc", 3)).toBe("abc");
  });
});
