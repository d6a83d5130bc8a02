/**
 * Case evaluation — runs the resolver once per GDX and keeps the best result.
 *
 * Best = lowest matched position; on equal positions the earlier GDX (declared
 * order) keeps the win. Every GDX trace is retained whether or not it won.
 */

import type { Case } from "@/types/diagnosis";
import type { CaseResult, FinalResolution, GdxTrace, MatchFamily, MatchOutcome } from "@/types/evaluation";
import type { MatchResolver } from "@/lib/match-resolver";
import type { Logger } from "@/lib/logger";
import { shorten, silentLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";
import { positionLabel } from "@/lib/format";

export function pickResolution(c: Case, trace: GdxTrace[]): FinalResolution | null {
  let best: FinalResolution | null = null;
  for (const t of trace) {
    const { outcome } = t;
    if (outcome.status !== "SUCCESS" || outcome.matchedPosition === undefined || !outcome.method) continue;
    const ddx = c.ddxList[outcome.matchedPosition - 1];
    if (!ddx) continue;
    if (best === null || outcome.matchedPosition < best.position) {
      best = {
        position: outcome.matchedPosition,
        method: outcome.method,
        value: outcome.matchedValue ?? "",
        gdxIndex: t.gdxIndex,
        gdx: t.gdx,
        ddx,
      };
    }
  }
  return best;
}

const FAMILY_LABEL: Record<MatchFamily, string> = {
  snomed: "SNOMED",
  icd10: "ICD10",
  other_codes: "OMIM/ORPHA",
  semantic: "SEMANTIC",
};

/** Deepest family that was actually tried (not SKIPPED) in the first GDX trace. */
export function lastFamilyTried(trace: GdxTrace[]): string {
  const first = trace[0]?.outcome;
  if (!first) return "NONE";
  let last = "NONE";
  for (const a of first.attempts) {
    if (a.status !== "SKIPPED") last = FAMILY_LABEL[a.family];
  }
  return last;
}

export interface ProgressInfo {
  index: number;
  total: number;
}

export interface CaseEvaluator {
  /** Rejects with the abort reason once `signal` fires; no further oracle call is made. */
  evaluate(c: Case, progress?: ProgressInfo, signal?: AbortSignal): Promise<CaseResult>;
}

export function createCaseEvaluator(resolver: MatchResolver, logger: Logger = silentLogger): CaseEvaluator {
  return {
    async evaluate(c, progress, signal) {
      const prefix = progress ? `[${progress.index}/${progress.total}]` : `[${c.caseId}]`;
      const trace: GdxTrace[] = [];
      try {
        for (let i = 0; i < c.gdxList.length; i++) {
          const gdx = c.gdxList[i];
          const outcome: MatchOutcome = await resolver.resolve(gdx, c.ddxList, signal);
          trace.push({ gdxIndex: i + 1, gdx, outcome });
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        logger.error(`${prefix} ERROR → ${errorMessage(err)} → **REJECTED**`, { caseId: c.caseId });
        return {
          caseId: c.caseId,
          gdxList: c.gdxList,
          ddxList: c.ddxList,
          trace,
          resolution: null,
          error: errorMessage(err),
        };
      }

      const resolution = pickResolution(c, trace);
      if (resolution) {
        logger.info(
          `${prefix} ${resolution.method} → GDX[${resolution.gdxIndex}]: ${shorten(resolution.gdx.name)} | ` +
            `DDX[${resolution.position}]: ${shorten(resolution.ddx.name)} → **${positionLabel(resolution.position)}**`,
        );
      } else {
        logger.info(`${prefix} ${lastFamilyTried(trace)} → NO_MATCH → **REJECTED**`);
      }

      return { caseId: c.caseId, gdxList: c.gdxList, ddxList: c.ddxList, trace, resolution };
    },
  };
}
