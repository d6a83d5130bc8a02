/**
 * Severity distance between a differential and the matched ground truth.
 *
 * Severities are integers 0–10 written `S0`..`S10`. Distance is normalized by
 * the room the GDX severity leaves in its longer direction:
 *   max_distance = 10 - sev_gdx   (sev_gdx ≤ 5)
 *                = sev_gdx        (sev_gdx > 5)
 * clamped to 1 when it would be 0. Normalized values above 1 are kept.
 *
 * optimist  = DDX less severe than GDX
 * pessimist = DDX more severe than GDX
 * equal severities count toward final_score only.
 */

import type { SeverityLabel } from "@/types/diagnosis";
import { DEFAULT_SEVERITY } from "@/types/diagnosis";
import type { DdxSeverityScore, SeverityResult } from "@/types/evaluation";
import { mean, round } from "@/lib/format";

const SEVERITY_PATTERN = /^S(10|[0-9])$/;

export const MAX_SEVERITY = 10;

export function isSeverityLabel(value: unknown): value is SeverityLabel {
  return typeof value === "string" && SEVERITY_PATTERN.test(value);
}

/** `S7` → 7. Anything `isSeverityLabel` rejects falls back to S5. */
export function severityValue(label: string | null | undefined): number {
  const m = label ? SEVERITY_PATTERN.exec(label) : null;
  return m ? Number(m[1]) : severityValue(DEFAULT_SEVERITY);
}

export function maxDistance(sevGdx: number): number {
  const d = sevGdx <= 5 ? MAX_SEVERITY - sevGdx : sevGdx;
  return d === 0 ? 1 : d;
}

export interface SeverityInput {
  name: string;
  severity: SeverityLabel | null;
}

export function scoreSeverity(ddxList: SeverityInput[], gdx: SeverityInput): SeverityResult {
  const gdxLabel = isSeverityLabel(gdx.severity) ? gdx.severity : DEFAULT_SEVERITY;
  const sevGdx = severityValue(gdxLabel);
  const denom = maxDistance(sevGdx);

  const all: number[] = [];
  const optimist: number[] = [];
  const pessimist: number[] = [];
  let neutral = 0;
  const ddx: DdxSeverityScore[] = [];

  for (const d of ddxList) {
    const label = isSeverityLabel(d.severity) ? d.severity : DEFAULT_SEVERITY;
    const sevDdx = severityValue(label);
    const distance = Math.abs(sevGdx - sevDdx);
    const normalized = distance / denom;
    all.push(normalized);
    if (sevDdx < sevGdx) optimist.push(normalized);
    else if (sevDdx > sevGdx) pessimist.push(normalized);
    else neutral++;
    ddx.push({ name: d.name, severity: label, distance, score: round(normalized) });
  }

  return {
    // mean over every DDX, not the mean of bucket means
    finalScore: round(mean(all)),
    optimist: { n: optimist.length, score: round(mean(optimist)) },
    pessimist: { n: pessimist.length, score: round(mean(pessimist)) },
    neutral,
    gdx: { name: gdx.name, severity: gdxLabel },
    ddx,
  };
}
