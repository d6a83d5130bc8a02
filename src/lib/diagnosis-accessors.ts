/**
 * Construction and read helpers for Diagnosis values.
 */

import { CODE_SYSTEMS } from "@/types/diagnosis";
import type { CodeSystem, Diagnosis, MedicalCodes, SeverityLabel } from "@/types/diagnosis";

export function emptyCodes(): MedicalCodes {
  return { icd10: [], snomed: [], omim: [], orpha: [] };
}

/** Trim, drop empties, suppress duplicates (first occurrence kept). */
export function uniqueCodes(codes: Iterable<unknown>): string[] {
  const seen = new Set<string>();
  for (const raw of codes) {
    if (raw === null || raw === undefined) continue;
    const code = String(raw).trim();
    if (code) seen.add(code);
  }
  return [...seen];
}

export function normalizeCodes(input?: Partial<Record<CodeSystem, Iterable<unknown>>>): MedicalCodes {
  const out = emptyCodes();
  if (!input) return out;
  for (const system of CODE_SYSTEMS) {
    const codes = input[system];
    if (codes) out[system] = uniqueCodes(codes);
  }
  return out;
}

export function hasAnyCode(codes: MedicalCodes): boolean {
  return CODE_SYSTEMS.some((s) => codes[s].length > 0);
}

export interface DiagnosisInit {
  name: string;
  normalizedText?: string | null;
  medicalCodes?: Partial<Record<CodeSystem, Iterable<unknown>>>;
  severity?: SeverityLabel | null;
}

export function makeDiagnosis(init: DiagnosisInit): Diagnosis {
  const name = init.name.trim();
  const normalized = init.normalizedText?.trim();
  return {
    name,
    normalizedText: normalized ? normalized : name,
    medicalCodes: normalizeCodes(init.medicalCodes),
    severity: init.severity ?? null,
  };
}

/** Text used for severity lookups and judge prompts. */
export function diagnosisText(dx: Diagnosis): string {
  return dx.normalizedText || dx.name;
}
