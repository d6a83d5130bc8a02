/**
 * Diagnosis and case data model shared by DDX (model output) and GDX
 * (ground truth) lists.
 */

// ─── Coding systems ──────────────────────────────────────

export const CODE_SYSTEMS = ["icd10", "snomed", "omim", "orpha"] as const;

export type CodeSystem = (typeof CODE_SYSTEMS)[number];

/** Codes per system. Each list is a set: order-insensitive, no duplicates. */
export type MedicalCodes = Record<CodeSystem, string[]>;

// ─── Severity ────────────────────────────────────────────

/** `S0`..`S10`. */
export type SeverityLabel = `S${number}`;

export const DEFAULT_SEVERITY: SeverityLabel = "S5";

// ─── Diagnosis / Case ────────────────────────────────────

export interface Diagnosis {
  name: string;
  /** Canonical text; equals `name` when no normalization occurred. */
  normalizedText: string;
  medicalCodes: MedicalCodes;
  severity: SeverityLabel | null;
}

export interface Case {
  caseId: string;
  caseDescription: string;
  /** Declared order only; every GDX is matched independently. */
  gdxList: Diagnosis[];
  /** Ranked candidates. Position = index + 1, lower is better. */
  ddxList: Diagnosis[];
}
