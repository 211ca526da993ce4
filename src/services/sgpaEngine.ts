// src/services/sgpaEngine.ts
import type {
  CreditConfig,
  OverallResult,
  RawRow,
  SgpaResult,
  SubjectSchema,
} from "../types/results";
import {
  ABSENT_TOKENS,
  FAIL_TOKENS,
  PASS_TOKENS,
  SUBJECT_PASS_MARK,
  byKey,
  gradePoint,
  isBlank,
  normalizeResultText,
  round2,
  toMark,
} from "../helpers/markRules";
import { subjectCells } from "./resultClassifier";

export interface CreditValidation {
  credits: Map<string, number>;
  warnings: string[];
  accepted: boolean;
}

export interface SgpaOutcome {
  sgpa: number;
  creditedFail: boolean;
  creditedSubjects: number;
}

/**
 * Keeps integer weights 0..4 for detected subjects. A configuration with no
 * positive weight is rejected: no SGPA is produced for it. Entries are read
 * in sorted key order, so the outcome and the warnings do not depend on the
 * order the configuration was written in.
 */
export function validateCreditConfig(
  config: CreditConfig | undefined,
  subjectCodes: string[]
): CreditValidation {
  const credits = new Map<string, number>();
  const warnings: string[] = [];
  const known = new Map(subjectCodes.map((code) => [code.trim().toUpperCase(), code]));

  const entries = Object.entries(config ?? {}).sort(([a], [b]) => byKey(a, b));
  for (const [rawCode, weight] of entries) {
    if (!Number.isInteger(weight) || weight < 0 || weight > 4) {
      warnings.push(`Credit for ${rawCode} must be an integer between 0 and 4; ignored.`);
      continue;
    }
    const code = known.get(rawCode.trim().toUpperCase());
    if (!code) {
      warnings.push(`Credit given for unknown subject ${rawCode}; ignored.`);
      continue;
    }
    credits.set(code, weight);
  }

  const accepted = [...credits.values()].some((w) => w > 0);
  if (!accepted) {
    warnings.push("Credit configuration has no subject with a positive credit; SGPA not computed.");
  }

  return { credits, warnings, accepted };
}

/** Total, else Internal + External, else whichever of the two is non-zero. */
export function resolveScore(row: RawRow, subject: SubjectSchema): number {
  const cells = subjectCells(row, subject);
  const { Internal, External, Total } = subject.columns;

  if (Total) return toMark(cells.total);
  if (Internal && External) return toMark(cells.internal) + toMark(cells.external);

  const internal = toMark(cells.internal);
  if (internal !== 0) return internal;
  return toMark(cells.external);
}

// Result text wins; without a recognised one the score decides
export function isCreditedFail(resultText: string, score: number): boolean {
  if (PASS_TOKENS.includes(resultText)) return false;
  if (FAIL_TOKENS.includes(resultText)) return true;
  if (resultText !== "" && ABSENT_TOKENS.includes(resultText)) return true;
  return score < SUBJECT_PASS_MARK;
}

export function computeSgpa(
  row: RawRow,
  schema: SubjectSchema[],
  credits: Map<string, number>
): SgpaOutcome {
  let weighted = 0;
  let creditSum = 0;
  let creditedFail = false;
  let creditedSubjects = 0;

  for (const subject of schema) {
    const credit = credits.get(subject.code) ?? 0;
    if (credit <= 0) continue;

    const score = resolveScore(row, subject);
    const resultCell = subject.columns.Result ? row[subject.columns.Result] : undefined;
    const resultText = isBlank(resultCell) ? "" : normalizeResultText(resultCell);

    if (isCreditedFail(resultText, score)) creditedFail = true;
    weighted += gradePoint(score) * credit;
    creditSum += credit;
    creditedSubjects++;
  }

  return {
    sgpa: creditSum > 0 ? round2(weighted / creditSum) : 0,
    creditedFail,
    creditedSubjects,
  };
}

/**
 * SGPA-mode label mirrors the marks-mode overall result. The credited-subject
 * flag only turns a student with no classified subject into a Fail.
 */
export function reconcileSgpaResult(
  overall: OverallResult,
  classifiedSubjects: number,
  creditedFail: boolean
): SgpaResult {
  if (overall === "A") return "Absent";
  if (overall === "F") return "Fail";
  if (classifiedSubjects === 0 && creditedFail) return "Fail";
  return "Pass";
}
