// src/services/metricsCalculator.ts
import type { Category, OverallResult, RawRow, SubjectMarks, SubjectSchema } from "../types/results";
import {
  CATEGORY_THRESHOLDS,
  SUBJECT_MAX_MARKS,
  normalizeResultText,
  round2,
  toMark,
} from "../helpers/markRules";
import { subjectCells } from "./resultClassifier";

export interface StudentMetrics {
  subjects: Record<string, SubjectMarks>;
  totalMarks: number;
  totalInternal: number;
  totalExternal: number;
  attempted: number;
  percentage: number;
}

export function readSubjectMarks(row: RawRow, subject: SubjectSchema): SubjectMarks {
  const cells = subjectCells(row, subject);
  return {
    internal: toMark(cells.internal),
    external: toMark(cells.external),
    total: toMark(cells.total),
    result_raw: normalizeResultText(cells.result),
  };
}

// Only subjects with a positive Total are in the denominator
export function computePercentage(totalMarks: number, attempted: number): number {
  if (attempted === 0) return 0;
  return round2((totalMarks / (attempted * SUBJECT_MAX_MARKS)) * 100);
}

export function computeMetrics(row: RawRow, schema: SubjectSchema[]): StudentMetrics {
  const subjects: Record<string, SubjectMarks> = {};
  let totalMarks = 0;
  let totalInternal = 0;
  let totalExternal = 0;
  let attempted = 0;

  for (const subject of schema) {
    const marks = readSubjectMarks(row, subject);
    subjects[subject.code] = marks;
    totalMarks += marks.total;
    totalInternal += marks.internal;
    totalExternal += marks.external;
    if (marks.total > 0) attempted++;
  }

  return {
    subjects,
    totalMarks: round2(totalMarks),
    totalInternal: round2(totalInternal),
    totalExternal: round2(totalExternal),
    attempted,
    percentage: computePercentage(totalMarks, attempted),
  };
}

/** Passing students get a band by percentage; everyone else keeps the result code. */
export function assignCategory(percentage: number, overall: OverallResult): Category {
  if (overall !== "P") return overall;
  if (percentage >= CATEGORY_THRESHOLDS.FCD) return "FCD";
  if (percentage >= CATEGORY_THRESHOLDS.FC) return "FC";
  if (percentage >= CATEGORY_THRESHOLDS.SC) return "SC";
  return "PassClass";
}
