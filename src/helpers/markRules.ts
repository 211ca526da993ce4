// src/helpers/markRules.ts
import type { CellValue } from "../types/results";

// Fallback when a subject has no Result text. Kept apart from the category thresholds.
export const SUBJECT_PASS_MARK = 35;

// Percentage lower bounds, checked top-down
export const CATEGORY_THRESHOLDS = {
  FCD: 70,
  FC: 60,
  SC: 50,
} as const;

export const SUBJECT_MAX_MARKS = 100;

export const ABSENT_TOKENS = ["A", "ABSENT", ""];
export const FAIL_TOKENS = ["F", "FAIL"];
export const PASS_TOKENS = ["P", "PASS"];

export const UNASSIGNED_SECTION = "Unassigned";
export const OVERALL_SECTION = "Overall";

// [min score, points], highest first
export const GRADE_POINT_SCALE: ReadonlyArray<readonly [number, number]> = [
  [90, 10],
  [80, 9],
  [70, 8],
  [60, 7],
  [55, 6],
  [50, 5],
  [40, 4],
];

export const isBlank = (value: CellValue): boolean =>
  value === null || value === undefined || String(value).trim() === "";

/** Numeric value of a mark cell; anything unreadable counts as 0. */
export function toMark(value: CellValue): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "boolean" || isBlank(value)) return 0;
  const parsed = Number(String(value).replace(/,/g, "").trim());
  return Number.isFinite(parsed) ? parsed : 0;
}

export function isNumericCell(value: CellValue): boolean {
  if (typeof value === "number") return Number.isFinite(value);
  if (typeof value !== "string" || value.trim() === "") return false;
  return Number.isFinite(Number(value.replace(/,/g, "").trim()));
}

export const normalizeResultText = (value: CellValue): string =>
  isBlank(value) ? "" : String(value).trim().toUpperCase();

export const round2 = (value: number): number => Number(value.toFixed(2));

export function gradePoint(score: number): number {
  const band = GRADE_POINT_SCALE.find(([min]) => score >= min);
  return band ? band[1] : 0;
}

// Plain code-unit order, independent of locale
export const byKey = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

// Identifiers compare without case or whitespace
export const normalizeIdentifier = (value: string): string =>
  value.replace(/\s+/g, "").toUpperCase();
