// src/services/schemaDetector.ts
import {
  SUBJECT_SUFFIXES,
  type RawRow,
  type SubjectColumn,
  type SubjectSchema,
  type SubjectSuffix,
} from "../types/results";
import { isNumericCell, toMark } from "../helpers/markRules";

const SUFFIX_LOOKUP = new Map<string, SubjectSuffix>(
  SUBJECT_SUFFIXES.map((s) => [s.toLowerCase(), s])
);

/**
 * Splits `"<CODE> <Suffix>"` on the last whitespace. Returns null for
 * anything that is not a subject-group column.
 */
export function parseSubjectColumn(column: string): SubjectColumn | null {
  const trimmed = column.trim();
  const match = /^(.*\S)\s+(\S+)$/.exec(trimmed);
  if (!match) return null;

  const suffix = SUFFIX_LOOKUP.get(match[2].toLowerCase());
  if (!suffix) return null;

  return { column, code: match[1], suffix };
}

/**
 * A code is a real subject when one of its Total columns carries a positive
 * number somewhere in the sheet, and it either has an Internal/External
 * sibling or contains a digit. Filters aggregates such as "Grand Total".
 */
export function isRealSubject(
  code: string,
  columns: SubjectColumn[],
  rows: readonly RawRow[]
): boolean {
  const hasSibling = columns.some((c) => c.suffix === "Internal" || c.suffix === "External");
  if (!hasSibling && !/\d/.test(code)) return false;

  return columns
    .filter((c) => c.suffix === "Total")
    .some((c) => {
      const numeric = rows.filter((row) => isNumericCell(row[c.column]));
      return numeric.reduce((max, row) => Math.max(max, toMark(row[c.column])), 0) > 0;
    });
}

/** Two passes: collect candidate columns per code, then keep the codes that qualify. */
export function detectSubjectSchema(columns: readonly string[], rows: readonly RawRow[]): SubjectSchema[] {
  const candidates = new Map<string, SubjectColumn[]>();

  for (const column of columns) {
    const parsed = parseSubjectColumn(column);
    if (!parsed) continue;
    const group = candidates.get(parsed.code) ?? [];
    group.push(parsed);
    candidates.set(parsed.code, group);
  }

  const schema: SubjectSchema[] = [];
  for (const [code, group] of candidates) {
    if (!isRealSubject(code, group, rows)) continue;

    const mapped: SubjectSchema["columns"] = {};
    for (const c of group) {
      // first occurrence wins on duplicated headers
      if (!mapped[c.suffix]) mapped[c.suffix] = c.column;
    }
    schema.push({ code, columns: mapped });
  }

  return schema.sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}

export const detectSubjectCodes = (columns: readonly string[], rows: readonly RawRow[]): string[] =>
  detectSubjectSchema(columns, rows).map((s) => s.code);
