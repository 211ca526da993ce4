// src/services/resultClassifier.ts
import type {
  CellValue,
  OverallResult,
  RawRow,
  SubjectSchema,
  SubjectStatus,
} from "../types/results";
import {
  ABSENT_TOKENS,
  FAIL_TOKENS,
  SUBJECT_PASS_MARK,
  isBlank,
  isNumericCell,
  normalizeResultText,
  toMark,
} from "../helpers/markRules";

// Raw cells of one subject in one row; undefined when the sheet has no such column
export interface SubjectCells {
  internal?: CellValue;
  external?: CellValue;
  total?: CellValue;
  result?: CellValue;
}

export interface StudentClassification {
  statuses: Record<string, SubjectStatus>;
  overall: OverallResult;
  failedCount: number;
  absentCount: number;
  failedSubjects: string[];
}

export function subjectCells(row: RawRow, subject: SubjectSchema): SubjectCells {
  const { Internal, External, Total, Result } = subject.columns;
  return {
    internal: Internal ? row[Internal] : undefined,
    external: External ? row[External] : undefined,
    total: Total ? row[Total] : undefined,
    result: Result ? row[Result] : undefined,
  };
}

/** An elective the student never registered for leaves every cell blank. */
export const isSubjectPresent = (cells: SubjectCells): boolean =>
  !isBlank(cells.internal) || !isBlank(cells.external) || !isBlank(cells.total) || !isBlank(cells.result);

export function classifySubject(cells: SubjectCells): SubjectStatus {
  const external = toMark(cells.external);
  const resultRaw = normalizeResultText(cells.result);

  if (external === 0 && ABSENT_TOKENS.includes(resultRaw)) return "Absent";
  if (FAIL_TOKENS.includes(resultRaw)) return "Fail";

  const marksAvailable = isNumericCell(cells.internal) || isNumericCell(cells.external);
  if (resultRaw === "" && marksAvailable) {
    if (toMark(cells.internal) + external < SUBJECT_PASS_MARK) return "Fail";
  }

  return "Pass";
}

export function aggregateResults(statuses: SubjectStatus[]): OverallResult {
  if (statuses.length === 0) return "P";
  if (statuses.every((s) => s === "Absent")) return "A";
  if (statuses.some((s) => s === "Fail" || s === "Absent")) return "F";
  return "P";
}

export function classifyStudent(row: RawRow, schema: SubjectSchema[]): StudentClassification {
  const statuses: Record<string, SubjectStatus> = {};
  const failedSubjects: string[] = [];
  let absentCount = 0;

  for (const subject of schema) {
    const cells = subjectCells(row, subject);
    if (!isSubjectPresent(cells)) continue;

    const status = classifySubject(cells);
    statuses[subject.code] = status;
    if (status === "Fail") failedSubjects.push(subject.code);
    if (status === "Absent") absentCount++;
  }

  // electives are skipped per subject; a row with no marks at all is absent everywhere
  if (schema.length > 0 && Object.keys(statuses).length === 0) {
    for (const subject of schema) statuses[subject.code] = "Absent";
    absentCount = schema.length;
  }

  return {
    statuses,
    overall: aggregateResults(Object.values(statuses)),
    failedCount: failedSubjects.length,
    absentCount,
    failedSubjects,
  };
}
