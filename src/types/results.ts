// src/types/results.ts

export type CellValue = string | number | boolean | null | undefined;

export type RawRow = Record<string, CellValue>;

/** A decoded sheet: ordered column names plus one row per student. */
export interface MarkSheet {
  readonly columns: readonly string[];
  readonly rows: readonly RawRow[];
}

export const SUBJECT_SUFFIXES = ["Internal", "External", "Total", "Result"] as const;
export type SubjectSuffix = (typeof SUBJECT_SUFFIXES)[number];

export interface SubjectColumn {
  column: string;
  code: string;
  suffix: SubjectSuffix;
}

export interface SubjectSchema {
  code: string;
  columns: Partial<Record<SubjectSuffix, string>>;
}

export type SubjectStatus = "Pass" | "Fail" | "Absent";
export type OverallResult = "P" | "F" | "A";
export type Category = "FCD" | "FC" | "SC" | "PassClass" | "F" | "A";
export type SgpaResult = "Pass" | "Fail" | "Absent";

export interface SubjectMarks {
  internal: number;
  external: number;
  total: number;
  result_raw: string;
}

export interface StudentRecord {
  student_id: string;
  name: string;
  section: string;
  subjects: Record<string, SubjectMarks>;
  subject_status: Record<string, SubjectStatus>;
  overall_result: OverallResult;
  absent_subject_count: number;
  failed_subject_count: number;
  failed_subject_names: string[];
  total_marks: number;
  total_internal: number;
  total_external: number;
  percentage: number;
  category: Category;
  sgpa?: number;
  sgpa_result?: SgpaResult;
  class_rank?: number;
  section_rank?: number;
}

export type SectionRanges = Record<string, [string, string]>;
export type SectionMapping = Record<string, string>;

export interface SectionConfig {
  ranges?: SectionRanges;
  mapping?: SectionMapping;
}

export type CreditConfig = Record<string, number>;

export type ResultMode = "marks" | "sgpa";
export type SortMetric = "total_marks" | "total_internal" | "total_external" | "sgpa";

export interface AnalysisOptions {
  sections?: SectionConfig;
  credits?: CreditConfig;
  mode?: ResultMode;
  metric?: SortMetric;
  subjects?: string[];
}

export interface CategoryBreakdown {
  section: string;
  FCD: number;
  FC: number;
  SC: number;
  PassClass: number;
  failed: number;
  absent: number;
  total: number;
}

export interface RankedStudent {
  student_id: string;
  name: string;
  section: string;
  value: number;
}

export interface ResultReport {
  metric: SortMetric;
  breakdown: CategoryBreakdown[];
  top: RankedStudent[];
  bottom: RankedStudent[];
  toppers: RankedStudent[];
}

export interface ResultKpis {
  totalStudents: number;
  presentStudents: number;
  passedStudents: number;
  failedStudents: number;
  absentStudents: number;
  passPercentage: number;
}

export interface AnalysisResult {
  subjects: string[];
  records: StudentRecord[];
  report: ResultReport;
  kpis: ResultKpis;
  mode: ResultMode;
  metric: SortMetric;
  sgpaComputed: boolean;
  warnings: string[];
}
