// src/services/resultPipeline.ts
import type {
  AnalysisOptions,
  AnalysisResult,
  MarkSheet,
  ResultMode,
  SortMetric,
  StudentRecord,
  SubjectSchema,
} from "../types/results";
import { isBlank } from "../helpers/markRules";
import { detectSubjectSchema } from "./schemaDetector";
import { assignSection, normalizeMapping } from "./sectionAssigner";
import { classifyStudent } from "./resultClassifier";
import { assignCategory, computeMetrics } from "./metricsCalculator";
import { computeSgpa, reconcileSgpaResult, validateCreditConfig } from "./sgpaEngine";
import { rankStudents } from "./rankingEngine";
import { buildReport, computeKpis } from "./reportAggregator";

const findColumn = (columns: readonly string[], label: string): string | undefined =>
  columns.find((c) => c.trim().toLowerCase() === label);

const cellText = (value: unknown): string =>
  value === null || value === undefined ? "" : String(value).trim();

export function applySubjectFilter(
  schema: SubjectSchema[],
  filter: string[] | undefined,
  warnings: string[]
): SubjectSchema[] {
  if (!filter || filter.length === 0) return schema;

  const wanted = new Set(filter.map((code) => code.trim().toUpperCase()));
  const known = new Set(schema.map((s) => s.code.toUpperCase()));
  for (const code of wanted) {
    if (!known.has(code)) warnings.push(`Subject ${code} not found in the sheet; ignored.`);
  }
  return schema.filter((s) => wanted.has(s.code.toUpperCase()));
}

/**
 * Schema detection → section assignment → classification → metrics →
 * SGPA (when credits are given) → ranking → report. Pure: same sheet and
 * options always give the same result.
 */
export function analyzeMarkSheet(sheet: MarkSheet, options: AnalysisOptions = {}): AnalysisResult {
  const warnings: string[] = [];
  const { columns } = sheet;
  const rows = sheet.rows.filter((row) => columns.some((c) => !isBlank(row[c])));

  const schema = applySubjectFilter(detectSubjectSchema(columns, rows), options.subjects, warnings);
  const subjectCodes = schema.map((s) => s.code);

  const idColumn = columns[0];
  const nameColumn = findColumn(columns, "name");
  const sectionColumn = findColumn(columns, "section");

  const ranges = options.sections?.ranges ?? {};
  const mapping = normalizeMapping(options.sections?.mapping);

  const credits = options.credits !== undefined ? validateCreditConfig(options.credits, subjectCodes) : null;
  if (credits) warnings.push(...credits.warnings);
  const sgpaComputed = credits?.accepted ?? false;

  let mode: ResultMode = options.mode ?? "marks";
  if (mode === "sgpa" && !sgpaComputed) {
    warnings.push("SGPA mode needs a valid credit configuration; using marks mode.");
    mode = "marks";
  }

  let metric: SortMetric = options.metric ?? (mode === "sgpa" ? "sgpa" : "total_marks");
  if (metric === "sgpa" && !sgpaComputed) {
    warnings.push("Cannot sort by SGPA without a valid credit configuration; using total marks.");
    metric = "total_marks";
  }

  const records: StudentRecord[] = rows.map((row) => {
    const studentId = idColumn ? cellText(row[idColumn]) : "";
    const classification = classifyStudent(row, schema);
    const metrics = computeMetrics(row, schema);

    const record: StudentRecord = {
      student_id: studentId,
      name: nameColumn ? cellText(row[nameColumn]) : "",
      section: assignSection(
        studentId,
        ranges,
        mapping,
        sectionColumn ? cellText(row[sectionColumn]) : undefined
      ),
      subjects: metrics.subjects,
      subject_status: classification.statuses,
      overall_result: classification.overall,
      absent_subject_count: classification.absentCount,
      failed_subject_count: classification.failedCount,
      failed_subject_names: classification.failedSubjects,
      total_marks: metrics.totalMarks,
      total_internal: metrics.totalInternal,
      total_external: metrics.totalExternal,
      percentage: metrics.percentage,
      category: assignCategory(metrics.percentage, classification.overall),
    };

    if (credits && sgpaComputed) {
      const outcome = computeSgpa(row, schema, credits.credits);
      record.sgpa = outcome.sgpa;
      record.sgpa_result = reconcileSgpaResult(
        classification.overall,
        Object.keys(classification.statuses).length,
        outcome.creditedFail
      );
    }

    return record;
  });

  const ranked = rankStudents(records, mode, metric);

  return Object.freeze({
    subjects: subjectCodes,
    records: ranked,
    report: buildReport(ranked, metric),
    kpis: computeKpis(ranked),
    mode,
    metric,
    sgpaComputed,
    warnings,
  });
}
