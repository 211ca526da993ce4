// src/services/subjectAnalysis.ts
import type { StudentRecord } from "../types/results";
import { round2 } from "../helpers/markRules";

export interface SubjectStats {
  code: string;
  appeared: number;
  passed: number;
  failed: number;
  absent: number;
  passPercentage: number;
  average: number | null;
  highest: number | null;
  lowest: number | null;
}

export function analyzeSubject(code: string, records: StudentRecord[]): SubjectStats {
  const stats: SubjectStats = {
    code,
    appeared: 0,
    passed: 0,
    failed: 0,
    absent: 0,
    passPercentage: 0,
    average: null,
    highest: null,
    lowest: null,
  };

  const totals: number[] = [];
  for (const record of records) {
    const status = record.subject_status[code];
    if (!status) continue;

    stats.appeared++;
    if (status === "Pass") stats.passed++;
    else if (status === "Fail") stats.failed++;
    else stats.absent++;

    const total = record.subjects[code]?.total ?? 0;
    if (total > 0) totals.push(total);
  }

  if (stats.appeared > 0) stats.passPercentage = round2((stats.passed / stats.appeared) * 100);
  if (totals.length > 0) {
    stats.average = round2(totals.reduce((a, b) => a + b, 0) / totals.length);
    stats.highest = Math.max(...totals);
    stats.lowest = Math.min(...totals);
  }
  return stats;
}

export const analyzeSubjects = (subjects: string[], records: StudentRecord[]): SubjectStats[] =>
  subjects.map((code) => analyzeSubject(code, records));
