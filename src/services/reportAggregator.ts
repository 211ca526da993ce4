// src/services/reportAggregator.ts
import type {
  CategoryBreakdown,
  RankedStudent,
  ResultKpis,
  ResultReport,
  SortMetric,
  StudentRecord,
} from "../types/results";
import { OVERALL_SECTION, byKey, round2 } from "../helpers/markRules";
import { metricValue } from "./rankingEngine";

export const TOP_LIST_SIZE = 5;

export function emptyBreakdown(section: string): CategoryBreakdown {
  return { section, FCD: 0, FC: 0, SC: 0, PassClass: 0, failed: 0, absent: 0, total: 0 };
}

export function breakdownFor(section: string, records: StudentRecord[]): CategoryBreakdown {
  const counts = emptyBreakdown(section);
  for (const record of records) {
    counts.total++;
    if (record.overall_result === "A") counts.absent++;
    else if (record.overall_result === "F") counts.failed++;
    else if (record.category === "FCD") counts.FCD++;
    else if (record.category === "FC") counts.FC++;
    else if (record.category === "SC") counts.SC++;
    else counts.PassClass++;
  }
  return counts;
}

/** Per-section counts in section-name order, followed by the "Overall" union. */
export function categoryBreakdown(records: StudentRecord[]): CategoryBreakdown[] {
  const bySection = new Map<string, StudentRecord[]>();
  for (const record of records) {
    const members = bySection.get(record.section) ?? [];
    members.push(record);
    bySection.set(record.section, members);
  }

  const sections = [...bySection.keys()].sort(byKey);
  return [
    ...sections.map((name) => breakdownFor(name, bySection.get(name) ?? [])),
    breakdownFor(OVERALL_SECTION, records),
  ];
}

function withMetric(records: StudentRecord[], metric: SortMetric): (RankedStudent & { order: number })[] {
  const entries: (RankedStudent & { order: number })[] = [];
  records.forEach((record, order) => {
    const value = metricValue(record, metric);
    if (value === undefined) return;
    entries.push({
      student_id: record.student_id,
      name: record.name,
      section: record.section,
      value,
      order,
    });
  });
  return entries;
}

const strip = ({ order: _order, ...student }: RankedStudent & { order: number }): RankedStudent => student;

// Ties keep sheet order in both lists
export function topStudents(records: StudentRecord[], metric: SortMetric, size = TOP_LIST_SIZE): RankedStudent[] {
  return withMetric(records, metric)
    .sort((a, b) => b.value - a.value || a.order - b.order)
    .slice(0, size)
    .map(strip);
}

export function bottomStudents(records: StudentRecord[], metric: SortMetric, size = TOP_LIST_SIZE): RankedStudent[] {
  return withMetric(records, metric)
    .sort((a, b) => a.value - b.value || a.order - b.order)
    .slice(0, size)
    .map(strip);
}

export function sectionToppers(records: StudentRecord[], metric: SortMetric): RankedStudent[] {
  const toppers = new Map<string, RankedStudent>();
  for (const entry of withMetric(records, metric)) {
    const current = toppers.get(entry.section);
    if (!current || entry.value > current.value) toppers.set(entry.section, strip(entry));
  }
  return [...toppers.keys()].sort(byKey).flatMap((section) => {
    const topper = toppers.get(section);
    return topper ? [topper] : [];
  });
}

export function computeKpis(records: StudentRecord[]): ResultKpis {
  const totalStudents = records.length;
  const passedStudents = records.filter((r) => r.overall_result === "P").length;
  const failedStudents = records.filter((r) => r.overall_result === "F").length;
  const absentStudents = records.filter((r) => r.overall_result === "A").length;

  return {
    totalStudents,
    presentStudents: totalStudents - absentStudents,
    passedStudents,
    failedStudents,
    absentStudents,
    passPercentage: totalStudents > 0 ? round2((passedStudents / totalStudents) * 100) : 0,
  };
}

export function buildReport(records: StudentRecord[], metric: SortMetric): ResultReport {
  return {
    metric,
    breakdown: categoryBreakdown(records),
    top: topStudents(records, metric),
    bottom: bottomStudents(records, metric),
    toppers: sectionToppers(records, metric),
  };
}
