// src/services/rankingEngine.ts
import type { ResultMode, SortMetric, StudentRecord } from "../types/results";

export function metricValue(record: StudentRecord, metric: SortMetric): number | undefined {
  switch (metric) {
    case "total_marks":
      return record.total_marks;
    case "total_internal":
      return record.total_internal;
    case "total_external":
      return record.total_external;
    case "sgpa":
      return record.sgpa;
  }
}

export function isPassing(record: StudentRecord, mode: ResultMode): boolean {
  return mode === "sgpa" ? record.sgpa_result === "Pass" : record.overall_result === "P";
}

/**
 * Competition ("min") ranking, highest value first: tied values share a
 * rank and the next value's rank is 1 + the number of entries above it.
 */
export function competitionRank(values: number[]): number[] {
  const sorted = [...values].sort((a, b) => b - a);
  const firstPosition = new Map<number, number>();
  sorted.forEach((value, i) => {
    if (!firstPosition.has(value)) firstPosition.set(value, i + 1);
  });
  return values.map((value) => firstPosition.get(value) ?? sorted.length);
}

function rankGroup(
  records: StudentRecord[],
  mode: ResultMode,
  metric: SortMetric,
  assign: (index: number, rank: number) => void
): void {
  const eligible: { index: number; value: number }[] = [];
  records.forEach((record, index) => {
    const value = metricValue(record, metric);
    if (value === undefined || !isPassing(record, mode)) return;
    eligible.push({ index, value });
  });

  const ranks = competitionRank(eligible.map((e) => e.value));
  eligible.forEach((e, i) => assign(e.index, ranks[i]));
}

/** Returns new records with class_rank and section_rank set for passing students only. */
export function rankStudents(
  records: StudentRecord[],
  mode: ResultMode,
  metric: SortMetric
): StudentRecord[] {
  const ranked: StudentRecord[] = records.map((record) => ({
    ...record,
    class_rank: undefined,
    section_rank: undefined,
  }));

  rankGroup(ranked, mode, metric, (index, rank) => {
    ranked[index].class_rank = rank;
  });

  const sections = new Map<string, number[]>();
  ranked.forEach((record, index) => {
    const indices = sections.get(record.section) ?? [];
    indices.push(index);
    sections.set(record.section, indices);
  });

  for (const indices of sections.values()) {
    const members = indices.map((i) => ranked[i]);
    rankGroup(members, mode, metric, (local, rank) => {
      ranked[indices[local]].section_rank = rank;
    });
  }

  return ranked;
}
