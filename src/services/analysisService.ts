// src/services/analysisService.ts
import type { AnalysisOptions, AnalysisResult, StudentRecord } from "../types/results";
import type { DatasetStore, StoredDataset } from "../lib/datasetStore";
import { ResultCache, buildResultCacheKey } from "../lib/resultCache";
import { normalizeIdentifier } from "../helpers/markRules";
import { httpError } from "../middleware/errorHandler";
import { analyzeMarkSheet } from "./resultPipeline";
import { metricValue } from "./rankingEngine";
import { analyzeSubjects, type SubjectStats } from "./subjectAnalysis";
import { compareBranches, type BranchIntelligence } from "./branchIntelligence";

export type RankingFilter = "ALL" | "PASS" | "FAIL";

export interface RankingListing {
  filter: RankingFilter;
  metric: AnalysisResult["metric"];
  kpis: AnalysisResult["kpis"];
  students: StudentRecord[];
}

/**
 * Ranked students first by rank (sheet order within a tie), then the
 * unranked ones by descending metric.
 */
export function rankingListing(result: AnalysisResult, filter: RankingFilter = "ALL"): RankingListing {
  const ordered = result.records
    .map((record, order) => ({ record, order }))
    .sort((a, b) => {
      const rankA = a.record.class_rank;
      const rankB = b.record.class_rank;
      if (rankA !== undefined && rankB !== undefined) return rankA - rankB || a.order - b.order;
      if (rankA !== undefined) return -1;
      if (rankB !== undefined) return 1;
      const valueA = metricValue(a.record, result.metric) ?? 0;
      const valueB = metricValue(b.record, result.metric) ?? 0;
      return valueB - valueA || a.order - b.order;
    })
    .map(({ record }) => record);

  const students = ordered.filter((record) => {
    if (filter === "PASS") return record.class_rank !== undefined;
    if (filter === "FAIL") return record.class_rank === undefined;
    return true;
  });

  return { filter, metric: result.metric, kpis: result.kpis, students };
}

/** Pipeline entry point for stored datasets, memoized per dataset content and options. */
export class ResultAnalyzer {
  constructor(
    private readonly store: DatasetStore,
    private readonly cache: ResultCache<AnalysisResult>
  ) {}

  requireDataset(id: string): StoredDataset {
    const dataset = this.store.get(id);
    if (!dataset) throw httpError(404, `Dataset ${id} not found`);
    return dataset;
  }

  analyze(dataset: StoredDataset, options: AnalysisOptions = {}): AnalysisResult {
    const key = buildResultCacheKey(dataset.contentHash, options);
    return this.cache.getOrCompute(key, () => {
      const result = analyzeMarkSheet(dataset.sheet, options);
      if (result.warnings.length) {
        console.warn(`[ResultPipeline] ${dataset.name}: ${result.warnings.join(" | ")}`);
      }
      return result;
    });
  }

  analyzeById(id: string, options: AnalysisOptions = {}): AnalysisResult {
    return this.analyze(this.requireDataset(id), options);
  }

  subjectStats(id: string, options: AnalysisOptions = {}): SubjectStats[] {
    const result = this.analyzeById(id, options);
    return analyzeSubjects(result.subjects, result.records);
  }

  findStudent(id: string, studentId: string, options: AnalysisOptions = {}): StudentRecord {
    const wanted = normalizeIdentifier(studentId);
    const record = this.analyzeById(id, options).records.find(
      (r) => normalizeIdentifier(r.student_id) === wanted
    );
    if (!record) throw httpError(404, `Student ${studentId} not found`);
    return record;
  }

  /** Branch-tagged datasets only; a filter narrows by branch name. */
  compareBranches(filter: { datasetIds?: string[]; branches?: string[]; subjects?: string[] } = {}): BranchIntelligence {
    const wantedBranches = filter.branches?.map((b) => b.trim().toUpperCase());
    const datasets = (filter.datasetIds ?? this.store.list().map((d) => d.id))
      .map((id) => this.requireDataset(id))
      .filter((d) => d.branch && (!wantedBranches?.length || wantedBranches.includes(d.branch)));

    if (datasets.length === 0) throw httpError(404, "No branch datasets to compare");

    const options: AnalysisOptions = filter.subjects?.length ? { subjects: filter.subjects } : {};
    return compareBranches(
      datasets.map((d) => ({ branch: d.branch ?? "", records: this.analyze(d, options).records }))
    );
  }
}
