// src/services/branchIntelligence.ts
import type { StudentRecord } from "../types/results";
import { byKey, round2 } from "../helpers/markRules";

export interface BranchInput {
  branch: string;
  records: StudentRecord[];
}

export interface BranchSummary {
  branch: string;
  students: number;
  passed: number;
  failed: number;
  passPercentage: number;
}

export interface SubjectDifficulty {
  code: string;
  students: number;
  passed: number;
  failed: number;
  failRate: number;
}

export interface BranchIntelligence {
  totalStudents: number;
  totalBranches: number;
  totalSubjects: number;
  passPercentage: number;
  bestBranch: string;
  weakBranch: string;
  hardestSubject: string | null;
  easiestSubject: string | null;
  branches: BranchSummary[];
  subjects: SubjectDifficulty[];
}

const NOT_APPLICABLE = "N/A";

// Several sheets may belong to one branch; a student counts once per branch
function groupByBranch(inputs: BranchInput[]): Map<string, Map<string, StudentRecord>> {
  const branches = new Map<string, Map<string, StudentRecord>>();
  for (const { branch, records } of inputs) {
    const key = branch.trim().toUpperCase();
    const students = branches.get(key) ?? new Map<string, StudentRecord>();
    for (const record of records) {
      if (!students.has(record.student_id)) students.set(record.student_id, record);
    }
    branches.set(key, students);
  }
  return branches;
}

export function summarizeBranch(branch: string, records: StudentRecord[]): BranchSummary {
  const passed = records.filter((r) => r.overall_result === "P").length;
  return {
    branch,
    students: records.length,
    passed,
    failed: records.length - passed,
    passPercentage: records.length > 0 ? round2((passed / records.length) * 100) : 0,
  };
}

export function subjectDifficulty(records: StudentRecord[]): SubjectDifficulty[] {
  const stats = new Map<string, SubjectDifficulty>();
  for (const record of records) {
    for (const [code, status] of Object.entries(record.subject_status)) {
      const entry = stats.get(code) ?? { code, students: 0, passed: 0, failed: 0, failRate: 0 };
      entry.students++;
      if (status === "Pass") entry.passed++;
      if (status === "Fail") entry.failed++;
      stats.set(code, entry);
    }
  }

  return [...stats.values()]
    .map((s) => ({ ...s, failRate: s.students > 0 ? round2((s.failed / s.students) * 100) : 0 }))
    .sort((a, b) => byKey(a.code, b.code));
}

/**
 * Compares branches by pass rate and subjects by fail rate. Best and weak
 * branch need at least two branches; ties go to the first name.
 */
export function compareBranches(inputs: BranchInput[]): BranchIntelligence {
  const grouped = groupByBranch(inputs);
  const branches = [...grouped.keys()]
    .sort(byKey)
    .map((name) => summarizeBranch(name, [...(grouped.get(name)?.values() ?? [])]));

  const allRecords = [...grouped.values()].flatMap((students) => [...students.values()]);
  const subjects = subjectDifficulty(allRecords);
  const overall = summarizeBranch("ALL", allRecords);

  let bestBranch = NOT_APPLICABLE;
  let weakBranch = NOT_APPLICABLE;
  if (branches.length > 1) {
    bestBranch = branches.reduce((best, b) => (b.passPercentage > best.passPercentage ? b : best)).branch;
    weakBranch = branches.reduce((weak, b) => (b.passPercentage < weak.passPercentage ? b : weak)).branch;
  }

  const hardest = subjects.length
    ? subjects.reduce((hard, s) => (s.failRate > hard.failRate ? s : hard))
    : null;
  const easiest = subjects.length
    ? subjects.reduce((easy, s) => (s.failRate < easy.failRate ? s : easy))
    : null;

  return {
    totalStudents: overall.students,
    totalBranches: branches.length,
    totalSubjects: subjects.length,
    passPercentage: overall.passPercentage,
    bestBranch,
    weakBranch,
    hardestSubject: hardest?.code ?? null,
    easiestSubject: easiest?.code ?? null,
    branches,
    subjects,
  };
}
