// src/tests/subjectAnalysis.test.ts
import { analyzeSubject, analyzeSubjects } from "../services/subjectAnalysis";
import { analyzeMarkSheet } from "../services/resultPipeline";
import { classSheet } from "./fixtures";

describe("📚 Subject Analysis", () => {
  const { subjects, records } = analyzeMarkSheet(classSheet());

  it("counts outcomes per subject", () => {
    expect(analyzeSubjects(subjects, records)).toEqual([
      {
        code: "CS301",
        appeared: 6,
        passed: 3,
        failed: 1,
        absent: 2,
        passPercentage: 50,
        average: 47.17,
        highest: 80,
        lowest: 10,
      },
      {
        code: "CS302",
        appeared: 6,
        passed: 5,
        failed: 0,
        absent: 1,
        passPercentage: 83.33,
        average: 52,
        highest: 68,
        lowest: 12,
      },
    ]);
  });

  it("returns empty statistics for a subject nobody took", () => {
    expect(analyzeSubject("MA101", records)).toEqual({
      code: "MA101",
      appeared: 0,
      passed: 0,
      failed: 0,
      absent: 0,
      passPercentage: 0,
      average: null,
      highest: null,
      lowest: null,
    });
  });
});
