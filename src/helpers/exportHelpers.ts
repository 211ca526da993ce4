// src/helpers/exportHelpers.ts
import ExcelJS from "exceljs";
import type { Column, Font } from "exceljs";
import type { AnalysisResult, Category, StudentRecord } from "../types/results";
import { toNodeBuffer } from "../lib/bufferUtils";

export const CATEGORY_SHEETS: { category: Category; sheet: string }[] = [
  { category: "FCD", sheet: "FCD" },
  { category: "FC", sheet: "First Class" },
  { category: "SC", sheet: "Second Class" },
  { category: "PassClass", sheet: "Pass Class" },
  { category: "F", sheet: "Failed" },
  { category: "A", sheet: "Absent" },
];

const headerStyle: Partial<Font> = { bold: true, name: "Arial", size: 10 };

function columnsFor(result: AnalysisResult, category: Category): Partial<Column>[] {
  const columns: Partial<Column>[] = [
    { header: "Student ID", key: "studentId", width: 18 },
    { header: "Name", key: "name", width: 28 },
    { header: "Section", key: "section", width: 12 },
    { header: "Total Marks", key: "totalMarks", width: 12 },
    { header: "Percentage", key: "percentage", width: 12 },
  ];
  if (result.sgpaComputed) columns.push({ header: "SGPA", key: "sgpa", width: 8 });
  columns.push({ header: "Class Rank", key: "classRank", width: 11 });
  if (category === "F") columns.push({ header: "Failed Subjects", key: "failedSubjects", width: 36 });
  return columns;
}

const rowFor = (record: StudentRecord) => ({
  studentId: record.student_id,
  name: record.name,
  section: record.section,
  totalMarks: record.total_marks,
  percentage: record.percentage,
  sgpa: record.sgpa ?? "-",
  classRank: record.class_rank ?? "-",
  failedSubjects: record.failed_subject_names.join(", "),
});

/** One sheet per category; students keep their analysis order. */
export async function exportCategoryWorkbook(result: AnalysisResult): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();

  for (const { category, sheet: title } of CATEGORY_SHEETS) {
    const sheet = workbook.addWorksheet(title);
    sheet.columns = columnsFor(result, category);
    sheet.getRow(1).font = headerStyle;

    result.records
      .filter((record) => record.category === category)
      .forEach((record) => sheet.addRow(rowFor(record)));
  }

  return toNodeBuffer(await workbook.xlsx.writeBuffer());
}
