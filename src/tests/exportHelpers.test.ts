// src/tests/exportHelpers.test.ts
import xlsx, { type WorkBook } from "xlsx";
import { CATEGORY_SHEETS, exportCategoryWorkbook } from "../helpers/exportHelpers";
import { analyzeMarkSheet } from "../services/resultPipeline";
import { classSheet } from "./fixtures";

const readBack = (buffer: Buffer) => xlsx.read(buffer, { type: "buffer" });

const gridOf = (workbook: WorkBook, name: string): unknown[][] =>
  xlsx.utils.sheet_to_json<unknown[]>(workbook.Sheets[name], { header: 1 });

describe("📤 Category Export", () => {
  it("writes one sheet per category", async () => {
    const workbook = readBack(await exportCategoryWorkbook(analyzeMarkSheet(classSheet())));
    expect(workbook.SheetNames).toEqual(CATEGORY_SHEETS.map((s) => s.sheet));
    expect(workbook.SheetNames).toEqual(["FCD", "First Class", "Second Class", "Pass Class", "Failed", "Absent"]);
  });

  it("lists students with their marks and rank", async () => {
    const workbook = readBack(await exportCategoryWorkbook(analyzeMarkSheet(classSheet())));
    expect(gridOf(workbook, "FCD")).toEqual([
      ["Student ID", "Name", "Section", "Total Marks", "Percentage", "Class Rank"],
      ["1XY22CS001", "Asha", "Unassigned", 140, 70, 1],
      ["1XY22CS006", "Farid", "Unassigned", 140, 70, 1],
    ]);
    expect(gridOf(workbook, "First Class")).toEqual([
      ["Student ID", "Name", "Section", "Total Marks", "Percentage", "Class Rank"],
    ]);
  });

  it("names failed subjects on the Failed sheet", async () => {
    const workbook = readBack(await exportCategoryWorkbook(analyzeMarkSheet(classSheet())));
    const grid = gridOf(workbook, "Failed");
    expect(grid[0]).toEqual(["Student ID", "Name", "Section", "Total Marks", "Percentage", "Class Rank", "Failed Subjects"]);
    expect(grid).toHaveLength(3);
    expect(grid[2]).toEqual(["1XY22CS004", "Dev", "Unassigned", 93, 46.5, "-", "CS301"]);
  });

  it("adds an SGPA column when SGPA was computed", async () => {
    const result = analyzeMarkSheet(classSheet(), { credits: { CS301: 4, CS302: 3 } });
    const grid = gridOf(readBack(await exportCategoryWorkbook(result)), "Second Class");
    expect(grid).toEqual([
      ["Student ID", "Name", "Section", "Total Marks", "Percentage", "SGPA", "Class Rank"],
      ["1XY22CS002", "Bala", "Unassigned", 118, 59, 6.14, 3],
    ]);
  });
});
