// src/services/sheetImporter.ts
import papa from "papaparse";
import xlsx from "xlsx";
import { SUBJECT_SUFFIXES, type CellValue, type MarkSheet, type RawRow } from "../types/results";
import { isBlank } from "../helpers/markRules";
import { httpError } from "../middleware/errorHandler";

export interface ImportResult {
  sheet: MarkSheet;
  headerRows: 1 | 2;
  warnings: string[];
}

const SUFFIX_WORDS = new Set(SUBJECT_SUFFIXES.map((s) => s.toLowerCase()));

const headerText = (value: CellValue): string => (isBlank(value) ? "" : String(value).trim());

/** The second row is a header row when it names at least one mark component. */
export function hasTwoRowHeader(grid: CellValue[][]): boolean {
  const second = grid[1] ?? [];
  return second.some((cell) => SUFFIX_WORDS.has(headerText(cell).toLowerCase()));
}

/**
 * Flattens a two-row header: the upper label carries over merged cells,
 * "Name" stays as is, otherwise "<upper> <lower>".
 */
export function flattenHeaders(upper: CellValue[], lower: CellValue[]): string[] {
  const width = Math.max(upper.length, lower.length);
  const names: string[] = [];
  let carried = "";

  for (let i = 0; i < width; i++) {
    let top = headerText(upper[i]);
    const bottom = headerText(lower[i]);

    if (top) carried = top;
    else if (bottom) top = carried;

    if (top.toLowerCase() === "name") names.push("Name");
    else if (top && bottom) names.push(`${top} ${bottom}`);
    else names.push(top || bottom);
  }
  return names;
}

export function dedupeColumns(names: string[], warnings: string[]): string[] {
  const seen = new Map<string, number>();
  return names.map((name) => {
    if (!name) return name;
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    if (count === 1) return name;
    warnings.push(`Duplicate column "${name}" renamed to "${name} (${count})".`);
    return `${name} (${count})`;
  });
}

export function gridToMarkSheet(grid: CellValue[][], warnings: string[] = []): ImportResult {
  if (grid.length === 0) throw httpError(400, "File is empty");

  const twoRows = hasTwoRowHeader(grid);
  const rawNames = twoRows ? flattenHeaders(grid[0], grid[1]) : (grid[0] ?? []).map(headerText);
  const names = dedupeColumns(rawNames, warnings);

  const kept = names
    .map((name, index) => ({ name, index }))
    .filter((c) => c.name !== "");

  const rows: RawRow[] = grid
    .slice(twoRows ? 2 : 1)
    .filter((cells) => kept.some((c) => !isBlank(cells[c.index])))
    .map((cells) => {
      const row: RawRow = {};
      for (const c of kept) row[c.name] = cells[c.index] ?? "";
      return row;
    });

  if (rows.length === 0) throw httpError(400, "File has no student rows");

  return {
    sheet: { columns: kept.map((c) => c.name), rows },
    headerRows: twoRows ? 2 : 1,
    warnings,
  };
}

function parseCsv(buffer: Buffer): ImportResult {
  const parsed = papa.parse<string[]>(buffer.toString("utf-8"), {
    skipEmptyLines: true,
    transform: (v) => v.trim(),
  });
  // a single-column file has no delimiter to detect; the comma default is fine
  const errors = parsed.errors.filter((e) => e.code !== "UndetectableDelimiter");
  if (errors.length) {
    throw httpError(400, `CSV parse error: ${errors[0].message}`);
  }
  return gridToMarkSheet(parsed.data);
}

function parseWorkbook(buffer: Buffer): ImportResult {
  const workbook = xlsx.read(buffer, { type: "buffer" });
  const firstSheet = workbook.SheetNames[0];
  if (!firstSheet) throw httpError(400, "Workbook has no sheets");

  const grid = xlsx.utils.sheet_to_json<CellValue[]>(workbook.Sheets[firstSheet], {
    header: 1,
    defval: "",
    blankrows: false,
  });
  return gridToMarkSheet(grid);
}

/** Decodes an uploaded CSV or Excel mark sheet into ordered columns and rows. */
export function importMarkSheet(buffer: Buffer, filename: string): ImportResult {
  const result = filename.toLowerCase().endsWith(".csv") ? parseCsv(buffer) : parseWorkbook(buffer);

  console.log(
    `[SheetImporter] ${filename}: ${result.sheet.rows.length} rows, ${result.sheet.columns.length} columns, ${result.headerRows}-row header`
  );
  return result;
}
