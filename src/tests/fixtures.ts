// src/tests/fixtures.ts
import type { MarkSheet, RawRow } from "../types/results";

export const COLUMNS = [
  "USN",
  "Name",
  "CS301 Internal",
  "CS301 External",
  "CS301 Total",
  "CS301 Result",
  "CS302 Internal",
  "CS302 External",
  "CS302 Total",
  "CS302 Result",
  "Grand Total",
];

const student = (
  usn: string,
  name: string,
  cs301: [number, number, number, string],
  cs302: [number, number, number, string]
): RawRow => ({
  USN: usn,
  Name: name,
  "CS301 Internal": cs301[0],
  "CS301 External": cs301[1],
  "CS301 Total": cs301[2],
  "CS301 Result": cs301[3],
  "CS302 Internal": cs302[0],
  "CS302 External": cs302[1],
  "CS302 Total": cs302[2],
  "CS302 Result": cs302[3],
  "Grand Total": cs301[2] + cs302[2],
});

/**
 * 001 Asha   140 FCD        002 Bala  118 SC
 * 003 Chitra  CS301 absent  004 Dev   CS301 fails on marks
 * 005 Esha   absent in all  006 Farid 140 FCD
 */
export const classSheet = (): MarkSheet => ({
  columns: COLUMNS,
  rows: [
    student("1XY22CS001", "Asha", [30, 50, 80, "P"], [25, 35, 60, "P"]),
    student("1XY22CS002", "Bala", [28, 40, 68, "P"], [20, 30, 50, "P"]),
    student("1XY22CS003", "Chitra", [20, 0, 20, "A"], [22, 40, 62, "P"]),
    student("1XY22CS004", "Dev", [15, 10, 25, ""], [30, 38, 68, "P"]),
    student("1XY22CS005", "Esha", [10, 0, 10, "A"], [12, 0, 12, "ABSENT"]),
    student("1XY22CS006", "Farid", [30, 50, 80, "P"], [25, 35, 60, "P"]),
  ],
});

export const SECTION_RANGES: Record<string, [string, string]> = {
  A: ["1XY22CS001", "1XY22CS003"],
  B: ["1XY22CS004", "1XY22CS006"],
};

export const CLASS_CSV = [
  COLUMNS.join(","),
  "1XY22CS001,Asha,30,50,80,P,25,35,60,P,140",
  "1XY22CS002,Bala,28,40,68,P,20,30,50,P,118",
  "1XY22CS003,Chitra,20,0,20,A,22,40,62,P,82",
].join("\n");
