// src/tests/datasetStore.test.ts
import { DatasetStore, summarizeDataset } from "../lib/datasetStore";
import { hashMarkSheet } from "../lib/resultCache";
import { classSheet } from "./fixtures";

describe("🗂️ Dataset Store", () => {
  it("saves a frozen snapshot with a content hash", () => {
    const store = new DatasetStore();
    const sheet = classSheet();
    const dataset = store.save(sheet, { name: " Sem 5 ", branch: " cse " });

    expect(dataset.name).toBe("Sem 5");
    expect(dataset.branch).toBe("CSE");
    expect(dataset.contentHash).toBe(hashMarkSheet(sheet));
    expect(Object.isFrozen(dataset.sheet.rows[0])).toBe(true);
    expect(store.get(dataset.id)).toBe(dataset);
  });

  it("is unaffected by later changes to the source rows", () => {
    const store = new DatasetStore();
    const rows = [{ USN: "1XY22CS001", "CS301 Total": 80 }];
    const dataset = store.save({ columns: ["USN", "CS301 Total"], rows }, { name: "Copy" });
    rows[0]["CS301 Total"] = 10;
    expect(dataset.sheet.rows[0]["CS301 Total"]).toBe(80);
  });

  it("lists in insertion order and deletes", () => {
    const store = new DatasetStore();
    const first = store.save(classSheet(), { name: "One" });
    const second = store.save(classSheet(), { name: "Two", branch: "  " });

    expect(store.list().map((d) => d.name)).toEqual(["One", "Two"]);
    expect(second.branch).toBeUndefined();
    expect(first.id).not.toBe(second.id);

    expect(store.delete(first.id)).toBe(true);
    expect(store.delete(first.id)).toBe(false);
    expect(store.size).toBe(1);
  });

  it("summarises without the rows", () => {
    const store = new DatasetStore();
    const dataset = store.save(classSheet(), { name: "Sem 5", branch: "ece" });
    expect(summarizeDataset(dataset)).toEqual({
      id: dataset.id,
      name: "Sem 5",
      branch: "ECE",
      uploadedAt: dataset.uploadedAt.toISOString(),
      students: 6,
      columns: 11,
    });
  });
});
