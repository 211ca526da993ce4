// src/lib/datasetStore.ts
import crypto from "crypto";
import type { MarkSheet } from "../types/results";
import { hashMarkSheet } from "./resultCache";

export interface StoredDataset {
  readonly id: string;
  readonly name: string;
  readonly branch?: string;
  readonly uploadedAt: Date;
  readonly contentHash: string;
  readonly sheet: MarkSheet;
}

export interface DatasetSummary {
  id: string;
  name: string;
  branch?: string;
  uploadedAt: string;
  students: number;
  columns: number;
}

/**
 * Uploaded mark sheets for the lifetime of the process. Callers create one
 * and hand it to whatever needs it; entries are frozen snapshots, a new
 * upload never mutates an existing one.
 */
export class DatasetStore {
  private readonly datasets = new Map<string, StoredDataset>();

  save(sheet: MarkSheet, meta: { name: string; branch?: string }): StoredDataset {
    const frozenSheet: MarkSheet = Object.freeze({
      columns: Object.freeze([...sheet.columns]),
      rows: Object.freeze(sheet.rows.map((row) => Object.freeze({ ...row }))),
    });

    const branch = meta.branch?.trim();
    const dataset: StoredDataset = Object.freeze({
      id: crypto.randomUUID(),
      name: meta.name.trim(),
      ...(branch ? { branch: branch.toUpperCase() } : {}),
      uploadedAt: new Date(),
      contentHash: hashMarkSheet(frozenSheet),
      sheet: frozenSheet,
    });

    this.datasets.set(dataset.id, dataset);
    return dataset;
  }

  get(id: string): StoredDataset | undefined {
    return this.datasets.get(id);
  }

  list(): StoredDataset[] {
    return [...this.datasets.values()];
  }

  delete(id: string): boolean {
    return this.datasets.delete(id);
  }

  get size(): number {
    return this.datasets.size;
  }
}

export const summarizeDataset = (dataset: StoredDataset): DatasetSummary => ({
  id: dataset.id,
  name: dataset.name,
  ...(dataset.branch ? { branch: dataset.branch } : {}),
  uploadedAt: dataset.uploadedAt.toISOString(),
  students: dataset.sheet.rows.length,
  columns: dataset.sheet.columns.length,
});
