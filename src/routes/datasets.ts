// src/routes/datasets.ts
import { Router, Request, Response } from "express";
import type { CellValue, RawRow } from "../types/results";
import { DatasetStore, summarizeDataset } from "../lib/datasetStore";
import { logAudit } from "../lib/auditLogger";
import { asyncHandler } from "../middleware/asyncHandler";
import { httpError } from "../middleware/errorHandler";
import { uploadRateLimiter } from "../middleware/security";
import { uploadMarkSheet } from "../middleware/upload";
import { parseAnalysisOptions } from "../helpers/analysisOptions";
import { exportCategoryWorkbook } from "../helpers/exportHelpers";
import { importMarkSheet } from "../services/sheetImporter";
import { detectSubjectCodes } from "../services/schemaDetector";
import { ResultAnalyzer, rankingListing, type RankingFilter } from "../services/analysisService";

const RANKING_FILTERS: RankingFilter[] = ["ALL", "PASS", "FAIL"];

const optionalText = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

const isCell = (value: unknown): value is CellValue =>
  value === null || ["string", "number", "boolean", "undefined"].includes(typeof value);

function parseJsonRows(body: Record<string, unknown>): { columns: string[]; rows: RawRow[] } {
  if (!Array.isArray(body.rows) || body.rows.length === 0) {
    throw httpError(400, "rows must be a non-empty array");
  }

  const rows: RawRow[] = [];
  body.rows.forEach((raw: unknown, index: number) => {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw httpError(400, `Row ${index + 1} must be an object`);
    }
    const row: RawRow = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!isCell(value)) throw httpError(400, `Row ${index + 1}: ${key} must be a plain value`);
      row[key] = value;
    }
    rows.push(row);
  });

  let columns: string[];
  if (body.columns === undefined) {
    // key order of the first row, then anything later rows add
    columns = [...new Set(rows.flatMap((row) => Object.keys(row)))];
  } else if (Array.isArray(body.columns) && body.columns.every((c: unknown) => typeof c === "string")) {
    columns = body.columns;
  } else {
    throw httpError(400, "columns must be an array of column names");
  }

  return { columns, rows };
}

export default function createDatasetRouter(store: DatasetStore, analyzer: ResultAnalyzer): Router {
  const router = Router();

  const describe = (id: string) => {
    const dataset = analyzer.requireDataset(id);
    return {
      ...summarizeDataset(dataset),
      subjects: detectSubjectCodes(dataset.sheet.columns, dataset.sheet.rows),
    };
  };

  router.post(
    "/upload",
    uploadRateLimiter,
    uploadMarkSheet.single("file"),
    asyncHandler(async (req: Request, res: Response) => {
      if (!req.file) {
        await logAudit(req, { action: "dataset_upload_no_file" });
        throw httpError(400, "No file uploaded");
      }

      try {
        const imported = importMarkSheet(req.file.buffer, req.file.originalname);
        const dataset = store.save(imported.sheet, {
          name: optionalText(req.body?.name) ?? req.file.originalname,
          branch: optionalText(req.body?.branch),
        });

        await logAudit(req, {
          action: "dataset_uploaded",
          dataset: dataset.id,
          details: { filename: req.file.originalname, rows: imported.sheet.rows.length },
        });

        res.status(201).json({ ...describe(dataset.id), warnings: imported.warnings });
      } catch (err) {
        await logAudit(req, {
          action: "dataset_upload_failed",
          details: {
            filename: req.file.originalname,
            error: err instanceof Error ? err.message : String(err),
          },
        });
        throw err;
      }
    })
  );

  router.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const body: Record<string, unknown> = req.body ?? {};
      const name = optionalText(body.name);
      if (!name) throw httpError(400, "name is required");

      const sheet = parseJsonRows(body);
      const dataset = store.save(sheet, { name, branch: optionalText(body.branch) });
      console.log(`Dataset stored → ${dataset.name} (${dataset.id})`);

      await logAudit(req, { action: "dataset_created", dataset: dataset.id, details: { rows: sheet.rows.length } });
      res.status(201).json(describe(dataset.id));
    })
  );

  router.get("/", (_req: Request, res: Response) => {
    res.json(store.list().map(summarizeDataset));
  });

  router.get(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      res.json(describe(req.params.id));
    })
  );

  router.delete(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      if (!store.delete(req.params.id)) throw httpError(404, `Dataset ${req.params.id} not found`);
      await logAudit(req, { action: "dataset_deleted", dataset: req.params.id });
      res.json({ message: "Dataset deleted" });
    })
  );

  router.post(
    "/:id/analysis",
    asyncHandler(async (req: Request, res: Response) => {
      const options = parseAnalysisOptions(req.body);
      const result = analyzer.analyzeById(req.params.id, options);

      await logAudit(req, {
        action: "analysis_run",
        dataset: req.params.id,
        details: { mode: result.mode, metric: result.metric, students: result.records.length },
      });
      res.json(result);
    })
  );

  router.post(
    "/:id/ranking",
    asyncHandler(async (req: Request, res: Response) => {
      const { filter = "ALL", ...rest } = req.body ?? {};
      const rankingFilter = RANKING_FILTERS.find((f) => f === String(filter).toUpperCase());
      if (!rankingFilter) {
        throw httpError(400, "Invalid ranking filter", [`filter must be one of ${RANKING_FILTERS.join(", ")}`]);
      }

      const result = analyzer.analyzeById(req.params.id, parseAnalysisOptions(rest));
      res.json({ ...rankingListing(result, rankingFilter), warnings: result.warnings });
    })
  );

  router.post(
    "/:id/subjects",
    asyncHandler(async (req: Request, res: Response) => {
      res.json(analyzer.subjectStats(req.params.id, parseAnalysisOptions(req.body)));
    })
  );

  router.post(
    "/:id/students/:studentId",
    asyncHandler(async (req: Request, res: Response) => {
      res.json(analyzer.findStudent(req.params.id, req.params.studentId, parseAnalysisOptions(req.body)));
    })
  );

  router.post(
    "/:id/export",
    asyncHandler(async (req: Request, res: Response) => {
      const dataset = analyzer.requireDataset(req.params.id);
      const result = analyzer.analyze(dataset, parseAnalysisOptions(req.body));
      const buffer = await exportCategoryWorkbook(result);

      const fileName = `Results_${dataset.name.replace(/[^a-zA-Z0-9]/g, "_").replace(/_+/g, "_").replace(/^_|_$/g, "") || "export"}.xlsx`;

      await logAudit(req, { action: "results_exported", dataset: dataset.id, details: { fileName } });
      res
        .header("Content-Type", "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet")
        .header("Access-Control-Expose-Headers", "Content-Disposition")
        .attachment(fileName)
        .send(buffer);
    })
  );

  return router;
}
