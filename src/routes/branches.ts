// src/routes/branches.ts
import { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { httpError } from "../middleware/errorHandler";
import type { ResultAnalyzer } from "../services/analysisService";

function stringList(value: unknown, field: string, errors: string[]): string[] | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value) && value.every((v) => typeof v === "string")) return value;
  errors.push(`${field} must be an array of strings`);
  return undefined;
}

export default function createBranchRouter(analyzer: ResultAnalyzer): Router {
  const router = Router();

  // Compare every branch-tagged dataset, or the ones named in the body
  router.post(
    "/compare",
    asyncHandler(async (req: Request, res: Response) => {
      const body: Record<string, unknown> = req.body ?? {};
      const errors: string[] = [];
      const datasetIds = stringList(body.datasetIds, "datasetIds", errors);
      const branches = stringList(body.branches, "branches", errors);
      const subjects = stringList(body.subjects, "subjects", errors);
      if (errors.length) throw httpError(400, "Invalid branch comparison request", errors);

      res.json(analyzer.compareBranches({ datasetIds, branches, subjects }));
    })
  );

  return router;
}
