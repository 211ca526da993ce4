// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import { sanitizeInput } from "./middleware/security";
import { DatasetStore } from "./lib/datasetStore";
import { ResultCache } from "./lib/resultCache";
import { ResultAnalyzer } from "./services/analysisService";
import type { AnalysisResult } from "./types/results";

// Routes
import createDatasetRouter from "./routes/datasets";
import createBranchRouter from "./routes/branches";

export interface AppDependencies {
  store?: DatasetStore;
  cache?: ResultCache<AnalysisResult>;
}

/** The caller owns the store and cache; each app gets fresh ones unless given. */
export function createApp({
  store = new DatasetStore(),
  cache = new ResultCache<AnalysisResult>(config.resultCacheCapacity),
}: AppDependencies = {}) {
  const app = express();
  const analyzer = new ResultAnalyzer(store, cache);

  // Security & Performance Middleware
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(
    cors({
      origin: [config.frontendUrl, "http://127.0.0.1:3000"],
      credentials: true,
    })
  );

  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: true, limit: "10mb" }));
  app.use(sanitizeInput);

  // Health check
  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "OK",
      app: config.appName,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      datasets: store.size,
      cache: cache.stats(),
    });
  });

  // API Routes
  app.use("/datasets", createDatasetRouter(store, analyzer));
  app.use("/branches", createBranchRouter(analyzer));

  app.use((req, res) => {
    res.status(404).json({
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}

export default createApp;
