// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import multer from "multer";

export interface ApiError extends Error {
  statusCode?: number;
  details?: unknown;
}

export function httpError(statusCode: number, message: string, details?: unknown): ApiError {
  const err: ApiError = new Error(message);
  err.statusCode = statusCode;
  if (details !== undefined) err.details = details;
  return err;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  // upload limits and filters surface as multer errors
  const status = err instanceof multer.MulterError ? 400 : err.statusCode || 500;

  if (status >= 500) console.error(`[ERROR] ${req.method} ${req.url}`, err);
  else console.warn(`[WARN] ${req.method} ${req.url}: ${err.message}`);

  res.status(status).json({
    success: false,
    message: err.message || "Internal Server Error",
    ...(err.details !== undefined && { details: err.details }),
  });
}
