// src/middleware/upload.ts
import multer from "multer";
import path from "path";
import config from "../config/config";
import { httpError } from "./errorHandler";

export const MARK_SHEET_EXTENSIONS = [".csv", ".xlsx", ".xls"];

const storage = multer.memoryStorage();

export const uploadMarkSheet = multer({
  storage,
  limits: { fileSize: config.maxUploadMb * 1024 * 1024 },
  fileFilter: (_req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (!MARK_SHEET_EXTENSIONS.includes(ext)) {
      return cb(httpError(400, "Only CSV and Excel files allowed"));
    }
    cb(null, true);
  },
});
