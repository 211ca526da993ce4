// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const intFromEnv = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const config = Object.freeze({
  port: intFromEnv(process.env.PORT, 3000),
  // empty → audit log is not persisted
  databaseURI: process.env.MONGODB_URI || "",
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  appName: process.env.APP_NAME || "Result Analyzer",
  resultCacheCapacity: intFromEnv(process.env.RESULT_CACHE_CAPACITY, 32),
  maxUploadMb: intFromEnv(process.env.MAX_UPLOAD_MB, 10),
  uploadsPerHour: intFromEnv(process.env.UPLOADS_PER_HOUR, 50),
});

export default config;
