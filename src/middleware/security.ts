// src/middleware/security.ts
import rateLimit from "express-rate-limit";
import sanitize from "mongo-sanitize";
import { Request, Response, NextFunction } from "express";
import config from "../config/config";

export const uploadRateLimiter = rateLimit({
  windowMs: 60 * 60 * 1000, // 1 hour
  max: config.uploadsPerHour,
  message: { message: "Too many uploads from this IP. Please try again later." },
  standardHeaders: true,
  legacyHeaders: false,
});

export const sanitizeInput = (req: Request, _res: Response, next: NextFunction) => {
  if (req.body) {
    req.body = sanitize(req.body);
  }

  // query and params are getters on some Express versions; clean the values in place
  for (const key of Object.keys(req.query)) {
    req.query[key] = sanitize(req.query[key]);
  }
  for (const key of Object.keys(req.params)) {
    req.params[key] = sanitize(req.params[key]);
  }

  next();
};
