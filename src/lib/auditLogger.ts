// src/lib/auditLogger.ts
import mongoose from "mongoose";
import { Request } from "express";
import AuditLog from "../models/AuditLog";

const CONNECTED = 1;

export async function logAudit(
  req: Request,
  {
    action,
    dataset,
    details = {},
  }: {
    action: string;
    dataset?: string;
    details?: Record<string, unknown>;
  }
): Promise<void> {
  // nothing to write to without a database
  if (mongoose.connection.readyState !== CONNECTED) return;

  const forwarded = req.headers["x-forwarded-for"];
  const ip = (Array.isArray(forwarded) ? forwarded[0] : forwarded) || req.socket.remoteAddress || req.ip;

  try {
    await AuditLog.create({
      action,
      ...(dataset && { dataset }),
      details,
      ip,
      userAgent: req.headers["user-agent"],
    });
  } catch (err) {
    console.error("Audit log failed:", err);
  }
}
