// src/models/AuditLog.ts
import mongoose, { Schema, Document } from "mongoose";

export interface IAuditLog extends Document {
  action: string;
  dataset?: string;
  details: Record<string, unknown>;
  ip?: string;
  userAgent?: string;
  createdAt: Date;
}

const schema = new Schema<IAuditLog>(
  {
    action: { type: String, required: true, index: true },
    dataset: { type: String, index: true },
    details: { type: Schema.Types.Mixed, default: {} },
    ip: String,
    userAgent: String,
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

schema.index({ createdAt: -1 });

export default mongoose.model<IAuditLog>("AuditLog", schema);
