/**
 * Audit Run MongoDB Model
 * Mongoose schema for audit runs
 */

import mongoose, { Schema } from 'mongoose';
import { AuditStatus, IAuditRun } from './audit.types';

const AuditRunSchema = new Schema<IAuditRun>(
  {
    seedUrl: {
      type: String,
      required: true,
      trim: true,
    },
    status: {
      type: String,
      enum: Object.values(AuditStatus),
      default: AuditStatus.QUEUED,
      index: true,
    },
    seedConfig: {
      type: Schema.Types.Mixed,
      required: true,
    },
    progress: {
      type: Schema.Types.Mixed,
      default: null,
    },
    report: {
      type: Schema.Types.Mixed,
      default: null,
    },
    error: {
      type: String,
      default: null,
    },
    startedAt: {
      type: Date,
      default: null,
    },
    completedAt: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

// Indexes for performance
AuditRunSchema.index({ createdAt: -1 });
AuditRunSchema.index({ status: 1, createdAt: -1 });

export const AuditRunModel = mongoose.model<IAuditRun>('AuditRun', AuditRunSchema);
