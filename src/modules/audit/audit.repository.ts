/**
 * Audit Repository
 * Data access layer for audit runs
 */

import mongoose, { HydratedDocument } from 'mongoose';
import { AuditRunModel } from './audit.model';
import { AuditRunRecord, AuditRunUpdate, AuditStatus, IAuditRun } from './audit.types';
import type { CrawlProgress, SeedConfiguration } from '../../lib/crawling/crawling.types';

export interface NewAuditRun {
  seedUrl: string;
  seedConfig: SeedConfiguration;
}

export interface AuditRepository {
  create(data: NewAuditRun): Promise<AuditRunRecord>;
  findById(id: string): Promise<AuditRunRecord | null>;
  getRecent(limit: number): Promise<AuditRunRecord[]>;
  count(): Promise<number>;
  updateStatus(id: string, status: AuditStatus, update?: AuditRunUpdate): Promise<AuditRunRecord | null>;
  updateProgress(id: string, progress: CrawlProgress): Promise<void>;
  delete(id: string): Promise<boolean>;
}

/**
 * Timestamp fields maintained by a status change
 */
export function statusTimestamps(status: AuditStatus, now: Date = new Date()): Partial<IAuditRun> {
  if (status === AuditStatus.RUNNING) {
    return { startedAt: now };
  }
  if (status === AuditStatus.COMPLETED || status === AuditStatus.FAILED || status === AuditStatus.CANCELLED) {
    return { completedAt: now };
  }
  return {};
}

type AuditRunDocument = HydratedDocument<IAuditRun>;

function toRecord(doc: AuditRunDocument): AuditRunRecord {
  return {
    id: doc._id.toString(),
    seedUrl: doc.seedUrl,
    status: doc.status,
    seedConfig: doc.seedConfig,
    progress: doc.progress,
    report: doc.report,
    error: doc.error,
    startedAt: doc.startedAt,
    completedAt: doc.completedAt,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoAuditRepository implements AuditRepository {
  private model = AuditRunModel;

  /**
   * Create a new audit run
   */
  async create(data: NewAuditRun): Promise<AuditRunRecord> {
    const run = await this.model.create({
      seedUrl: data.seedUrl,
      seedConfig: data.seedConfig,
      status: AuditStatus.QUEUED,
    });
    return toRecord(run);
  }

  /**
   * Find run by ID (null for unknown or malformed IDs)
   */
  async findById(id: string): Promise<AuditRunRecord | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const run = await this.model.findById(id);
    return run ? toRecord(run) : null;
  }

  /**
   * Get recent runs, newest first
   */
  async getRecent(limit: number = 20): Promise<AuditRunRecord[]> {
    const runs = await this.model.find().sort({ createdAt: -1 }).limit(limit);
    return runs.map(toRecord);
  }

  async count(): Promise<number> {
    return this.model.countDocuments();
  }

  /**
   * Update run status, stamping start/completion times
   */
  async updateStatus(id: string, status: AuditStatus, update: AuditRunUpdate = {}): Promise<AuditRunRecord | null> {
    if (!mongoose.isValidObjectId(id)) return null;

    // Reports are deep-frozen; persist a mutable copy
    const report = update.report ? structuredClone(update.report) : update.report;
    const run = await this.model.findByIdAndUpdate(
      id,
      { $set: { ...update, ...(report !== undefined ? { report } : {}), status, ...statusTimestamps(status) } },
      { new: true }
    );
    return run ? toRecord(run) : null;
  }

  async updateProgress(id: string, progress: CrawlProgress): Promise<void> {
    if (!mongoose.isValidObjectId(id)) return;
    await this.model.updateOne({ _id: id }, { $set: { progress } });
  }

  /**
   * Delete run
   */
  async delete(id: string): Promise<boolean> {
    if (!mongoose.isValidObjectId(id)) return false;
    const result = await this.model.findByIdAndDelete(id);
    return !!result;
  }
}

export const auditRepository = new MongoAuditRepository();
