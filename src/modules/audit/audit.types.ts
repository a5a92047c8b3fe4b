/**
 * Audit Module Types
 * Audit runs, API payloads and socket events
 */

import type { CrawlProgress, SeedConfiguration, TrailingSlashPolicy } from '../../lib/crawling/crawling.types';
import type { AuditReport, AuditSummary } from '../../lib/report/report.types';

export enum AuditStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export const TERMINAL_STATUSES: readonly AuditStatus[] = [
  AuditStatus.COMPLETED,
  AuditStatus.FAILED,
  AuditStatus.CANCELLED,
];

// ============================================================================
// Persistence
// ============================================================================

export interface IAuditRun {
  seedUrl: string;
  status: AuditStatus;
  seedConfig: SeedConfiguration;
  progress: CrawlProgress | null;
  report: AuditReport | null;
  error: string | null;
  startedAt: Date | null;
  completedAt: Date | null;

  // Maintained by schema timestamps
  createdAt: Date;
  updatedAt: Date;
}

export interface AuditRunRecord extends IAuditRun {
  id: string;
}

export type AuditRunUpdate = Partial<Pick<IAuditRun, 'progress' | 'report' | 'error'>>;

// ============================================================================
// API Interfaces
// ============================================================================

/**
 * Overrides accepted on POST /api/audits
 */
export interface ICreateAuditRequest {
  seedUrl: string;
  maxDepth?: number;
  maxPages?: number;
  concurrency?: number;
  perHostConcurrency?: number;
  crawlDelayFloorMs?: number;
  fetchTimeoutMs?: number;
  timeLimitMs?: number;
  trailingSlash?: TrailingSlashPolicy;
  crawlResources?: boolean;
  blockedPatterns?: string[];
}

export interface IAuditRunResponse {
  success: boolean;
  audit?: AuditRunRecord;
  error?: string;
}

export interface IAuditListResponse {
  success: boolean;
  audits?: AuditRunRecord[];
  total?: number;
  limit?: number;
  error?: string;
}

// ============================================================================
// Socket Event Interfaces
// ============================================================================

export enum AuditSocketEvent {
  JOIN = 'audit:join',
  LEAVE = 'audit:leave',
  STATUS = 'audit:status',
  STATUS_RESPONSE = 'audit:status:response',
  PROGRESS = 'audit:progress',
  COMPLETE = 'audit:complete',
  FAILED = 'audit:failed',
}

export interface IAuditProgressEvent {
  auditId: string;
  status: AuditStatus;
  progress: CrawlProgress;
}

export interface IAuditCompleteEvent {
  auditId: string;
  status: AuditStatus;
  summary: AuditSummary;
}

export interface IAuditFailedEvent {
  auditId: string;
  status: AuditStatus;
  error: string;
}

export type AuditServerEvent =
  | { event: AuditSocketEvent.PROGRESS; payload: IAuditProgressEvent }
  | { event: AuditSocketEvent.COMPLETE; payload: IAuditCompleteEvent }
  | { event: AuditSocketEvent.FAILED; payload: IAuditFailedEvent };

/**
 * Delivers server events to clients watching an audit
 */
export type AuditEventEmitter = (auditId: string, message: AuditServerEvent) => void;
