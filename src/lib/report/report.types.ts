/**
 * Report Types
 */

import type { InventoryEntry, StopReason } from '../crawling/crawling.types';
import type { Finding, Severity } from '../checks/check.types';
import type { HostSnapshot } from '../crawling/politeness-gate';
import type { CircuitBreakerStats } from '../circuit-breaker/circuit-breaker.types';

export interface AuditSummary {
  totalUrls: number;
  pagesFetched: number;
  pagesSkippedRobots: number;
  pagesFailed: number;
  pagesMalformed: number;
  pagesUnvisited: number;

  /**
   * Distinct redirect-resolved addresses among fetched URLs
   */
  uniqueFinalUrls: number;
  findingsBySeverity: Record<Severity, number>;
  findingsByCheck: Record<string, number>;
  maxDepthReached: number;
}

export interface AuditReport {
  readonly seedUrl: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly stopReason: StopReason;
  readonly inventory: readonly InventoryEntry[];
  readonly findings: readonly Finding[];
  readonly hosts: readonly HostSnapshot[];

  /**
   * Per-host breaker counters (empty when circuit breaking is off)
   */
  readonly circuitBreakers: readonly CircuitBreakerStats[];
  readonly summary: AuditSummary;
}

export interface AuditReportInput {
  seedUrl: string;
  startedAt: number;
  finishedAt: number;
  stopReason: StopReason;
  inventory: readonly InventoryEntry[];
  findings: readonly Finding[];
  hosts?: readonly HostSnapshot[];
  circuitBreakers?: readonly CircuitBreakerStats[];
}
