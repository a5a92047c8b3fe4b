/**
 * Audit Report
 * Deterministic, deep-frozen report assembled once the crawl terminates
 */

import type { InventoryEntry } from '../crawling/crawling.types';
import type { Finding } from '../checks/check.types';
import { compareFindings } from '../checks/finding';
import { AuditReport, AuditReportInput, AuditSummary } from './report.types';

/**
 * Recursively freeze plain objects and arrays
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}

export function summarize(inventory: readonly InventoryEntry[], findings: readonly Finding[]): AuditSummary {
  const summary: AuditSummary = {
    totalUrls: inventory.length,
    pagesFetched: 0,
    pagesSkippedRobots: 0,
    pagesFailed: 0,
    pagesMalformed: 0,
    pagesUnvisited: 0,
    uniqueFinalUrls: 0,
    findingsBySeverity: { info: 0, warning: 0, critical: 0 },
    findingsByCheck: {},
    maxDepthReached: 0,
  };
  const finalUrls = new Set<string>();

  for (const entry of inventory) {
    switch (entry.outcome) {
      case 'fetched':
        summary.pagesFetched++;
        finalUrls.add(entry.finalUrl);
        break;
      case 'failed':
        summary.pagesFailed++;
        break;
      case 'skipped-robots':
        summary.pagesSkippedRobots++;
        break;
      case 'malformed':
        summary.pagesMalformed++;
        break;
      case 'unvisited':
        summary.pagesUnvisited++;
        break;
    }

    if (entry.outcome !== 'unvisited') {
      summary.maxDepthReached = Math.max(summary.maxDepthReached, entry.depth);
    }
  }

  for (const finding of findings) {
    summary.findingsBySeverity[finding.severity]++;
    summary.findingsByCheck[finding.checkId] = (summary.findingsByCheck[finding.checkId] ?? 0) + 1;
  }

  summary.uniqueFinalUrls = finalUrls.size;
  return summary;
}

export function buildAuditReport(input: AuditReportInput): AuditReport {
  const inventory = [...input.inventory]
    .map((entry) => ({ ...entry, redirectChain: entry.redirectChain.map((hop) => ({ ...hop })) }))
    .sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
  const findings = [...input.findings].sort(compareFindings);
  const byHost = (a: { host: string }, b: { host: string }) => (a.host < b.host ? -1 : a.host > b.host ? 1 : 0);
  const hosts = [...(input.hosts ?? [])].sort(byHost);
  const circuitBreakers = (input.circuitBreakers ?? []).map((stats) => ({ ...stats })).sort(byHost);

  return deepFreeze({
    seedUrl: input.seedUrl,
    startedAt: new Date(input.startedAt).toISOString(),
    finishedAt: new Date(input.finishedAt).toISOString(),
    durationMs: input.finishedAt - input.startedAt,
    stopReason: input.stopReason,
    inventory,
    findings,
    hosts,
    circuitBreakers,
    summary: summarize(inventory, findings),
  });
}
