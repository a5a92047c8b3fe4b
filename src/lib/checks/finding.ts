/**
 * Finding helpers
 */

import { Finding, FindingEvidence, Severity } from './check.types';

export function createFinding(
  checkId: string,
  severity: Severity,
  url: string,
  message: string,
  evidence: Record<string, unknown> = {}
): Finding {
  const frozenEvidence: FindingEvidence = Object.freeze({ ...evidence });
  return Object.freeze({ checkId, severity, url, message, evidence: frozenEvidence });
}

const SEVERITY_RANK: Record<Severity, number> = { critical: 0, warning: 1, info: 2 };

/**
 * Report ordering: URL, then check id, then message
 */
export function compareFindings(a: Finding, b: Finding): number {
  if (a.url !== b.url) return a.url < b.url ? -1 : 1;
  if (a.checkId !== b.checkId) return a.checkId < b.checkId ? -1 : 1;
  if (a.message !== b.message) return a.message < b.message ? -1 : 1;
  return SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
}
