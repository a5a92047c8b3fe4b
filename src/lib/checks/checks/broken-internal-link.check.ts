/**
 * Broken Internal Link Check
 * Internal outbound references whose target failed or returned an error status
 */

import { Finding, Severity, TechnicalCheck } from '../check.types';
import type { InventoryEntry } from '../../crawling/crawling.types';
import { createFinding } from '../finding';
import { isHtmlSuccess } from './check.utils';

const ID = 'broken-internal-link';

function brokenSeverity(entry: InventoryEntry): Severity | null {
  if (entry.outcome === 'skipped-robots' || entry.outcome === 'unvisited') return null;
  if (entry.status === null || entry.status >= 500) {
    return entry.outcome === 'fetched' ? null : 'critical';
  }
  if (entry.status >= 400) return 'warning';
  return entry.outcome === 'failed' || entry.outcome === 'malformed' ? 'warning' : null;
}

export const brokenInternalLinkCheck: TechnicalCheck = {
  id: ID,
  description: 'Flags internal links pointing at failed or error URLs',

  run(page, { index }) {
    if (!isHtmlSuccess(page)) return [];

    const findings: Finding[] = [];
    const checked = new Set<string>();

    for (const link of page.links) {
      if (!link.internal || checked.has(link.url)) continue;
      checked.add(link.url);

      const entry = index.getEntry(link.url);
      if (!entry) continue;

      const severity = brokenSeverity(entry);
      if (!severity) continue;

      const reason = entry.status !== null ? `HTTP ${entry.status}` : entry.error ?? 'no response';
      findings.push(
        createFinding(ID, severity, page.url, `Broken internal ${link.kind} link to ${link.url} (${reason})`, {
          target: link.url,
          kind: link.kind,
          status: entry.status,
          outcome: entry.outcome,
        })
      );
    }

    return findings;
  },
};
