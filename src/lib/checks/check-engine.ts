/**
 * Check Engine
 * Runs every registered check over every page. A failing check becomes a
 * check-error finding for that page; other checks are unaffected.
 */

import type { CrawlLogger } from '../crawling/crawling.types';
import type { PageModel } from '../page-model/page-model.types';
import { CheckContext, CrawlFindingId, Finding, TechnicalCheck } from './check.types';
import { CheckRegistry } from './check.registry';
import { createFinding } from './finding';

export class CheckEngine {
  constructor(
    private readonly registry: CheckRegistry,
    private readonly logger: CrawlLogger = console
  ) {}

  async run(pages: readonly PageModel[], context: CheckContext): Promise<Finding[]> {
    const checks = this.registry.list();
    const jobs: Array<{ check: TechnicalCheck; page: PageModel }> = [];
    pages.forEach((page) => checks.forEach((check) => jobs.push({ check, page })));

    const settled = await Promise.allSettled(
      jobs.map(({ check, page }) => Promise.resolve().then(() => check.run(page, context)))
    );

    const findings: Finding[] = [];
    settled.forEach((outcome, i) => {
      const { check, page } = jobs[i];
      if (outcome.status === 'fulfilled') {
        findings.push(...outcome.value.map((finding) => Object.freeze(finding)));
        return;
      }

      const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      this.logger.error(`Check ${check.id} failed on ${page.url}:`, message);
      findings.push(
        createFinding(CrawlFindingId.CHECK_ERROR, 'info', page.url, `Check ${check.id} failed: ${message}`, {
          check: check.id,
        })
      );
    });

    return findings;
  }
}
