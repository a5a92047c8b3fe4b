/**
 * Crawl Session
 * Drives the fetcher pool over the frontier, then runs the check engine and
 * assembles the audit report. Each session owns its own frontier, gate and
 * breakers, so independent sessions run side by side.
 */

import { EventEmitter } from 'events';
import {
  CrawlConfig,
  CrawlLogger,
  CrawlProgress,
  CrawlTask,
  HttpClient,
  InventoryEntry,
  SeedConfiguration,
  StopReason,
} from './crawling.types';
import { createCrawlConfig } from './crawl-config';
import { Frontier } from './frontier';
import { PolitenessGate } from './politeness-gate';
import { defaultHttpClient, outcomeOf, PageFetcher } from './fetcher';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { extractHost, isBlockedUrl, isSameDomain, tryNormalizeUrl } from './url-normalizer';
import { HostCircuitBreakers, CircuitBreakerEvent } from '../circuit-breaker';
import { buildPageModel } from '../page-model/page-model.builder';
import type { PageModel } from '../page-model/page-model.types';
import { CrawlFindingId, Finding } from '../checks/check.types';
import { createFinding } from '../checks/finding';
import { CheckRegistry, createDefaultRegistry } from '../checks/check.registry';
import { CheckEngine } from '../checks/check-engine';
import { InMemoryCrawlIndex } from '../checks/crawl-index';
import { buildAuditReport } from '../report/audit-report';
import type { AuditReport } from '../report/report.types';

export enum CrawlEvent {
  PROGRESS = 'progress',
  PAGE = 'page',
  FINDING = 'finding',
}

export interface CrawlSessionDeps {
  httpClient?: HttpClient;
  registry?: CheckRegistry;
  logger?: CrawlLogger;

  /**
   * Label used in log lines (defaults to the seed host)
   */
  sessionId?: string;
}

// Reference kinds followed when resources are not crawled
const DOCUMENT_LINK_KINDS = new Set(['anchor', 'iframe']);

export class CrawlSession extends EventEmitter {
  readonly config: CrawlConfig;
  readonly id: string;

  private readonly logger: CrawlLogger;
  private readonly registry: CheckRegistry;
  private readonly frontier: Frontier;
  private readonly gate: PolitenessGate;
  private readonly breakers: HostCircuitBreakers;
  private readonly fetcher: PageFetcher;
  private readonly stats: CrawlingStatisticsTracker;
  private pages: PageModel[] = [];
  private findings: Finding[] = [];
  private running: Promise<AuditReport> | null = null;

  /**
   * Throws ConfigurationError before any fetch when the seed configuration is invalid
   */
  constructor(seed: SeedConfiguration, deps: CrawlSessionDeps = {}) {
    super();
    this.config = createCrawlConfig(seed);
    this.id = deps.sessionId ?? extractHost(this.config.seedUrl);
    this.logger = deps.logger ?? console;
    this.registry = deps.registry ?? createDefaultRegistry();

    const httpClient = deps.httpClient ?? defaultHttpClient;
    this.frontier = new Frontier(this.config);
    this.gate = new PolitenessGate(this.config, httpClient, this.logger);
    this.breakers = new HostCircuitBreakers(this.config.circuitBreaker);
    this.fetcher = new PageFetcher(this.config, this.gate, httpClient, this.breakers, this.logger);
    this.stats = new CrawlingStatisticsTracker();

    this.breakers.on(CircuitBreakerEvent.OPEN, (host: string) => {
      this.logger.warn(`Crawl ${this.id}: circuit opened for ${host}, failing fast`);
    });
  }

  /**
   * Run the crawl to completion. Repeated calls return the same report.
   */
  run(): Promise<AuditReport> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /**
   * Stop admitting and dispatching work; in-flight fetches still complete
   */
  cancel(): void {
    if (!this.frontier.closedBy) {
      this.logger.log(`Crawl ${this.id}: cancellation requested`);
    }
    this.frontier.close('cancelled');
  }

  getProgress(): CrawlProgress {
    return this.stats.getProgress({
      queued: this.frontier.pending(),
      inFlight: this.frontier.inFlight(),
      visited: this.frontier.visitedCount(),
    });
  }

  private async execute(): Promise<AuditReport> {
    const startedAt = Date.now();
    let deadline: NodeJS.Timeout | null = null;

    this.logger.log(
      `Crawl ${this.id}: starting at ${this.config.seedUrl} (depth ${this.config.maxDepth}, max ${this.config.maxPages} pages, ${this.config.concurrency} workers)`
    );

    if (this.config.timeLimitMs !== null) {
      deadline = setTimeout(() => {
        this.logger.warn(`Crawl ${this.id}: time limit of ${this.config.timeLimitMs}ms reached`);
        this.frontier.close('deadline');
      }, this.config.timeLimitMs);
    }

    try {
      this.frontier.enqueue({ url: this.config.seedUrl, depth: 0, parentUrl: null, discoveredAt: startedAt });

      const workers = Array.from({ length: this.config.concurrency }, () => this.worker());
      await Promise.all(workers);

      if (deadline) clearTimeout(deadline);
      const stopReason: StopReason = this.frontier.closedBy ?? 'drained';

      for (const task of this.frontier.abandonQueued()) {
        this.stats.recordOutcome('unvisited', task.depth);
      }

      this.recordRobotsFindings();

      const inventory = this.frontier.getInventory();
      const index = new InMemoryCrawlIndex(this.config.seedUrl, inventory, this.pages);
      const engine = new CheckEngine(this.registry, this.logger);
      const checkFindings = await engine.run(this.pages, { index, config: this.config.checks });
      checkFindings.forEach((finding) => this.addFinding(finding));

      const report = buildAuditReport({
        seedUrl: this.config.seedUrl,
        startedAt,
        finishedAt: Date.now(),
        stopReason,
        inventory,
        findings: this.findings,
        hosts: this.gate.snapshot(),
        circuitBreakers: this.breakers.getStats(),
      });

      this.logger.log(
        `Crawl ${this.id}: finished (${stopReason}) - ${report.summary.pagesFetched} fetched, ${report.summary.pagesFailed} failed, ${report.findings.length} finding(s) in ${report.durationMs}ms`
      );
      this.emit(CrawlEvent.PROGRESS, this.getProgress());
      return report;
    } finally {
      if (deadline) clearTimeout(deadline);
      this.breakers.shutdown();
    }
  }

  private async worker(): Promise<void> {
    for (;;) {
      const task = this.frontier.dequeue();
      if (!task) {
        if (this.frontier.isFinished()) return;
        await this.frontier.waitForWork();
        continue;
      }

      try {
        await this.processTask(task);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Crawl ${this.id}: unexpected error processing ${task.url}:`, message);
        this.complete(task, {
          url: task.url,
          outcome: 'failed',
          status: null,
          depth: task.depth,
          parentUrl: task.parentUrl,
          finalUrl: task.url,
          redirectChain: [],
          attempts: 0,
          latencyMs: 0,
          contentType: null,
          error: message,
        });
      }
    }
  }

  private async processTask(task: CrawlTask): Promise<void> {
    if (!(await this.gate.mayFetch(task.url))) {
      this.logger.log(`Crawl ${this.id}: ${task.url} disallowed by robots.txt`);
      this.complete(task, {
        url: task.url,
        outcome: 'skipped-robots',
        status: null,
        depth: task.depth,
        parentUrl: task.parentUrl,
        finalUrl: task.url,
        redirectChain: [],
        attempts: 0,
        latencyMs: 0,
        contentType: null,
        error: null,
      });
      return;
    }

    const result = await this.fetcher.fetch(task.url);
    const outcome = outcomeOf(result);

    const { page, findings } = buildPageModel(result, {
      normalize: this.config.normalize,
      seedUrl: this.config.seedUrl,
      depth: task.depth,
    });
    this.pages.push(page);
    findings.forEach((finding) => this.addFinding(finding));
    this.emit(CrawlEvent.PAGE, page);

    if (outcome === 'failed') {
      this.logger.warn(
        `Crawl ${this.id}: ${task.url} failed after ${result.attempts} attempt(s): ${result.error ?? `HTTP ${result.status}`}`
      );
    }

    // Links go in before the task is marked visited so the frontier never drains early
    this.enqueueDiscoveries(task, page, !result.redirectLoop && !result.malformedRedirect);

    this.complete(task, {
      url: task.url,
      outcome,
      status: result.status,
      depth: task.depth,
      parentUrl: task.parentUrl,
      finalUrl: result.finalUrl,
      redirectChain: result.redirectChain.map((hop) => ({ ...hop })),
      attempts: result.attempts,
      latencyMs: result.latencyMs,
      contentType: result.contentType,
      error: result.error,
    });
  }

  private enqueueDiscoveries(task: CrawlTask, page: PageModel, followRedirects: boolean): void {
    const targets: string[] = [];

    if (followRedirects) {
      for (const hop of page.redirectChain) {
        if (!hop.location) continue;
        // Hops carry the addresses as requested; the frontier keys on normalized URLs
        const target = tryNormalizeUrl(hop.location, undefined, this.config.normalize);
        if (target.ok) targets.push(target.url);
      }
    }

    const successful = page.status !== null && page.status >= 200 && page.status < 300;
    if (page.kind === 'html' && successful) {
      this.stats.recordLinkDiscovery(page.links.length);
      for (const link of page.links) {
        if (!link.internal) continue;
        if (!this.config.crawlResources && !DOCUMENT_LINK_KINDS.has(link.kind)) continue;
        targets.push(link.url);
      }
    }

    for (const url of targets) {
      if (!isSameDomain(url, this.config.seedUrl)) continue;
      if (isBlockedUrl(url, this.config.blockedPatterns)) continue;

      const result = this.frontier.enqueue({
        url,
        depth: task.depth + 1,
        parentUrl: task.url,
        discoveredAt: Date.now(),
      });
      if (result === 'duplicate') this.stats.recordDuplicate();
    }
  }

  private complete(task: CrawlTask, entry: InventoryEntry): void {
    this.frontier.markVisited(task.url, entry);
    this.stats.recordOutcome(entry.outcome, task.depth);
    this.emit(CrawlEvent.PROGRESS, this.getProgress());
  }

  private addFinding(finding: Finding): void {
    this.findings.push(finding);
    this.emit(CrawlEvent.FINDING, finding);
  }

  private recordRobotsFindings(): void {
    for (const host of this.gate.snapshot()) {
      if (!host.degraded) continue;
      this.addFinding(
        createFinding(
          CrawlFindingId.ROBOTS_UNAVAILABLE,
          'info',
          host.robotsUrl,
          `robots.txt unavailable for ${host.host} (${host.robotsError ?? 'unknown error'}); crawled without restrictions`,
          { host: host.host, status: host.robotsStatus, error: host.robotsError }
        )
      );
    }
  }
}

/**
 * Validate the seed configuration, crawl and audit. Resolves with the frozen report.
 */
export function runCrawlSession(seed: SeedConfiguration, deps: CrawlSessionDeps = {}): Promise<AuditReport> {
  return new CrawlSession(seed, deps).run();
}
