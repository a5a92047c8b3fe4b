/**
 * Audit Service
 * Audit run orchestration: validates the seed configuration, runs the crawl
 * session in the background and streams progress to socket rooms
 */

import { auditRepository, AuditRepository } from './audit.repository';
import { auditRoom, getIO } from '../../lib/socket';
import { ApiError } from '../../middleware/error-handler';
import { env } from '../../config/env';
import {
  ConfigurationError,
  createCrawlConfig,
  CrawlEvent,
  CrawlLogger,
  CrawlProgress,
  CrawlSession,
  HttpClient,
  SeedConfiguration,
  TrailingSlashPolicy,
} from '../../lib/crawling';
import type { CheckRegistry } from '../../lib/checks';
import {
  AuditEventEmitter,
  AuditRunRecord,
  AuditSocketEvent,
  AuditStatus,
  ICreateAuditRequest,
  TERMINAL_STATUSES,
} from './audit.types';

export interface AuditServiceDeps {
  repository: AuditRepository;
  emit: AuditEventEmitter;
  defaults: Omit<SeedConfiguration, 'seedUrl'>;
  httpClient?: HttpClient;
  registry?: CheckRegistry;
  logger?: CrawlLogger;

  /**
   * Minimum spacing between persisted progress snapshots
   */
  progressPersistIntervalMs?: number;
}

const TRAILING_SLASH_POLICIES: readonly string[] = ['strip', 'add', 'preserve'];

function isTrailingSlashPolicy(value: string): value is TrailingSlashPolicy {
  return TRAILING_SLASH_POLICIES.includes(value);
}

/**
 * Crawl defaults taken from the environment
 */
export function seedDefaultsFromEnv(): Omit<SeedConfiguration, 'seedUrl'> {
  return {
    userAgent: env.CRAWL_USER_AGENT,
    maxDepth: env.CRAWL_MAX_DEPTH,
    maxPages: env.CRAWL_MAX_PAGES,
    concurrency: env.CRAWL_CONCURRENCY,
    perHostConcurrency: env.CRAWL_PER_HOST_CONCURRENCY,
    crawlDelayFloorMs: env.CRAWL_DELAY_FLOOR_MS,
    fetchTimeoutMs: env.CRAWL_FETCH_TIMEOUT_MS,
    timeLimitMs: env.CRAWL_TIME_LIMIT_MS > 0 ? env.CRAWL_TIME_LIMIT_MS : null,
    trailingSlash: isTrailingSlashPolicy(env.CRAWL_TRAILING_SLASH) ? env.CRAWL_TRAILING_SLASH : 'strip',
    maxRetries: env.CRAWL_MAX_RETRIES,
    retryBaseDelayMs: env.CRAWL_RETRY_BACKOFF_BASE_MS,
    circuitBreaker: {
      enabled: env.CIRCUIT_BREAKER_ENABLED,
      errorThresholdPercentage: env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
      resetTimeoutMs: env.CIRCUIT_BREAKER_RESET_TIMEOUT,
      volumeThreshold: env.CIRCUIT_BREAKER_MIN_REQUESTS,
    },
  };
}

/**
 * Deliver an audit event to its Socket.IO room
 */
export const emitToAuditRoom: AuditEventEmitter = (auditId, message) => {
  try {
    getIO().to(auditRoom(auditId)).emit(message.event, message.payload);
  } catch (error) {
    console.error(`Audit ${auditId}: error emitting ${message.event}:`, error);
  }
};

export class AuditService {
  private sessions: Map<string, CrawlSession> = new Map();
  private runs: Map<string, Promise<void>> = new Map();
  private readonly logger: CrawlLogger;

  constructor(private readonly deps: AuditServiceDeps) {
    this.logger = deps.logger ?? console;
  }

  /**
   * Merge request overrides over the configured defaults.
   * Requests carry only the keys the client sent.
   */
  buildSeedConfiguration(request: ICreateAuditRequest): SeedConfiguration {
    return { ...this.deps.defaults, ...request };
  }

  /**
   * Validate, persist and start an audit run. Invalid configuration is rejected before any fetch.
   */
  async createAudit(request: ICreateAuditRequest): Promise<AuditRunRecord> {
    const seed = this.buildSeedConfiguration(request);

    try {
      createCrawlConfig(seed);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ApiError(400, error.message, error.issues);
      }
      throw error;
    }

    const audit = await this.deps.repository.create({ seedUrl: seed.seedUrl, seedConfig: seed });
    const session = new CrawlSession(seed, {
      httpClient: this.deps.httpClient,
      registry: this.deps.registry,
      logger: this.logger,
      sessionId: audit.id,
    });
    this.sessions.set(audit.id, session);

    const run = this.executeAudit(audit.id, session)
      .catch((error) => {
        this.logger.error(`Audit ${audit.id}: background execution failed:`, error);
      })
      .finally(() => {
        this.sessions.delete(audit.id);
        this.runs.delete(audit.id);
      });
    this.runs.set(audit.id, run);

    return audit;
  }

  async getAudit(id: string): Promise<AuditRunRecord | null> {
    return this.deps.repository.findById(id);
  }

  async getRecentAudits(limit: number = 20): Promise<{ audits: AuditRunRecord[]; total: number }> {
    const [audits, total] = await Promise.all([this.deps.repository.getRecent(limit), this.deps.repository.count()]);
    return { audits, total };
  }

  /**
   * Cancel a queued or running audit. The session stops dispatching work and
   * reports what it reached so far.
   */
  async cancelAudit(id: string): Promise<AuditRunRecord | null> {
    const audit = await this.deps.repository.findById(id);
    if (!audit) return null;

    if (TERMINAL_STATUSES.includes(audit.status)) {
      throw new ApiError(409, `Audit is already ${audit.status}`);
    }

    const session = this.sessions.get(id);
    if (session) {
      session.cancel();
      return audit;
    }

    // No live session (e.g. after a restart): close the record directly
    return this.deps.repository.updateStatus(id, AuditStatus.CANCELLED, {
      error: 'Cancelled without an active crawl session',
    });
  }

  async deleteAudit(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (session) {
      session.cancel();
      await this.waitForAudit(id);
    }
    return this.deps.repository.delete(id);
  }

  /**
   * Resolves once the audit's background run has settled
   */
  async waitForAudit(id: string): Promise<void> {
    await this.runs.get(id);
  }

  /**
   * Cancel every running session and wait for them to settle
   */
  async shutdown(): Promise<void> {
    this.sessions.forEach((session) => session.cancel());
    await Promise.all(Array.from(this.runs.values()));
  }

  private async executeAudit(id: string, session: CrawlSession): Promise<void> {
    const interval = this.deps.progressPersistIntervalMs ?? 1000;
    let lastPersisted = 0;

    await this.deps.repository.updateStatus(id, AuditStatus.RUNNING);
    this.logger.log(`Audit ${id}: crawl started for ${session.config.seedUrl}`);

    session.on(CrawlEvent.PROGRESS, (progress: CrawlProgress) => {
      this.deps.emit(id, {
        event: AuditSocketEvent.PROGRESS,
        payload: { auditId: id, status: AuditStatus.RUNNING, progress },
      });

      const now = Date.now();
      if (now - lastPersisted >= interval) {
        lastPersisted = now;
        this.deps.repository.updateProgress(id, progress).catch((error) => {
          this.logger.error(`Audit ${id}: failed to persist progress:`, error);
        });
      }
    });

    try {
      const report = await session.run();
      const status = report.stopReason === 'cancelled' ? AuditStatus.CANCELLED : AuditStatus.COMPLETED;

      await this.deps.repository.updateStatus(id, status, { report, progress: session.getProgress() });
      this.logger.log(`Audit ${id}: ${status} with ${report.findings.length} finding(s)`);

      this.deps.emit(id, {
        event: AuditSocketEvent.COMPLETE,
        payload: { auditId: id, status, summary: report.summary },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Audit ${id}: crawl failed:`, message);

      await this.deps.repository.updateStatus(id, AuditStatus.FAILED, { error: message });
      this.deps.emit(id, {
        event: AuditSocketEvent.FAILED,
        payload: { auditId: id, status: AuditStatus.FAILED, error: message },
      });
    } finally {
      session.removeAllListeners(CrawlEvent.PROGRESS);
    }
  }
}

export const auditService = new AuditService({
  repository: auditRepository,
  emit: emitToAuditRoom,
  defaults: seedDefaultsFromEnv(),
});
