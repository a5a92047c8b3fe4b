/**
 * Politeness Gate
 * Per-host robots.txt rules, crawl-delay spacing and in-flight ceilings
 */

import { CrawlConfig, CrawlLogger, HostPhase, HttpClient } from './crawling.types';
import { isPathAllowed, parseRobotsTxt, resolvePolicy, ResolvedRobotsPolicy } from './robots-parser';
import { classifyError } from './fetch-errors';
import { readResponseBody } from './response-body';
import { extractHost } from './url-normalizer';

// Rules past this size are ignored
const ROBOTS_MAX_BYTES = 500 * 1024;

interface HostState {
  host: string;
  origin: string;
  phase: HostPhase;
  policy: ResolvedRobotsPolicy | null;
  crawlDelayMs: number;
  inFlight: number;
  lastFetchAt: number | null;
  robotsLoad: Promise<void> | null;
  robotsStatus: number | null;
  robotsError: string | null;
  sitemaps: string[];
  waiters: Array<() => void>;
}

export interface HostLease {
  host: string;
  release(): void;
}

export interface HostSnapshot {
  host: string;
  robotsUrl: string;
  phase: HostPhase;
  crawlDelayMs: number;
  robotsStatus: number | null;
  robotsError: string | null;
  degraded: boolean;
  sitemaps: string[];
}

export class PolitenessGate {
  private hosts: Map<string, HostState> = new Map();

  constructor(
    private readonly config: CrawlConfig,
    private readonly httpClient: HttpClient,
    private readonly logger: CrawlLogger = console
  ) {}

  /**
   * Whether robots.txt lets the configured user agent fetch this URL
   */
  async mayFetch(url: string): Promise<boolean> {
    const state = this.getState(url);
    await this.ensureRobots(state);

    if (!state.policy) {
      return true;
    }

    const target = new URL(url);
    return isPathAllowed(state.policy, `${target.pathname}${target.search}`);
  }

  /**
   * Effective spacing between request starts for a host
   */
  delay(host: string): number {
    const state = this.hosts.get(host.toLowerCase());
    return state ? state.crawlDelayMs : this.config.crawlDelayFloorMs;
  }

  /**
   * Wait for a request slot on the URL's host. Resolves once fewer than
   * perHostConcurrency requests are in flight and the crawl delay has elapsed
   * since the previous request start.
   */
  async acquire(url: string): Promise<HostLease> {
    const state = this.getState(url);
    await this.ensureRobots(state);

    for (;;) {
      if (state.inFlight < this.config.perHostConcurrency) {
        const wait = state.lastFetchAt === null ? 0 : state.lastFetchAt + state.crawlDelayMs - Date.now();
        if (wait <= 0) {
          state.inFlight++;
          state.lastFetchAt = Date.now();
          return this.createLease(state);
        }
        await new Promise((resolve) => setTimeout(resolve, wait));
        continue;
      }

      await new Promise<void>((resolve) => state.waiters.push(resolve));
    }
  }

  /**
   * Read-only view of every host seen this session
   */
  snapshot(): HostSnapshot[] {
    return Array.from(this.hosts.values()).map((state) => ({
      host: state.host,
      robotsUrl: `${state.origin}/robots.txt`,
      phase: state.phase,
      crawlDelayMs: state.crawlDelayMs,
      robotsStatus: state.robotsStatus,
      robotsError: state.robotsError,
      degraded: state.robotsError !== null,
      sitemaps: [...state.sitemaps],
    }));
  }

  private createLease(state: HostState): HostLease {
    let released = false;
    return {
      host: state.host,
      release: () => {
        if (released) return;
        released = true;
        state.inFlight--;
        const next = state.waiters.shift();
        if (next) next();
      },
    };
  }

  private getState(url: string): HostState {
    const host = extractHost(url);
    let state = this.hosts.get(host);

    if (!state) {
      const parsed = new URL(url);
      state = {
        host,
        origin: `${parsed.protocol}//${parsed.host}`,
        phase: 'unknown',
        policy: null,
        crawlDelayMs: this.config.crawlDelayFloorMs,
        inFlight: 0,
        lastFetchAt: null,
        robotsLoad: null,
        robotsStatus: null,
        robotsError: null,
        sitemaps: [],
        waiters: [],
      };
      this.hosts.set(host, state);
    }

    return state;
  }

  /**
   * Single-flight robots.txt load per host
   */
  private ensureRobots(state: HostState): Promise<void> {
    if (!state.robotsLoad) {
      state.phase = 'fetching-robots';
      state.robotsLoad = this.loadRobots(state);
    }
    return state.robotsLoad;
  }

  private async loadRobots(state: HostState): Promise<void> {
    const robotsUrl = `${state.origin}/robots.txt`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.fetchTimeoutMs);
    state.lastFetchAt = Date.now();

    try {
      const response = await this.httpClient(robotsUrl, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/plain, */*;q=0.1',
        },
        redirect: 'follow',
        signal: controller.signal,
      });
      state.robotsStatus = response.status;

      if (response.status >= 200 && response.status < 300) {
        const body = await readResponseBody(response, ROBOTS_MAX_BYTES);
        const robots = parseRobotsTxt(body.text ?? '');
        state.policy = resolvePolicy(robots, this.config.userAgent);
        state.sitemaps = robots.sitemaps;

        const robotsDelayMs =
          state.policy.crawlDelaySeconds !== null ? Math.round(state.policy.crawlDelaySeconds * 1000) : 0;
        state.crawlDelayMs = Math.max(robotsDelayMs, this.config.crawlDelayFloorMs);
        state.phase = 'rules-loaded';
        this.logger.log(
          `Politeness: robots.txt loaded for ${state.host} (${state.policy.rules.length} rule(s), delay ${state.crawlDelayMs}ms)`
        );
        return;
      }

      state.phase = 'robots-unavailable';
      if (response.status === 404 || response.status === 410) {
        this.logger.log(`Politeness: no robots.txt for ${state.host} (HTTP ${response.status}), allowing all`);
      } else {
        state.robotsError = `HTTP ${response.status}`;
        this.logger.warn(
          `Politeness: robots.txt for ${state.host} returned HTTP ${response.status}, degraded mode (allow all)`
        );
      }
    } catch (error) {
      const classified = classifyError(error);
      state.phase = 'robots-unavailable';
      state.robotsError = classified.message;
      this.logger.warn(
        `Politeness: robots.txt for ${state.host} unavailable (${classified.message}), degraded mode (allow all)`
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
