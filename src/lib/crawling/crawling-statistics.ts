/**
 * Crawling Statistics Tracker
 * Running counters behind the session's progress events
 */

import { CrawlProgress, OutcomeKind } from './crawling.types';

export interface FrontierCounts {
  queued: number;
  inFlight: number;
  visited: number;
}

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesFetched: number = 0;
  private pagesFailed: number = 0;
  private pagesSkipped: number = 0;
  private linksDiscovered: number = 0;
  private duplicatesDetected: number = 0;
  private maxDepthReached: number = 0;

  constructor(now: number = Date.now()) {
    this.startTime = now;
  }

  /**
   * Record the terminal outcome of a task. Unvisited tasks do not count towards depth reached.
   */
  recordOutcome(outcome: OutcomeKind, depth: number): void {
    if (outcome !== 'unvisited') {
      this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    }

    switch (outcome) {
      case 'fetched':
        this.pagesFetched++;
        break;
      case 'failed':
      case 'malformed':
        this.pagesFailed++;
        break;
      case 'skipped-robots':
      case 'unvisited':
        this.pagesSkipped++;
        break;
    }
  }

  /**
   * Record link discovery
   */
  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  /**
   * Record a link rejected as already known
   */
  recordDuplicate(): void {
    this.duplicatesDetected++;
  }

  getProgress(frontier: FrontierCounts, now: number = Date.now()): CrawlProgress {
    return {
      queued: frontier.queued,
      inFlight: frontier.inFlight,
      visited: frontier.visited,
      pagesFetched: this.pagesFetched,
      pagesFailed: this.pagesFailed,
      pagesSkipped: this.pagesSkipped,
      linksDiscovered: this.linksDiscovered,
      duplicatesDetected: this.duplicatesDetected,
      depthReached: this.maxDepthReached,
      elapsedMs: now - this.startTime,
    };
  }
}
