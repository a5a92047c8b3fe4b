/**
 * Crawl Frontier
 * Breadth-first work queue with visited-set tracking and budget enforcement
 */

import { CrawlConfig, CrawlTask, EnqueueResult, InventoryEntry, StopReason } from './crawling.types';

export class Frontier {
  private queue: CrawlTask[] = [];
  private head = 0;
  private queuedUrls: Set<string> = new Set();
  private inFlightUrls: Set<string> = new Set();
  private visited: Map<string, InventoryEntry> = new Map();
  private admitted = 0;
  private closedReason: StopReason | null = null;
  private listeners: Array<() => void> = [];

  constructor(private readonly config: Pick<CrawlConfig, 'maxDepth' | 'maxPages'>) {}

  /**
   * Admit a task unless its URL is already known, it is too deep,
   * the page budget is spent or the frontier is closed.
   */
  enqueue(task: CrawlTask): EnqueueResult {
    if (this.closedReason) {
      return 'closed';
    }

    if (this.isKnown(task.url)) {
      return 'duplicate';
    }

    if (task.depth > this.config.maxDepth) {
      return 'depth-exceeded';
    }

    if (this.admitted >= this.config.maxPages) {
      return 'budget-exhausted';
    }

    this.queue.push(Object.freeze({ ...task }));
    this.queuedUrls.add(task.url);
    this.admitted++;
    this.notify();
    return 'queued';
  }

  /**
   * Next task in discovery order, or null when nothing is available
   */
  dequeue(): CrawlTask | null {
    if (this.closedReason || this.head >= this.queue.length) {
      return null;
    }

    const task = this.queue[this.head];
    this.head++;
    this.compact();

    this.queuedUrls.delete(task.url);
    this.inFlightUrls.add(task.url);
    return task;
  }

  /**
   * Record the terminal state for a dequeued URL. Later calls for the same URL are ignored.
   */
  markVisited(url: string, entry: InventoryEntry): void {
    if (this.visited.has(url)) {
      return;
    }

    this.visited.set(url, Object.freeze({ ...entry }));
    this.inFlightUrls.delete(url);
    this.notify();
  }

  /**
   * Queue empty and no worker holds a task
   */
  isDrained(): boolean {
    return this.pending() === 0 && this.inFlightUrls.size === 0;
  }

  /**
   * No more work will be handed out: drained, or closed with nothing in flight
   */
  isFinished(): boolean {
    return this.isDrained() || (this.closedReason !== null && this.inFlightUrls.size === 0);
  }

  /**
   * Resolves on the next enqueue, visit or close
   */
  waitForWork(): Promise<void> {
    if (this.isFinished()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.listeners.push(resolve));
  }

  /**
   * Stop admitting and handing out work. In-flight tasks still complete.
   */
  close(reason: StopReason): void {
    if (this.closedReason) return;
    this.closedReason = reason;
    this.notify();
  }

  /**
   * Record every still-queued task as unvisited and return them
   */
  abandonQueued(): CrawlTask[] {
    const abandoned = this.queue.slice(this.head);
    this.queue = [];
    this.head = 0;

    for (const task of abandoned) {
      this.queuedUrls.delete(task.url);
      this.visited.set(
        task.url,
        Object.freeze({
          url: task.url,
          outcome: 'unvisited' as const,
          status: null,
          depth: task.depth,
          parentUrl: task.parentUrl,
          finalUrl: task.url,
          redirectChain: [],
          attempts: 0,
          latencyMs: 0,
          contentType: null,
          error: `Not fetched: crawl ${this.closedReason ?? 'stopped'}`,
        })
      );
    }

    return abandoned;
  }

  isKnown(url: string): boolean {
    return this.queuedUrls.has(url) || this.inFlightUrls.has(url) || this.visited.has(url);
  }

  get closedBy(): StopReason | null {
    return this.closedReason;
  }

  pending(): number {
    return this.queue.length - this.head;
  }

  inFlight(): number {
    return this.inFlightUrls.size;
  }

  visitedCount(): number {
    return this.visited.size;
  }

  getEntry(url: string): InventoryEntry | undefined {
    return this.visited.get(url);
  }

  getInventory(): InventoryEntry[] {
    return Array.from(this.visited.values());
  }

  private notify(): void {
    const listeners = this.listeners;
    this.listeners = [];
    listeners.forEach((resolve) => resolve());
  }

  private compact(): void {
    // Drop consumed slots once they dominate the backing array
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
  }
}
