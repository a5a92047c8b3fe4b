/**
 * Frontier Tests
 */

import { Frontier } from '../frontier';
import { CrawlTask, InventoryEntry } from '../crawling.types';

function task(url: string, depth: number = 0, parentUrl: string | null = null): CrawlTask {
  return { url, depth, parentUrl, discoveredAt: 0 };
}

function entry(url: string, depth: number = 0): InventoryEntry {
  return {
    url,
    outcome: 'fetched',
    status: 200,
    depth,
    parentUrl: null,
    finalUrl: url,
    redirectChain: [],
    attempts: 1,
    latencyMs: 5,
    contentType: 'text/html',
    error: null,
  };
}

describe('Frontier', () => {
  let frontier: Frontier;

  beforeEach(() => {
    frontier = new Frontier({ maxDepth: 2, maxPages: 3 });
  });

  describe('enqueue', () => {
    it('should queue new URLs in discovery order', () => {
      expect(frontier.enqueue(task('https://a.test/'))).toBe('queued');
      expect(frontier.enqueue(task('https://a.test/x', 1))).toBe('queued');

      expect(frontier.dequeue()?.url).toBe('https://a.test/');
      expect(frontier.dequeue()?.url).toBe('https://a.test/x');
      expect(frontier.dequeue()).toBeNull();
    });

    it('should reject URLs that are queued, in flight or visited', () => {
      frontier.enqueue(task('https://a.test/'));
      expect(frontier.enqueue(task('https://a.test/', 1))).toBe('duplicate');

      frontier.dequeue();
      expect(frontier.enqueue(task('https://a.test/', 1))).toBe('duplicate');

      frontier.markVisited('https://a.test/', entry('https://a.test/'));
      expect(frontier.enqueue(task('https://a.test/', 1))).toBe('duplicate');
    });

    it('should reject tasks deeper than maxDepth', () => {
      expect(frontier.enqueue(task('https://a.test/deep', 3))).toBe('depth-exceeded');
      expect(frontier.enqueue(task('https://a.test/ok', 2))).toBe('queued');
    });

    it('should stop admitting once maxPages URLs were admitted', () => {
      frontier.enqueue(task('https://a.test/1'));
      frontier.enqueue(task('https://a.test/2'));
      frontier.enqueue(task('https://a.test/3'));

      expect(frontier.enqueue(task('https://a.test/4'))).toBe('budget-exhausted');
    });

    it('should freeze admitted tasks', () => {
      frontier.enqueue(task('https://a.test/'));
      expect(Object.isFrozen(frontier.dequeue())).toBe(true);
    });
  });

  describe('draining', () => {
    it('should report drained only when nothing is queued or in flight', () => {
      expect(frontier.isDrained()).toBe(true);

      frontier.enqueue(task('https://a.test/'));
      expect(frontier.isDrained()).toBe(false);

      frontier.dequeue();
      expect(frontier.isDrained()).toBe(false);
      expect(frontier.inFlight()).toBe(1);

      frontier.markVisited('https://a.test/', entry('https://a.test/'));
      expect(frontier.isDrained()).toBe(true);
    });

    it('should wake waiters on enqueue', async () => {
      frontier.enqueue(task('https://a.test/'));
      frontier.dequeue();

      const waiting = frontier.waitForWork();
      frontier.enqueue(task('https://a.test/x', 1));

      await expect(waiting).resolves.toBeUndefined();
    });

    it('should ignore repeated markVisited calls', () => {
      frontier.enqueue(task('https://a.test/'));
      frontier.dequeue();
      frontier.markVisited('https://a.test/', entry('https://a.test/'));
      frontier.markVisited('https://a.test/', { ...entry('https://a.test/'), status: 500 });

      expect(frontier.getEntry('https://a.test/')?.status).toBe(200);
      expect(frontier.visitedCount()).toBe(1);
    });
  });

  describe('close', () => {
    it('should stop admission and dispatch, and record queued tasks as unvisited', () => {
      frontier.enqueue(task('https://a.test/'));
      frontier.enqueue(task('https://a.test/x', 1, 'https://a.test/'));
      frontier.close('deadline');

      expect(frontier.enqueue(task('https://a.test/y', 1))).toBe('closed');
      expect(frontier.dequeue()).toBeNull();
      expect(frontier.isFinished()).toBe(true);

      const abandoned = frontier.abandonQueued();
      expect(abandoned.map((t) => t.url)).toEqual(['https://a.test/', 'https://a.test/x']);
      expect(frontier.getEntry('https://a.test/x')).toEqual(
        expect.objectContaining({
          outcome: 'unvisited',
          parentUrl: 'https://a.test/',
          depth: 1,
          error: 'Not fetched: crawl deadline',
        })
      );
      expect(frontier.closedBy).toBe('deadline');
    });

    it('should keep in-flight work running until it is marked visited', () => {
      frontier.enqueue(task('https://a.test/'));
      frontier.dequeue();
      frontier.close('cancelled');

      expect(frontier.isFinished()).toBe(false);
      frontier.markVisited('https://a.test/', entry('https://a.test/'));
      expect(frontier.isFinished()).toBe(true);
    });
  });
});
