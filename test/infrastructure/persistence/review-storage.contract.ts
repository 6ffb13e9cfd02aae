import { describe, it, expect, beforeEach } from 'vitest';
import { ReviewType } from '../../../src/core/domain/entities/review-request.entity';
import { CommentCategory, CommentSeverity } from '../../../src/core/domain/entities/ai-response.entity';
import type { ReviewStorage } from '../../../src/core/domain/repositories/review-storage.repository';
import { makeComment, makeResponse } from '../../mocks/ai-provider.mock';

export interface StorageHarness {
  storage: ReviewStorage;
  setNow(iso: string): void;
}

/**
 * Behaviour every ReviewStorage implementation shares. `create` is called
 * before each test and must return an empty store.
 */
export function describeReviewStorage(name: string, create: () => StorageHarness): void {
  describe(`${name} (storage contract)`, () => {
    let harness: StorageHarness;
    let storage: ReviewStorage;

    beforeEach(() => {
      harness = create();
      storage = harness.storage;
      harness.setNow('2024-05-01T10:00:00.000Z');
    });

    it('should round-trip a review with comments and metadata', async () => {
      const response = makeResponse(
        'Two problems',
        [
          makeComment('Unsanitised input', CommentSeverity.ERROR, CommentCategory.SECURITY, 12, 'escape(input)'),
          makeComment('Missing docs', CommentSeverity.SUGGESTION, CommentCategory.DOCUMENTATION),
        ],
        0.55,
      );

      const id = await storage.saveReview('src/api.ts', ReviewType.SECURITY, response, { author: 'dev' });
      const record = await storage.getReview(id);

      expect(record).not.toBeNull();
      expect(record?.id).toBe(id);
      expect(record?.filePath).toBe('src/api.ts');
      expect(record?.reviewType).toBe(ReviewType.SECURITY);
      expect(record?.timestamp.toISOString()).toBe('2024-05-01T10:00:00.000Z');
      expect(record?.metadata).toEqual({ author: 'dev' });
      expect(record?.response.summary).toBe('Two problems');
      expect(record?.response.score).toBe(0.55);
      expect(record?.response.timestamp.toISOString()).toBe('2024-05-01T10:00:00.000Z');
      expect(record?.response.comments).toEqual([
        makeComment('Unsanitised input', CommentSeverity.ERROR, CommentCategory.SECURITY, 12, 'escape(input)'),
        makeComment('Missing docs', CommentSeverity.SUGGESTION, CommentCategory.DOCUMENTATION),
      ]);
    });

    it('should return null for an unknown id', async () => {
      await expect(storage.getReview('does-not-exist')).resolves.toBeNull();
    });

    it('should assign distinct ids', async () => {
      const first = await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('one'));
      const second = await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('two'));

      expect(first).not.toBe(second);
    });

    it('should list file reviews newest first, honouring limit and type', async () => {
      harness.setNow('2024-05-01T10:00:00.000Z');
      await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('oldest'));
      harness.setNow('2024-05-02T10:00:00.000Z');
      await storage.saveReview('a.ts', ReviewType.STYLE, makeResponse('middle'));
      harness.setNow('2024-05-03T10:00:00.000Z');
      await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('newest'));
      await storage.saveReview('b.ts', ReviewType.FULL, makeResponse('other file'));

      const all = await storage.getFileReviews('a.ts');
      expect(all.map(record => record.response.summary)).toEqual(['newest', 'middle', 'oldest']);

      const limited = await storage.getFileReviews('a.ts', { limit: 2 });
      expect(limited.map(record => record.response.summary)).toEqual(['newest', 'middle']);

      const full = await storage.getFileReviews('a.ts', { reviewType: ReviewType.FULL });
      expect(full.map(record => record.response.summary)).toEqual(['newest', 'oldest']);

      await expect(storage.getFileReviews('missing.ts')).resolves.toEqual([]);
    });

    it('should order reviews saved at the same instant by insertion, newest first', async () => {
      await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('first'));
      await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('second'));

      const records = await storage.getFileReviews('a.ts');
      expect(records.map(record => record.response.summary)).toEqual(['second', 'first']);
    });

    it('should include both bounds of a timeframe', async () => {
      harness.setNow('2024-05-01T00:00:00.000Z');
      await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('at start'));
      harness.setNow('2024-05-02T12:00:00.000Z');
      await storage.saveReview('b.ts', ReviewType.SECURITY, makeResponse('inside'));
      harness.setNow('2024-05-03T00:00:00.000Z');
      await storage.saveReview('c.ts', ReviewType.FULL, makeResponse('at end'));
      harness.setNow('2024-05-03T00:00:00.001Z');
      await storage.saveReview('d.ts', ReviewType.FULL, makeResponse('after'));

      const start = new Date('2024-05-01T00:00:00.000Z');
      const end = new Date('2024-05-03T00:00:00.000Z');
      const inRange = await storage.getReviewsInTimeframe(start, end);
      expect(inRange.map(record => record.response.summary)).toEqual(['at end', 'inside', 'at start']);

      const security = await storage.getReviewsInTimeframe(start, end, ReviewType.SECURITY);
      expect(security.map(record => record.filePath)).toEqual(['b.ts']);
    });

    it('should delete a review once', async () => {
      const id = await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('x'));

      await expect(storage.deleteReview(id)).resolves.toBe(true);
      await expect(storage.deleteReview(id)).resolves.toBe(false);
      await expect(storage.getReview(id)).resolves.toBeNull();
    });

    it('should remove only reviews strictly older than the cutoff', async () => {
      harness.setNow('2024-04-01T00:00:00.000Z');
      await storage.saveReview('old.ts', ReviewType.FULL, makeResponse('old'));
      harness.setNow('2024-05-01T00:00:00.000Z');
      await storage.saveReview('edge.ts', ReviewType.FULL, makeResponse('edge'));
      harness.setNow('2024-06-01T00:00:00.000Z');
      await storage.saveReview('new.ts', ReviewType.FULL, makeResponse('new'));

      const removed = await storage.cleanupOldReviews(new Date('2024-05-01T00:00:00.000Z'));

      expect(removed).toBe(1);
      await expect(storage.getFileReviews('old.ts')).resolves.toEqual([]);
      expect(await storage.getFileReviews('edge.ts')).toHaveLength(1);
      await expect(storage.cleanupOldReviews(new Date('2024-01-01T00:00:00.000Z'))).resolves.toBe(0);
    });

    it('should store empty metadata as an empty object', async () => {
      const id = await storage.saveReview('a.ts', ReviewType.FULL, makeResponse('x', [], undefined));
      const record = await storage.getReview(id);

      expect(record?.metadata).toEqual({});
      expect(record?.response.score).toBeUndefined();
    });
  });
}
