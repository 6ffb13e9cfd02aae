import { describe, it, expect } from 'vitest';
import { ReviewResult } from '../../../src/core/domain/entities/review-result.entity';
import { CommentSeverity } from '../../../src/core/domain/entities/ai-response.entity';
import { makeComment, makeResponse } from '../../mocks/ai-provider.mock';

describe('ReviewResult', () => {
  it('should count successes and failures separately', () => {
    const result = new ReviewResult(3, new Date('2024-05-01T10:00:00.000Z'));

    result.addReview('a.ts', makeResponse('ok'), 'id-a');
    result.addReview('b.ts', makeResponse('ok'));
    result.addError('c.ts', 'timeout');

    expect(result.successfulReviews).toBe(2);
    expect(result.failedReviews).toBe(1);
    expect(result.errors.get('c.ts')).toBe('timeout');
    expect(Array.from(result.reviewIds.entries())).toEqual([['a.ts', 'id-a']]);
  });

  it('should report the duration once complete', () => {
    const result = new ReviewResult(0, new Date('2024-05-01T10:00:00.000Z'));

    expect(result.isComplete).toBe(false);
    expect(result.durationMs).toBe(0);
    expect(result.endTime).toBeUndefined();

    result.complete(new Date('2024-05-01T10:00:02.500Z'));

    expect(result.isComplete).toBe(true);
    expect(result.durationMs).toBe(2500);
  });

  it('should refuse updates after completion', () => {
    const result = new ReviewResult(1);
    result.complete();

    expect(() => result.addReview('a.ts', makeResponse('late'))).toThrow('Review result is already complete');
    expect(() => result.addError('a.ts', 'late')).toThrow('Review result is already complete');
    expect(() => result.complete()).toThrow('Review result is already complete');
  });

  it('should collect error-severity comments across files', () => {
    const result = new ReviewResult(2);
    const injection = makeComment('SQL injection', CommentSeverity.ERROR);
    result.addReview('a.ts', makeResponse('bad', [injection, makeComment('rename', CommentSeverity.SUGGESTION)]));
    result.addReview('b.ts', makeResponse('fine', [makeComment('nice', CommentSeverity.PRAISE)]));

    expect(result.getCriticalIssues()).toEqual([{ filePath: 'a.ts', comment: injection }]);
  });
});
