import type { AIResponse } from '@core/domain/entities/ai-response.entity';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import type { ReviewType } from '@core/domain/entities/review-request.entity';

export interface FileReviewQuery {
  limit?: number;
  reviewType?: ReviewType;
}

/**
 * Durable history of completed reviews. Every failure surfaces as a StorageError.
 */
export interface ReviewStorage {
  saveReview(
    filePath: string,
    reviewType: ReviewType,
    response: AIResponse,
    metadata?: Record<string, unknown>,
  ): Promise<string>;

  getReview(id: string): Promise<ReviewRecord | null>;

  /** Most recent first. */
  getFileReviews(filePath: string, query?: FileReviewQuery): Promise<ReviewRecord[]>;

  /** Inclusive on both bounds, most recent first. */
  getReviewsInTimeframe(start: Date, end: Date, reviewType?: ReviewType): Promise<ReviewRecord[]>;

  deleteReview(id: string): Promise<boolean>;

  /** Removes records with a timestamp strictly before `olderThan`. */
  cleanupOldReviews(olderThan: Date): Promise<number>;
}
