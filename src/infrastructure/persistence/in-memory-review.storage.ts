import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type { AIResponse } from '@core/domain/entities/ai-response.entity';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import type { ReviewType } from '@core/domain/entities/review-request.entity';
import type { FileReviewQuery, ReviewStorage } from '@core/domain/repositories/review-storage.repository';
import { ReviewRow, serializeMetadata, serializeResponse, toReviewRecord } from './review-record.codec';

interface StoredRow extends ReviewRow {
  sequence: number;
}

/**
 * InMemoryReviewStorage - keeps review history in process memory.
 * Note: data is lost on restart. Rows go through the same codec as the
 * SQLite store so both return identical records.
 */
@Injectable()
export class InMemoryReviewStorage implements ReviewStorage {
  private readonly rows = new Map<string, StoredRow>();
  private sequence = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async saveReview(
    filePath: string,
    reviewType: ReviewType,
    response: AIResponse,
    metadata?: Record<string, unknown>,
  ): Promise<string> {
    const id = uuidv4();
    this.rows.set(id, {
      id,
      file_path: filePath,
      review_type: reviewType,
      review_response: serializeResponse(response),
      timestamp: this.clock().toISOString(),
      metadata: serializeMetadata(metadata),
      sequence: this.sequence++,
    });
    return id;
  }

  async getReview(id: string): Promise<ReviewRecord | null> {
    const row = this.rows.get(id);
    return row ? toReviewRecord(row) : null;
  }

  async getFileReviews(filePath: string, query: FileReviewQuery = {}): Promise<ReviewRecord[]> {
    const matching = this.newestFirst(
      row => row.file_path === filePath && (!query.reviewType || row.review_type === query.reviewType),
    );
    const limited = query.limit && query.limit > 0 ? matching.slice(0, Math.floor(query.limit)) : matching;
    return limited.map(toReviewRecord);
  }

  async getReviewsInTimeframe(start: Date, end: Date, reviewType?: ReviewType): Promise<ReviewRecord[]> {
    const from = start.toISOString();
    const to = end.toISOString();
    return this.newestFirst(
      row => row.timestamp >= from && row.timestamp <= to && (!reviewType || row.review_type === reviewType),
    ).map(toReviewRecord);
  }

  async deleteReview(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async cleanupOldReviews(olderThan: Date): Promise<number> {
    const cutoff = olderThan.toISOString();
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (row.timestamp < cutoff) {
        this.rows.delete(id);
        removed++;
      }
    }
    return removed;
  }

  private newestFirst(predicate: (row: StoredRow) => boolean): StoredRow[] {
    return Array.from(this.rows.values())
      .filter(predicate)
      .sort((a, b) => (a.timestamp === b.timestamp ? b.sequence - a.sequence : a.timestamp < b.timestamp ? 1 : -1));
  }
}
