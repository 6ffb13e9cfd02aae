import Database from 'better-sqlite3';
import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type { AIResponse } from '@core/domain/entities/ai-response.entity';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import type { ReviewType } from '@core/domain/entities/review-request.entity';
import type { FileReviewQuery, ReviewStorage } from '@core/domain/repositories/review-storage.repository';
import { ConfigurationError, StorageError, errorMessage } from '@core/domain/errors/review.errors';
import { isReviewRow, serializeMetadata, serializeResponse, toReviewRecord } from './review-record.codec';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS reviews (
    id TEXT PRIMARY KEY,
    file_path TEXT NOT NULL,
    review_type TEXT NOT NULL,
    review_response TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    metadata TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_reviews_file_path ON reviews(file_path);
  CREATE INDEX IF NOT EXISTS idx_reviews_timestamp ON reviews(timestamp);
`;

const ORDER_BY = 'ORDER BY timestamp DESC, rowid DESC';

/**
 * SQLite-backed review history. A connection is opened for every operation
 * and closed before it returns, so no handle is shared between tasks.
 */
export class SqliteReviewStorage implements ReviewStorage {
  private readonly logger = new Logger(SqliteReviewStorage.name);

  constructor(
    private readonly dbPath: string = 'reviews.db',
    private readonly clock: () => Date = () => new Date(),
  ) {
    if (!dbPath || dbPath === ':memory:') {
      throw new ConfigurationError('SQLite storage needs a database file path; use InMemoryReviewStorage instead');
    }
    this.withConnectionSync('initialize database', db => {
      db.pragma('journal_mode = WAL');
      db.exec(SCHEMA);
    });
    this.logger.log(`Review history stored in ${dbPath}`);
  }

  async saveReview(
    filePath: string,
    reviewType: ReviewType,
    response: AIResponse,
    metadata?: Record<string, unknown>,
  ): Promise<string> {
    const id = uuidv4();
    const row = {
      id,
      file_path: filePath,
      review_type: reviewType,
      review_response: serializeResponse(response),
      timestamp: this.clock().toISOString(),
      metadata: serializeMetadata(metadata),
    };

    return this.withConnection('save review', db => {
      const insert = db.prepare(
        `INSERT INTO reviews (id, file_path, review_type, review_response, timestamp, metadata)
         VALUES (@id, @file_path, @review_type, @review_response, @timestamp, @metadata)`,
      );
      db.transaction(() => insert.run(row))();
      return id;
    });
  }

  async getReview(id: string): Promise<ReviewRecord | null> {
    return this.withConnection('get review', db => {
      const row: unknown = db.prepare('SELECT * FROM reviews WHERE id = ?').get(id);
      return row === undefined ? null : this.toRecord(row);
    });
  }

  async getFileReviews(filePath: string, query: FileReviewQuery = {}): Promise<ReviewRecord[]> {
    return this.withConnection('get file reviews', db => {
      let sql = 'SELECT * FROM reviews WHERE file_path = ?';
      const params: (string | number)[] = [filePath];

      if (query.reviewType) {
        sql += ' AND review_type = ?';
        params.push(query.reviewType);
      }
      sql += ` ${ORDER_BY}`;
      if (query.limit && query.limit > 0) {
        sql += ' LIMIT ?';
        params.push(Math.floor(query.limit));
      }

      return db.prepare(sql).all(...params).map(row => this.toRecord(row));
    });
  }

  async getReviewsInTimeframe(start: Date, end: Date, reviewType?: ReviewType): Promise<ReviewRecord[]> {
    return this.withConnection('get reviews in timeframe', db => {
      let sql = 'SELECT * FROM reviews WHERE timestamp >= ? AND timestamp <= ?';
      const params: string[] = [start.toISOString(), end.toISOString()];

      if (reviewType) {
        sql += ' AND review_type = ?';
        params.push(reviewType);
      }
      sql += ` ${ORDER_BY}`;

      return db.prepare(sql).all(...params).map(row => this.toRecord(row));
    });
  }

  async deleteReview(id: string): Promise<boolean> {
    return this.withConnection('delete review', db => {
      const result = db.prepare('DELETE FROM reviews WHERE id = ?').run(id);
      return result.changes > 0;
    });
  }

  async cleanupOldReviews(olderThan: Date): Promise<number> {
    const removed = await this.withConnection('cleanup old reviews', db => {
      const result = db.prepare('DELETE FROM reviews WHERE timestamp < ?').run(olderThan.toISOString());
      return result.changes;
    });
    if (removed > 0) {
      this.logger.log(`Removed ${removed} review(s) older than ${olderThan.toISOString()}`);
    }
    return removed;
  }

  private toRecord(row: unknown): ReviewRecord {
    if (!isReviewRow(row)) {
      throw new StorageError('Unexpected row shape in reviews table');
    }
    return toReviewRecord(row);
  }

  private async withConnection<T>(operation: string, work: (db: Database.Database) => T): Promise<T> {
    return this.withConnectionSync(operation, work);
  }

  private withConnectionSync<T>(operation: string, work: (db: Database.Database) => T): T {
    let db: Database.Database | undefined;
    try {
      db = new Database(this.dbPath);
      return work(db);
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    } finally {
      db?.close();
    }
  }
}
