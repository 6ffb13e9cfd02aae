import { AIResponse, CommentCategory, CommentSeverity, ReviewComment } from '@core/domain/entities/ai-response.entity';
import { ReviewRecord } from '@core/domain/entities/review-record.entity';
import { isReviewType } from '@core/domain/entities/review-request.entity';
import { StorageError, errorMessage } from '@core/domain/errors/review.errors';

/**
 * One row of the `reviews` table. Timestamps are ISO-8601 UTC strings so that
 * lexical order matches chronological order.
 */
export interface ReviewRow {
  id: string;
  file_path: string;
  review_type: string;
  review_response: string;
  timestamp: string;
  metadata: string | null;
}

interface SerializedComment {
  line_number: number | null;
  content: string;
  severity: string;
  category: string;
  suggested_fix: string | null;
}

interface SerializedResponse {
  comments: SerializedComment[];
  summary: string;
  score: number | null;
  metadata: Record<string, unknown>;
  timestamp: string;
}

const SEVERITIES: ReadonlySet<string> = new Set(Object.values(CommentSeverity));
const CATEGORIES: ReadonlySet<string> = new Set(Object.values(CommentCategory));

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSeverity(value: unknown): value is CommentSeverity {
  return typeof value === 'string' && SEVERITIES.has(value);
}

function isCategory(value: unknown): value is CommentCategory {
  return typeof value === 'string' && CATEGORIES.has(value);
}

export function isReviewRow(value: unknown): value is ReviewRow {
  return (
    isObject(value) &&
    typeof value.id === 'string' &&
    typeof value.file_path === 'string' &&
    typeof value.review_type === 'string' &&
    typeof value.review_response === 'string' &&
    typeof value.timestamp === 'string' &&
    (value.metadata === null || typeof value.metadata === 'string')
  );
}

export function serializeResponse(response: AIResponse): string {
  const serialized: SerializedResponse = {
    comments: response.comments.map(comment => ({
      line_number: comment.lineNumber ?? null,
      content: comment.content,
      severity: comment.severity,
      category: comment.category,
      suggested_fix: comment.suggestedFix ?? null,
    })),
    summary: response.summary,
    score: response.score ?? null,
    metadata: response.metadata,
    timestamp: response.timestamp.toISOString(),
  };
  return JSON.stringify(serialized);
}

function deserializeComment(value: unknown): ReviewComment {
  if (
    !isObject(value) ||
    typeof value.content !== 'string' ||
    !isSeverity(value.severity) ||
    !isCategory(value.category)
  ) {
    throw new Error('malformed comment entry');
  }
  return new ReviewComment(
    value.content,
    value.severity,
    value.category,
    typeof value.line_number === 'number' ? value.line_number : undefined,
    typeof value.suggested_fix === 'string' ? value.suggested_fix : undefined,
  );
}

export function deserializeResponse(data: string): AIResponse {
  try {
    const parsed: unknown = JSON.parse(data);
    if (!isObject(parsed) || !Array.isArray(parsed.comments) || typeof parsed.summary !== 'string') {
      throw new Error('missing comments or summary');
    }
    const timestamp = typeof parsed.timestamp === 'string' ? new Date(parsed.timestamp) : new Date(0);
    return new AIResponse(
      parsed.comments.map(deserializeComment),
      parsed.summary,
      typeof parsed.score === 'number' ? parsed.score : undefined,
      isObject(parsed.metadata) ? parsed.metadata : {},
      timestamp,
    );
  } catch (error) {
    throw new StorageError(`Failed to deserialize review: ${errorMessage(error)}`, { cause: error });
  }
}

function deserializeMetadata(data: string | null): Record<string, unknown> {
  if (data === null) return {};
  try {
    const parsed: unknown = JSON.parse(data);
    if (!isObject(parsed)) {
      throw new Error('metadata is not an object');
    }
    return parsed;
  } catch (error) {
    throw new StorageError(`Failed to deserialize review metadata: ${errorMessage(error)}`, { cause: error });
  }
}

export function serializeMetadata(metadata?: Record<string, unknown>): string | null {
  return metadata && Object.keys(metadata).length > 0 ? JSON.stringify(metadata) : null;
}

export function toReviewRecord(row: ReviewRow): ReviewRecord {
  if (!isReviewType(row.review_type)) {
    throw new StorageError(`Unknown review type "${row.review_type}" stored for review ${row.id}`);
  }
  return new ReviewRecord(
    row.id,
    row.file_path,
    row.review_type,
    deserializeResponse(row.review_response),
    new Date(row.timestamp),
    deserializeMetadata(row.metadata),
  );
}
