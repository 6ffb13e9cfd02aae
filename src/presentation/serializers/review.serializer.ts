import type { AIResponse, ReviewComment } from '@core/domain/entities/ai-response.entity';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import type { MetricValue, ReviewReport } from '@core/domain/entities/review-report.entity';
import type { ReviewResult } from '@core/domain/entities/review-result.entity';
import type { FeedbackComment, FeedbackDisposition } from '@core/domain/repositories/source-hosting.repository';
import type { PullRequestReview } from '@core/usecases/review-pull-request.usecase';

export interface CommentView {
  lineNumber: number | null;
  content: string;
  severity: string;
  category: string;
  suggestedFix: string | null;
}

export interface ResponseView {
  summary: string;
  score: number | null;
  comments: CommentView[];
  metadata: Record<string, unknown>;
  timestamp: string;
}

export interface ResultView {
  totalFiles: number;
  successfulReviews: number;
  failedReviews: number;
  startTime: string;
  endTime: string | null;
  durationMs: number;
  reviews: Record<string, ResponseView>;
  errors: Record<string, string>;
  reviewIds: Record<string, string>;
  storageFailures: Record<string, string>;
}

export interface RecordView {
  id: string;
  filePath: string;
  reviewType: string;
  timestamp: string;
  metadata: Record<string, unknown>;
  response: ResponseView;
}

export interface ReportView {
  title: string;
  summary: string;
  timestamp: string;
  metadata: Record<string, unknown>;
  sections: {
    title: string;
    content: string;
    severity: string | null;
    metrics: Record<string, MetricValue>;
  }[];
}

export interface PullRequestReviewView {
  disposition: FeedbackDisposition;
  comments: FeedbackComment[];
  result: ResultView;
}

function mapValues<T, R>(source: ReadonlyMap<string, T>, transform: (value: T) => R): Record<string, R> {
  return Object.fromEntries(Array.from(source, ([key, value]): [string, R] => [key, transform(value)]));
}

function toCommentView(comment: ReviewComment): CommentView {
  return {
    lineNumber: comment.lineNumber ?? null,
    content: comment.content,
    severity: comment.severity,
    category: comment.category,
    suggestedFix: comment.suggestedFix ?? null,
  };
}

export function toResponseView(response: AIResponse): ResponseView {
  return {
    summary: response.summary,
    score: response.score ?? null,
    comments: response.comments.map(toCommentView),
    metadata: response.metadata,
    timestamp: response.timestamp.toISOString(),
  };
}

export function toResultView(result: ReviewResult): ResultView {
  return {
    totalFiles: result.totalFiles,
    successfulReviews: result.successfulReviews,
    failedReviews: result.failedReviews,
    startTime: result.startTime.toISOString(),
    endTime: result.endTime?.toISOString() ?? null,
    durationMs: result.durationMs,
    reviews: mapValues(result.reviews, toResponseView),
    errors: mapValues(result.errors, error => error),
    reviewIds: mapValues(result.reviewIds, id => id),
    storageFailures: mapValues(result.storageFailures, error => error),
  };
}

export function toRecordView(record: ReviewRecord): RecordView {
  return {
    id: record.id,
    filePath: record.filePath,
    reviewType: record.reviewType,
    timestamp: record.timestamp.toISOString(),
    metadata: record.metadata,
    response: toResponseView(record.response),
  };
}

export function toPullRequestReviewView(review: PullRequestReview): PullRequestReviewView {
  return {
    disposition: review.disposition,
    comments: review.comments,
    result: toResultView(review.result),
  };
}

export function toReportView(report: ReviewReport): ReportView {
  return {
    title: report.title,
    summary: report.summary,
    timestamp: report.timestamp.toISOString(),
    metadata: report.metadata,
    sections: report.sections.map(section => ({
      title: section.title,
      content: section.content,
      severity: section.severity ?? null,
      metrics: section.metrics,
    })),
  };
}
