import { AIResponse, CommentSeverity, ReviewComment } from './ai-response.entity';

export interface CriticalIssue {
  filePath: string;
  comment: ReviewComment;
}

/**
 * Aggregated outcome of one batch. Each file path owns its own slot in
 * either `reviews` or `errors`, never both.
 */
export class ReviewResult {
  readonly reviews = new Map<string, AIResponse>();
  readonly errors = new Map<string, string>();
  readonly reviewIds = new Map<string, string>();
  readonly storageFailures = new Map<string, string>();
  readonly startTime: Date;
  private finishedAt?: Date;
  private successful = 0;
  private failed = 0;

  constructor(public readonly totalFiles: number, startTime: Date = new Date()) {
    this.startTime = startTime;
  }

  get endTime(): Date | undefined {
    return this.finishedAt;
  }

  get successfulReviews(): number {
    return this.successful;
  }

  get failedReviews(): number {
    return this.failed;
  }

  get isComplete(): boolean {
    return this.finishedAt !== undefined;
  }

  get durationMs(): number {
    if (!this.finishedAt) return 0;
    return this.finishedAt.getTime() - this.startTime.getTime();
  }

  addReview(filePath: string, review: AIResponse, reviewId?: string): void {
    this.assertOpen();
    this.reviews.set(filePath, review);
    this.successful++;
    if (reviewId) {
      this.reviewIds.set(filePath, reviewId);
    }
  }

  addError(filePath: string, error: string): void {
    this.assertOpen();
    this.errors.set(filePath, error);
    this.failed++;
  }

  addStorageFailure(filePath: string, error: string): void {
    this.storageFailures.set(filePath, error);
  }

  complete(endTime: Date = new Date()): void {
    this.assertOpen();
    this.finishedAt = endTime;
  }

  getCriticalIssues(): CriticalIssue[] {
    const issues: CriticalIssue[] = [];
    for (const [filePath, review] of this.reviews) {
      for (const comment of review.getCommentsBySeverity(CommentSeverity.ERROR)) {
        issues.push({ filePath, comment });
      }
    }
    return issues;
  }

  private assertOpen(): void {
    if (this.finishedAt) {
      throw new Error('Review result is already complete');
    }
  }
}
