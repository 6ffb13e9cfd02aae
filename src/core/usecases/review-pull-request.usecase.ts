import { Inject, Injectable, Logger } from '@nestjs/common';
import { ReviewComment } from '@core/domain/entities/ai-response.entity';
import { ReviewResult } from '@core/domain/entities/review-result.entity';
import type {
  FeedbackComment,
  FeedbackDisposition,
  SourceHostingRepository,
} from '@core/domain/repositories/source-hosting.repository';
import { SOURCE_HOSTING_TOKEN } from '@core/domain/repositories/injection-tokens';
import { CodeReviewService, ReviewBatchOptions } from '@core/services/code-review.service';

export interface PullRequestReviewOptions extends ReviewBatchOptions {
  baseBranch?: string;
}

export interface PullRequestReview {
  result: ReviewResult;
  comments: FeedbackComment[];
  disposition: FeedbackDisposition;
}

export function formatFeedbackBody(comment: ReviewComment): string {
  let body = `**${comment.severity.toUpperCase()}** (${comment.category}): ${comment.content}`;
  if (comment.suggestedFix) {
    body += `\n\nSuggested fix:\n\`\`\`\n${comment.suggestedFix}\n\`\`\``;
  }
  return body;
}

export function decideDisposition(result: ReviewResult, comments: FeedbackComment[]): FeedbackDisposition {
  if (result.getCriticalIssues().length > 0) return 'request_changes';
  if (comments.length === 0 && result.failedReviews === 0) return 'approve';
  return 'comment';
}

@Injectable()
export class ReviewPullRequestUseCase {
  private readonly logger = new Logger(ReviewPullRequestUseCase.name);

  constructor(
    @Inject(SOURCE_HOSTING_TOKEN) private readonly sourceHosting: SourceHostingRepository,
    private readonly codeReviewService: CodeReviewService,
  ) {}

  async execute(
    repository: string,
    pullNumber: number,
    options: PullRequestReviewOptions = {},
  ): Promise<PullRequestReview> {
    const { baseBranch, ...batchOptions } = options;
    const revisionRef = String(pullNumber);

    this.logger.log(`Reviewing pull request #${pullNumber} in ${repository}`);
    const files = await this.sourceHosting.fetchChangedFiles(repository, revisionRef);

    const result = await this.codeReviewService.reviewChanges(files, baseBranch, {
      ...batchOptions,
      context: { ...batchOptions.context, repository, changedFiles: Array.from(files.keys()) },
    });

    const comments: FeedbackComment[] = [];
    for (const [path, response] of result.reviews) {
      for (const comment of response.comments) {
        comments.push({ path, line: comment.lineNumber, body: formatFeedbackBody(comment) });
      }
    }

    const disposition = decideDisposition(result, comments);
    await this.sourceHosting.submitFeedback(repository, revisionRef, comments, this.buildSummary(result), disposition);

    this.logger.log(`Submitted ${comments.length} comment(s) on #${pullNumber} with disposition ${disposition}`);
    return { result, comments, disposition };
  }

  private buildSummary(result: ReviewResult): string {
    const lines = [
      '## AI Code Review Summary',
      '',
      `Reviewed ${result.totalFiles} file(s): ${result.successfulReviews} succeeded, ${result.failedReviews} failed.`,
    ];
    if (result.reviews.size > 0) {
      lines.push('');
      for (const [path, response] of result.reviews) {
        lines.push(`- \`${path}\`: ${response.summary}`);
      }
    }
    if (result.errors.size > 0) {
      lines.push('', '### Files that could not be reviewed', '');
      for (const [path, error] of result.errors) {
        lines.push(`- \`${path}\`: ${error}`);
      }
    }
    return lines.join('\n');
  }
}
