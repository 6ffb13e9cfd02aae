import { Injectable } from '@nestjs/common';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import { CodeReviewService } from '@core/services/code-review.service';

@Injectable()
export class GetReviewUseCase {
  constructor(private readonly codeReviewService: CodeReviewService) {}

  async execute(id: string): Promise<ReviewRecord | null> {
    return this.codeReviewService.getReview(id);
  }
}
