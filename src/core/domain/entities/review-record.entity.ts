import { AIResponse } from './ai-response.entity';
import { ReviewType } from './review-request.entity';

/**
 * A stored review. Only storage implementations create records; the id is
 * assigned at save time.
 */
export class ReviewRecord {
  constructor(
    public readonly id: string,
    public readonly filePath: string,
    public readonly reviewType: ReviewType,
    public readonly response: AIResponse,
    public readonly timestamp: Date,
    public readonly metadata: Record<string, unknown> = {},
  ) {}
}
