import type { AIResponse } from '@core/domain/entities/ai-response.entity';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import type { ReviewReport } from '@core/domain/entities/review-report.entity';
import type { ReviewType } from '@core/domain/entities/review-request.entity';

export interface ReportOptions {
  includeCode?: boolean;
  templateId?: string;
}

export interface ReportGenerator {
  generateFileReport(
    response: AIResponse,
    filePath: string,
    reviewType: ReviewType,
    options?: ReportOptions,
  ): ReviewReport;

  generateMultiFileReport(
    responses: ReadonlyMap<string, AIResponse>,
    reviewType: ReviewType,
    options?: ReportOptions,
  ): ReviewReport;

  generateHistoricalReport(records: ReviewRecord[], filePath?: string, reviewType?: ReviewType): ReviewReport;

  generateTrendReport(records: ReviewRecord[], start: Date, end: Date, reviewType?: ReviewType): ReviewReport;
}
