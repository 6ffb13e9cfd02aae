import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { AIResponse } from '@core/domain/entities/ai-response.entity';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import type { ReviewReport } from '@core/domain/entities/review-report.entity';
import {
  AIRequest,
  CodeContextMetadata,
  GenerationParams,
  ReviewSettings,
  ReviewType,
} from '@core/domain/entities/review-request.entity';
import { ReviewResult } from '@core/domain/entities/review-result.entity';
import { ReviewError, StorageError, errorMessage } from '@core/domain/errors/review.errors';
import type { AIProvider } from '@core/domain/repositories/ai-provider.repository';
import type { ReportGenerator, ReportOptions } from '@core/domain/repositories/report-generator.repository';
import type { FileReviewQuery, ReviewStorage } from '@core/domain/repositories/review-storage.repository';
import type { ChangedFile } from '@core/domain/repositories/source-hosting.repository';
import {
  AI_PROVIDER_TOKEN,
  REPORT_GENERATOR_TOKEN,
  REVIEW_SERVICE_SETTINGS_TOKEN,
  REVIEW_STORAGE_TOKEN,
} from '@core/domain/repositories/injection-tokens';
import { runBounded } from './bounded-pool';

export const DEFAULT_MAX_CONCURRENT = 3;

/**
 * Process-wide defaults, assembled from configuration at startup.
 */
export interface ReviewServiceSettings {
  reviewType?: ReviewType;
  settings?: ReviewSettings;
  maxConcurrent?: number;
  temperature?: number;
  maxTokens?: number;
  store?: boolean;
}

export interface ReviewFileOptions {
  reviewType?: ReviewType;
  settings?: ReviewSettings;
  /** Persist the response when a storage is configured. Defaults to true. */
  store?: boolean;
  diff?: string;
  context?: CodeContextMetadata;
  temperature?: number;
  maxTokens?: number;
  generationParams?: GenerationParams;
}

export interface ReviewBatchOptions extends Omit<ReviewFileOptions, 'diff'> {
  maxConcurrent?: number;
}

export type StorageStatus = 'stored' | 'skipped' | 'failed';

export interface FileReviewOutcome {
  response: AIResponse;
  reviewId?: string;
  storage: StorageStatus;
  storageError?: string;
}

export type FileSet<T> = ReadonlyMap<string, T> | Readonly<Record<string, T>>;

function isFileMap<T>(files: FileSet<T>): files is ReadonlyMap<string, T> {
  return files instanceof Map;
}

function entriesOf<T>(files: FileSet<T>): [string, T][] {
  return isFileMap(files) ? Array.from(files.entries()) : Object.entries(files);
}

@Injectable()
export class CodeReviewService {
  private readonly logger = new Logger(CodeReviewService.name);
  private defaultReviewType: ReviewType;
  private defaultSettings?: ReviewSettings;

  constructor(
    @Inject(AI_PROVIDER_TOKEN) private readonly provider: AIProvider,
    @Inject(REPORT_GENERATOR_TOKEN) private readonly reportGenerator: ReportGenerator,
    @Optional() @Inject(REVIEW_STORAGE_TOKEN) private readonly storage?: ReviewStorage,
    @Optional() @Inject(REVIEW_SERVICE_SETTINGS_TOKEN) private readonly serviceSettings: ReviewServiceSettings = {},
  ) {
    this.defaultReviewType = serviceSettings.reviewType ?? ReviewType.FULL;
    this.defaultSettings = serviceSettings.settings;
  }

  get providerName(): string {
    return this.provider.providerName;
  }

  get hasStorage(): boolean {
    return this.storage !== undefined;
  }

  setDefaultReviewType(reviewType: ReviewType): void {
    this.defaultReviewType = reviewType;
  }

  setDefaultSettings(settings: ReviewSettings | undefined): void {
    this.defaultSettings = settings;
  }

  /**
   * Review one file. Provider failures are raised as ReviewError; a failed
   * save only shows up in the outcome's `storage` status.
   */
  async reviewFile(filePath: string, content: string, options: ReviewFileOptions = {}): Promise<FileReviewOutcome> {
    const request = new AIRequest(
      { ...options.context, filePath, content, diff: options.diff },
      options.reviewType ?? this.defaultReviewType,
      options.generationParams,
      options.settings ?? this.defaultSettings,
      options.maxTokens ?? this.serviceSettings.maxTokens,
      options.temperature ?? this.serviceSettings.temperature,
    );

    let response: AIResponse;
    try {
      response = await this.provider.generateReview(request);
    } catch (error) {
      this.logger.error(`Failed to review file ${filePath}: ${errorMessage(error)}`);
      throw new ReviewError(`Review failed for ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    return this.persist(filePath, request.reviewType, response, options);
  }

  /**
   * Review every file with at most `maxConcurrent` provider calls in flight.
   * Per-file failures are recorded on the result and never abort the batch.
   */
  async reviewFiles(files: FileSet<string>, options: ReviewBatchOptions = {}): Promise<ReviewResult> {
    const changes: [string, ChangedFile][] = entriesOf(files).map(([path, content]) => [path, { content }]);
    return this.runBatch(changes, options);
  }

  async reviewChanges(
    files: FileSet<ChangedFile>,
    baseBranch: string = 'main',
    options: ReviewBatchOptions = {},
  ): Promise<ReviewResult> {
    return this.runBatch(entriesOf(files), { ...options, context: { ...options.context, baseBranch } });
  }

  async getFileHistory(filePath: string, query: FileReviewQuery = {}): Promise<ReviewRecord[]> {
    return this.requireStorage().getFileReviews(filePath, query);
  }

  async getReviewsInTimeframe(start: Date, end: Date, reviewType?: ReviewType): Promise<ReviewRecord[]> {
    return this.requireStorage().getReviewsInTimeframe(start, end, reviewType);
  }

  async getReview(id: string): Promise<ReviewRecord | null> {
    return this.requireStorage().getReview(id);
  }

  async deleteReview(id: string): Promise<boolean> {
    return this.requireStorage().deleteReview(id);
  }

  async cleanupOldReviews(olderThan: Date): Promise<number> {
    return this.requireStorage().cleanupOldReviews(olderThan);
  }

  generateReport(result: ReviewResult, reviewType: ReviewType = this.defaultReviewType, options?: ReportOptions): ReviewReport {
    return this.reportGenerator.generateMultiFileReport(result.reviews, reviewType, options);
  }

  generateFileReport(
    filePath: string,
    response: AIResponse,
    reviewType: ReviewType = this.defaultReviewType,
    options?: ReportOptions,
  ): ReviewReport {
    return this.reportGenerator.generateFileReport(response, filePath, reviewType, options);
  }

  /** Without a file path, every stored review up to now is analysed. */
  async generateHistoricalReport(filePath?: string, reviewType?: ReviewType, limit?: number): Promise<ReviewReport> {
    const storage = this.requireStorage();
    const records = filePath
      ? await storage.getFileReviews(filePath, { limit, reviewType })
      : await storage.getReviewsInTimeframe(new Date(0), new Date(), reviewType);
    return this.reportGenerator.generateHistoricalReport(records, filePath, reviewType);
  }

  async generateTrendReport(start: Date, end: Date, reviewType?: ReviewType): Promise<ReviewReport> {
    const records = await this.requireStorage().getReviewsInTimeframe(start, end, reviewType);
    return this.reportGenerator.generateTrendReport(records, start, end, reviewType);
  }

  private async runBatch(files: [string, ChangedFile][], options: ReviewBatchOptions): Promise<ReviewResult> {
    const { maxConcurrent, ...fileOptions } = options;
    const limit = maxConcurrent ?? this.serviceSettings.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    const result = new ReviewResult(files.length);

    this.logger.log(`Reviewing ${files.length} file(s) with ${this.provider.providerName}, concurrency ${limit}`);

    await runBounded(files, limit, async ([filePath, file]) => {
      try {
        const outcome = await this.reviewFile(filePath, file.content, {
          ...fileOptions,
          diff: file.diff,
          context: file.language ? { ...fileOptions.context, language: file.language } : fileOptions.context,
        });
        result.addReview(filePath, outcome.response, outcome.reviewId);
        if (outcome.storageError) {
          result.addStorageFailure(filePath, outcome.storageError);
        }
      } catch (error) {
        result.addError(filePath, errorMessage(error));
      }
    });

    result.complete();
    this.logger.log(
      `Batch finished in ${result.durationMs}ms: ${result.successfulReviews} succeeded, ${result.failedReviews} failed`,
    );
    return result;
  }

  private async persist(
    filePath: string,
    reviewType: ReviewType,
    response: AIResponse,
    options: ReviewFileOptions,
  ): Promise<FileReviewOutcome> {
    const store = options.store ?? this.serviceSettings.store ?? true;
    if (!store || !this.storage) {
      return { response, storage: 'skipped' };
    }

    try {
      const reviewId = await this.storage.saveReview(filePath, reviewType, response, { ...options.context });
      return { response, reviewId, storage: 'stored' };
    } catch (error) {
      const storageError = errorMessage(error);
      this.logger.warn(`Failed to store review for ${filePath}: ${storageError}`);
      return { response, storage: 'failed', storageError };
    }
  }

  private requireStorage(): ReviewStorage {
    if (!this.storage) {
      throw new StorageError('Storage is not configured');
    }
    return this.storage;
  }
}
