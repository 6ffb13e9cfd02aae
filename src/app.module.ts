import { Logger, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';

// Core domain providers
import {
  AI_PROVIDER_TOKEN,
  REPORT_GENERATOR_TOKEN,
  REVIEW_SERVICE_SETTINGS_TOKEN,
  REVIEW_STORAGE_TOKEN,
  SOURCE_HOSTING_TOKEN,
} from '@core/domain/repositories/injection-tokens';
import type { AIProvider } from '@core/domain/repositories/ai-provider.repository';
import type { ReportGenerator } from '@core/domain/repositories/report-generator.repository';
import type { ReviewStorage } from '@core/domain/repositories/review-storage.repository';
import { CodeReviewService, ReviewServiceSettings } from '@core/services/code-review.service';
import { GetReviewUseCase } from '@core/usecases/get-review.usecase';
import { ReviewPullRequestUseCase } from '@core/usecases/review-pull-request.usecase';

// Infrastructure providers
import { AIProviderFactory, createDefaultProviderFactory } from '@infrastructure/ai/ai-provider.factory';
import {
  loadProviderConfig,
  loadReviewServiceSettings,
  loadStoragePath,
} from '@infrastructure/config/review-settings.config';
import { InMemoryReviewStorage } from '@infrastructure/persistence/in-memory-review.storage';
import { SqliteReviewStorage } from '@infrastructure/persistence/sqlite-review.storage';
import { MarkdownReportGenerator } from '@infrastructure/reporting/markdown-report.generator';
import { TemplateRegistry } from '@infrastructure/reporting/templates/report-template';
import { createDefaultTemplateRegistry } from '@infrastructure/reporting/templates/standard.templates';
import { GithubSourceHosting } from '@infrastructure/vcs/github-source-hosting';

// Presentation
import { HistoryController } from '@presentation/controllers/history.controller';
import { ReportController } from '@presentation/controllers/report.controller';
import { ReviewController } from '@presentation/controllers/review.controller';
import { DomainExceptionFilter } from '@presentation/filters/domain-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  controllers: [
    ReviewController,
    HistoryController,
    ReportController,
  ],
  providers: [
    { provide: AIProviderFactory, useFactory: createDefaultProviderFactory },
    { provide: TemplateRegistry, useFactory: createDefaultTemplateRegistry },
    {
      provide: AI_PROVIDER_TOKEN,
      useFactory: (config: ConfigService, factory: AIProviderFactory): AIProvider => {
        const provider = loadProviderConfig(config);
        return factory.create(provider.name, provider.apiKey, provider.options);
      },
      inject: [ConfigService, AIProviderFactory],
    },
    {
      provide: REVIEW_STORAGE_TOKEN,
      useFactory: (config: ConfigService): ReviewStorage => {
        const path = loadStoragePath(config);
        if (path === undefined) {
          new Logger('ReviewStorage').warn('Review history is kept in memory and lost on restart');
          return new InMemoryReviewStorage();
        }
        return new SqliteReviewStorage(path);
      },
      inject: [ConfigService],
    },
    {
      provide: REPORT_GENERATOR_TOKEN,
      useFactory: (templates: TemplateRegistry): ReportGenerator => new MarkdownReportGenerator(templates),
      inject: [TemplateRegistry],
    },
    {
      provide: REVIEW_SERVICE_SETTINGS_TOKEN,
      useFactory: (config: ConfigService): ReviewServiceSettings => loadReviewServiceSettings(config),
      inject: [ConfigService],
    },
    { provide: SOURCE_HOSTING_TOKEN, useClass: GithubSourceHosting },
    { provide: APP_FILTER, useClass: DomainExceptionFilter },

    // Use cases
    CodeReviewService,
    GetReviewUseCase,
    ReviewPullRequestUseCase,
  ],
})
export class AppModule {}
