import { describe, it, expect, beforeEach } from 'vitest';
import { HistoryController } from '../../../src/presentation/controllers/history.controller';
import { CodeReviewService } from '../../../src/core/services/code-review.service';
import { ReviewType } from '../../../src/core/domain/entities/review-request.entity';
import { StorageError } from '../../../src/core/domain/errors/review.errors';
import { InMemoryReviewStorage } from '../../../src/infrastructure/persistence/in-memory-review.storage';
import { MarkdownReportGenerator } from '../../../src/infrastructure/reporting/markdown-report.generator';
import { TemplateRegistry } from '../../../src/infrastructure/reporting/templates/report-template';
import { CleanupQueryDto, FileHistoryQueryDto, TimeframeQueryDto } from '../../../src/presentation/dtos/history-query.dto';
import { FakeAIProvider } from '../../mocks/ai-provider.mock';

describe('HistoryController', () => {
  let controller: HistoryController;
  let service: CodeReviewService;
  let now: Date;

  beforeEach(async () => {
    now = new Date('2024-05-01T10:00:00.000Z');
    service = new CodeReviewService(
      new FakeAIProvider(),
      new MarkdownReportGenerator(new TemplateRegistry()),
      new InMemoryReviewStorage(() => now),
    );
    controller = new HistoryController(service);

    await service.reviewFile('src/a.ts', 'v1');
    now = new Date('2024-05-02T10:00:00.000Z');
    await service.reviewFile('src/a.ts', 'v2', { reviewType: ReviewType.SECURITY });
    now = new Date('2024-05-03T10:00:00.000Z');
    await service.reviewFile('src/b.ts', 'v1');
  });

  it('should list the history of one file, newest first', async () => {
    const query = Object.assign(new FileHistoryQueryDto(), { path: 'src/a.ts' });

    const views = await controller.getFileHistory(query);

    expect(views.map(view => view.timestamp)).toEqual(['2024-05-02T10:00:00.000Z', '2024-05-01T10:00:00.000Z']);
  });

  it('should apply limit and review type filters', async () => {
    const limited = await controller.getFileHistory(Object.assign(new FileHistoryQueryDto(), { path: 'src/a.ts', limit: 1 }));
    const full = await controller.getFileHistory(
      Object.assign(new FileHistoryQueryDto(), { path: 'src/a.ts', reviewType: ReviewType.FULL }),
    );

    expect(limited).toHaveLength(1);
    expect(full.map(view => view.reviewType)).toEqual(['full']);
  });

  it('should list reviews inside a timeframe', async () => {
    const query = Object.assign(new TimeframeQueryDto(), {
      start: new Date('2024-05-02T00:00:00.000Z'),
      end: new Date('2024-05-03T10:00:00.000Z'),
    });

    const views = await controller.getTimeframe(query);

    expect(views.map(view => view.filePath)).toEqual(['src/b.ts', 'src/a.ts']);
  });

  it('should report how many reviews were cleaned up', async () => {
    const query = Object.assign(new CleanupQueryDto(), { olderThan: new Date('2024-05-02T10:00:00.000Z') });

    await expect(controller.cleanup(query)).resolves.toEqual({ removed: 1 });
  });

  it('should surface a StorageError without storage', async () => {
    controller = new HistoryController(
      new CodeReviewService(new FakeAIProvider(), new MarkdownReportGenerator(new TemplateRegistry())),
    );

    await expect(
      controller.getFileHistory(Object.assign(new FileHistoryQueryDto(), { path: 'src/a.ts' })),
    ).rejects.toBeInstanceOf(StorageError);
  });
});
