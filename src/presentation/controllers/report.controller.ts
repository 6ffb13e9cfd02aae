import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CodeReviewService } from '@core/services/code-review.service';
import { TemplateRegistry, TemplateSummary } from '@infrastructure/reporting/templates/report-template';
import { HistoryReportQueryDto, TimeframeQueryDto } from '../dtos/history-query.dto';
import { ReportView, toReportView } from '../serializers/review.serializer';

@ApiTags('reports')
@Controller('reports')
export class ReportController {
  constructor(
    private readonly codeReviewService: CodeReviewService,
    private readonly templates: TemplateRegistry,
  ) {}

  @Get('history')
  @ApiOperation({ summary: 'Historical analysis of stored reviews' })
  async historical(@Query() query: HistoryReportQueryDto): Promise<ReportView> {
    const report = await this.codeReviewService.generateHistoricalReport(query.path, query.reviewType, query.limit);
    return toReportView(report);
  }

  @Get('trend')
  @ApiOperation({ summary: 'Per-day review counts and scores over a time window' })
  async trend(@Query() query: TimeframeQueryDto): Promise<ReportView> {
    const report = await this.codeReviewService.generateTrendReport(query.start, query.end, query.reviewType);
    return toReportView(report);
  }

  @Get('templates')
  @ApiOperation({ summary: 'Registered report templates' })
  listTemplates(): TemplateSummary[] {
    return this.templates.list();
  }
}
