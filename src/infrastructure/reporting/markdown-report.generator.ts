import { Logger } from '@nestjs/common';
import { AIResponse, CommentSeverity, SEVERITY_ORDER } from '@core/domain/entities/ai-response.entity';
import type { ReviewRecord } from '@core/domain/entities/review-record.entity';
import { MetricValue, ReportSection, ReviewReport } from '@core/domain/entities/review-report.entity';
import type { ReviewType } from '@core/domain/entities/review-request.entity';
import type { ReportGenerator, ReportOptions } from '@core/domain/repositories/report-generator.repository';
import { formatDay, formatMetricsTable, formatScore, formatSeverity, mean, titleCase } from './markdown.format';
import { TemplateRegistry } from './templates/report-template';

export interface MarkdownReportOptions {
  includeMetrics?: boolean;
  clock?: () => Date;
}

export interface DailyMetric {
  date: string;
  reviewCount: number;
  averageScore: number | null;
}

const HISTORY_TITLE = 'Historical Review Analysis';
const TREND_TITLE = 'Review Trend Analysis';

function scoresOf(records: readonly ReviewRecord[]): number[] {
  const scores: number[] = [];
  for (const record of records) {
    if (record.response.score !== undefined) scores.push(record.response.score);
  }
  return scores;
}

/**
 * Renders review results as Markdown sections. Named templates come from
 * the registry handed in at construction; anything else uses the built-in
 * severity layout.
 */
export class MarkdownReportGenerator implements ReportGenerator {
  private readonly logger = new Logger(MarkdownReportGenerator.name);
  private readonly includeMetrics: boolean;
  private readonly clock: () => Date;

  constructor(
    private readonly templates: TemplateRegistry,
    options: MarkdownReportOptions = {},
  ) {
    this.includeMetrics = options.includeMetrics ?? true;
    this.clock = options.clock ?? (() => new Date());
  }

  generateFileReport(
    response: AIResponse,
    filePath: string,
    reviewType: ReviewType,
    options: ReportOptions = {},
  ): ReviewReport {
    const now = this.clock();
    const includeCode = options.includeCode ?? false;

    const templated = this.renderTemplate(response, filePath, reviewType, includeCode, now, options.templateId);
    if (templated) return templated;

    const metrics = this.reviewMetrics(response);
    const overview = new ReportSection(
      'Overview',
      [
        '## Review Summary',
        response.summary,
        '',
        '### File Information',
        `- **File:** \`${filePath}\``,
        `- **Review Type:** ${reviewType}`,
        `- **Timestamp:** ${now.toISOString()}`,
        '',
        formatMetricsTable(metrics),
      ].join('\n'),
      undefined,
      metrics,
    );

    const sections = [overview];
    for (const severity of SEVERITY_ORDER) {
      const comments = response.getCommentsBySeverity(severity);
      if (comments.length === 0) continue;

      let content = `## ${formatSeverity(severity)} Comments\n\n`;
      for (const comment of comments) {
        content += `### ${comment.lineNumber === undefined ? 'General' : `Line ${comment.lineNumber}`}\n`;
        content += `${comment.content}\n\n`;
        if (comment.suggestedFix && includeCode) {
          content += `**Suggested Fix:**\n\`\`\`\n${comment.suggestedFix}\n\`\`\`\n\n`;
        }
      }
      sections.push(new ReportSection(`${titleCase(severity)} Comments`, content, severity, { count: comments.length }));
    }

    return new ReviewReport(`Code Review: ${filePath}`, response.summary, sections, now, {
      filePath,
      reviewType,
      metrics,
    });
  }

  generateMultiFileReport(
    responses: ReadonlyMap<string, AIResponse>,
    reviewType: ReviewType,
    options: ReportOptions = {},
  ): ReviewReport {
    const now = this.clock();
    const fileSections: ReportSection[] = [];
    const scores: number[] = [];
    let totalIssues = 0;

    for (const [filePath, response] of responses) {
      const report = this.generateFileReport(response, filePath, reviewType, options);
      const metrics = this.reviewMetrics(response);
      totalIssues += response.comments.length;
      if (response.score !== undefined) scores.push(response.score);

      fileSections.push(
        new ReportSection(filePath, `## ${filePath}\n\n${report.summary}\n\n${formatMetricsTable(metrics)}`, undefined, metrics),
      );
    }

    const fileCount = responses.size;
    const overall: Record<string, MetricValue> = {
      'Total Files': fileCount,
      'Total Issues': totalIssues,
      'Average Issues per File': fileCount > 0 ? totalIssues / fileCount : 0,
      'Average Quality Score': mean(scores),
    };

    const overview = new ReportSection(
      'Overview',
      [
        '# Multi-File Review Report',
        '',
        '## Summary',
        `- Reviewed ${fileCount} files`,
        `- Found ${totalIssues} total issues`,
        `- Review Type: ${reviewType}`,
        `- Generated: ${now.toISOString()}`,
        '',
        formatMetricsTable(overall),
      ].join('\n'),
      undefined,
      overall,
    );

    return new ReviewReport('Multi-File Code Review Report', `Review of ${fileCount} files`, [overview, ...fileSections], now, {
      reviewType,
      fileCount,
      metrics: overall,
      templateId: options.templateId ?? null,
    });
  }

  generateHistoricalReport(records: ReviewRecord[], filePath?: string, reviewType?: ReviewType): ReviewReport {
    const now = this.clock();
    const metadata = { filePath: filePath ?? null, reviewType: reviewType ?? null };
    if (records.length === 0) {
      return new ReviewReport(HISTORY_TITLE, 'No review history available', [], now, metadata);
    }

    const chronological = [...records].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    const averageScore = mean(scoresOf(records));
    const metrics: Record<string, MetricValue> = {
      'Total Reviews': records.length,
      'Average Quality Score': formatScore(averageScore),
      'First Review': chronological[0].timestamp.toISOString(),
      'Latest Review': chronological[chronological.length - 1].timestamp.toISOString(),
    };

    const overview = new ReportSection(
      'Historical Analysis Overview',
      [
        '# Code Review History Report',
        filePath ? `## File: \`${filePath}\`` : '## All Files',
        reviewType ? `Review Type: ${reviewType}` : '',
        '',
        formatMetricsTable(metrics),
      ].join('\n'),
      undefined,
      metrics,
    );

    const scored = chronological.filter(record => record.response.score !== undefined);
    let trend = '## Quality Score Trend\n\n';
    if (scored.length > 0) {
      trend += 'Quality scores over time:\n\n';
      for (const record of scored) {
        trend += `- ${record.timestamp.toISOString()}: ${formatScore(record.response.score)}\n`;
      }
    } else {
      trend += 'No quality scores available for trend analysis.\n';
    }

    return new ReviewReport(
      HISTORY_TITLE,
      `Analysis of ${records.length} reviews`,
      [overview, new ReportSection('Trend Analysis', trend)],
      now,
      { ...metadata, metrics },
    );
  }

  generateTrendReport(records: ReviewRecord[], start: Date, end: Date, reviewType?: ReviewType): ReviewReport {
    const now = this.clock();
    const window = { start: start.toISOString(), end: end.toISOString(), reviewType: reviewType ?? null };
    if (records.length === 0) {
      return new ReviewReport(TREND_TITLE, 'No reviews available for trend analysis', [], now, window);
    }

    const byDay = new Map<string, ReviewRecord[]>();
    for (const record of records) {
      const day = formatDay(record.timestamp);
      const bucket = byDay.get(day);
      if (bucket) {
        bucket.push(record);
      } else {
        byDay.set(day, [record]);
      }
    }

    const daily: DailyMetric[] = Array.from(byDay.keys())
      .sort()
      .map(date => {
        const bucket = byDay.get(date) ?? [];
        return { date, reviewCount: bucket.length, averageScore: mean(scoresOf(bucket)) };
      });

    const averagePerDay = records.length / byDay.size;
    const overview = new ReportSection(
      'Trend Analysis Overview',
      [
        '# Review Trend Analysis',
        `## Time Period: ${formatDay(start)} to ${formatDay(end)}`,
        reviewType ? `Review Type: ${reviewType}` : '',
        '',
        '### Overall Statistics',
        `- Total Reviews: ${records.length}`,
        `- Days with Reviews: ${byDay.size}`,
        `- Average Reviews per Day: ${averagePerDay.toFixed(2)}`,
        `- Average Quality Score: ${formatScore(mean(scoresOf(records)))}`,
      ].join('\n'),
      undefined,
      {
        total_reviews: records.length,
        days_with_reviews: byDay.size,
        avg_reviews_per_day: averagePerDay,
        avg_score: mean(scoresOf(records)),
      },
    );

    const rows = daily.map(day => `| ${day.date} | ${day.reviewCount} | ${formatScore(day.averageScore)} |`);
    const breakdown = ['## Daily Breakdown', '', '| Date | Reviews | Avg Score |', '|------|---------|-----------|', ...rows].join('\n');

    return new ReviewReport(
      TREND_TITLE,
      `Analysis of ${records.length} reviews over ${byDay.size} days`,
      [overview, new ReportSection('Daily Breakdown', `${breakdown}\n`)],
      now,
      { ...window, dailyMetrics: daily },
    );
  }

  private renderTemplate(
    response: AIResponse,
    filePath: string,
    reviewType: ReviewType,
    includeCode: boolean,
    now: Date,
    templateId?: string,
  ): ReviewReport | undefined {
    if (!templateId) return undefined;

    const template = this.templates.get(templateId);
    if (!template) {
      this.logger.warn(`Unknown report template "${templateId}", using the default layout`);
      return undefined;
    }

    const context = {
      review: response,
      filePath,
      reviewType,
      includeCode,
      includeMetrics: this.includeMetrics,
      generatedAt: now,
    };
    if (!template.validateContext(context)) {
      this.logger.warn(`Template "${templateId}" cannot render this context, using the default layout`);
      return undefined;
    }

    return new ReviewReport(`${template.name}: ${filePath}`, response.summary, template.render(context), now, {
      templateId,
      filePath,
      reviewType,
    });
  }

  private reviewMetrics(response: AIResponse): Record<string, MetricValue> {
    if (!this.includeMetrics) return {};
    const count = (severity: CommentSeverity): number => response.getCommentsBySeverity(severity).length;
    return {
      'Total Comments': response.comments.length,
      'Errors': count(CommentSeverity.ERROR),
      'Warnings': count(CommentSeverity.WARNING),
      'Suggestions': count(CommentSeverity.SUGGESTION),
      'Praise': count(CommentSeverity.PRAISE),
      'Quality Score': response.score ?? 'N/A',
    };
  }
}
