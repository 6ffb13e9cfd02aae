import { CommentCategory, CommentSeverity } from '@core/domain/entities/ai-response.entity';
import { MetricValue, ReportSection } from '@core/domain/entities/review-report.entity';
import { formatDay, formatScore, titleCase } from '../markdown.format';
import { ReportTemplate, TemplateContext, TemplateRegistry, TemplateVariable, TemplateVariableName } from './report-template';

const REVIEW_VARIABLE: TemplateVariable = { description: 'The review response', required: true };
const FILE_PATH_VARIABLE: TemplateVariable = { description: 'Path of the reviewed file', required: true };

function lineLabel(lineNumber: number | undefined): string {
  return lineNumber === undefined ? 'N/A' : String(lineNumber);
}

export class ExecutiveSummaryTemplate extends ReportTemplate {
  readonly templateId = 'executive-summary';
  readonly name = 'Executive Summary';
  readonly description = 'A concise summary focusing on key findings and recommendations';
  readonly variables: Partial<Record<TemplateVariableName, TemplateVariable>> = {
    review: REVIEW_VARIABLE,
    filePath: FILE_PATH_VARIABLE,
    reviewType: { description: 'Type of review performed', required: true },
  };

  protected renderSections(context: TemplateContext): ReportSection[] {
    const review = this.value(context, 'review');
    const errors = review.getCommentsBySeverity(CommentSeverity.ERROR);
    const warnings = review.getCommentsBySeverity(CommentSeverity.WARNING).length;
    const suggestions = review.getCommentsBySeverity(CommentSeverity.SUGGESTION).length;

    const summary = new ReportSection(
      'Executive Summary',
      [
        '# Executive Summary',
        '',
        '## Overview',
        `- **File:** \`${this.value(context, 'filePath')}\``,
        `- **Review Type:** ${this.value(context, 'reviewType')}`,
        `- **Quality Score:** ${formatScore(review.score)}`,
        `- **Review Date:** ${formatDay(context.generatedAt ?? new Date())}`,
        '',
        '## Key Findings',
        `- Critical Issues: ${errors.length}`,
        `- Warnings: ${warnings}`,
        `- Suggestions: ${suggestions}`,
        '',
        '## Summary',
        review.summary,
      ].join('\n'),
      undefined,
      {
        critical_issues: errors.length,
        warnings,
        suggestions,
        quality_score: review.score ?? null,
      },
    );

    if (errors.length === 0) return [summary];

    const critical = errors
      .map(comment => `- **${comment.category}** (Line ${lineLabel(comment.lineNumber)}):\n  ${comment.content}\n`)
      .join('\n');
    return [summary, new ReportSection('Critical Issues', `## Critical Issues\n\n${critical}`, CommentSeverity.ERROR)];
  }
}

export class SecurityAuditTemplate extends ReportTemplate {
  readonly templateId = 'security-audit';
  readonly name = 'Security Audit Report';
  readonly description = 'A comprehensive security audit report with detailed findings';
  readonly variables: Partial<Record<TemplateVariableName, TemplateVariable>> = {
    review: REVIEW_VARIABLE,
    filePath: FILE_PATH_VARIABLE,
    includeCode: { description: 'Whether to include suggested fixes', required: false, default: false },
  };

  protected renderSections(context: TemplateContext): ReportSection[] {
    const review = this.value(context, 'review');
    const includeCode = this.flag(context, 'includeCode');

    const sections = [
      new ReportSection(
        'Security Audit Overview',
        [
          '# Security Audit Report',
          '',
          '## File Information',
          `- **File:** \`${this.value(context, 'filePath')}\``,
          `- **Audit Date:** ${formatDay(context.generatedAt ?? new Date())}`,
          `- **Security Score:** ${formatScore(review.score)}`,
          '',
          '## Summary',
          review.summary,
        ].join('\n'),
        undefined,
        { security_score: review.score ?? null },
      ),
    ];

    const findings = review.getCommentsByCategory(CommentCategory.SECURITY);
    for (const severity of [CommentSeverity.ERROR, CommentSeverity.WARNING, CommentSeverity.SUGGESTION]) {
      const comments = findings.filter(comment => comment.severity === severity);
      if (comments.length === 0) continue;

      let content = `## ${titleCase(severity)} Level Security Issues\n\n`;
      for (const comment of comments) {
        content += `### Issue at Line ${lineLabel(comment.lineNumber)}\n${comment.content}\n\n`;
        if (comment.suggestedFix && includeCode) {
          content += `**Suggested Fix:**\n\`\`\`\n${comment.suggestedFix}\n\`\`\`\n\n`;
        }
      }
      sections.push(
        new ReportSection(`${titleCase(severity)} Security Issues`, content, severity, { count: comments.length }),
      );
    }
    return sections;
  }
}

export class PerformanceReportTemplate extends ReportTemplate {
  readonly templateId = 'performance-report';
  readonly name = 'Performance Analysis Report';
  readonly description = 'A detailed performance analysis with optimization recommendations';
  readonly variables: Partial<Record<TemplateVariableName, TemplateVariable>> = {
    review: REVIEW_VARIABLE,
    filePath: FILE_PATH_VARIABLE,
    includeMetrics: { description: 'Whether to include issue counts', required: false, default: true },
  };

  protected renderSections(context: TemplateContext): ReportSection[] {
    const review = this.value(context, 'review');

    const sections = [
      new ReportSection(
        'Performance Analysis Overview',
        [
          '# Performance Analysis Report',
          '',
          '## File Information',
          `- **File:** \`${this.value(context, 'filePath')}\``,
          `- **Analysis Date:** ${formatDay(context.generatedAt ?? new Date())}`,
          `- **Performance Score:** ${formatScore(review.score)}`,
          '',
          '## Summary',
          review.summary,
        ].join('\n'),
        undefined,
        { performance_score: review.score ?? null },
      ),
    ];

    const issues = review.getCommentsByCategory(CommentCategory.PERFORMANCE);
    if (issues.length > 0) {
      let content = '## Performance Issues\n\n';
      for (const comment of issues) {
        const line = comment.lineNumber === undefined ? '' : ` (Line ${comment.lineNumber})`;
        content += `### ${titleCase(comment.severity)} Priority Issue${line}\n${comment.content}\n\n`;
        if (comment.suggestedFix) {
          content += `**Optimization Suggestion:**\n\`\`\`\n${comment.suggestedFix}\n\`\`\`\n\n`;
        }
      }
      const metrics: Record<string, MetricValue> = this.flag(context, 'includeMetrics') ? { total_issues: issues.length } : {};
      sections.push(new ReportSection('Performance Issues', content, undefined, metrics));
    }
    return sections;
  }
}

export function createDefaultTemplateRegistry(): TemplateRegistry {
  const registry = new TemplateRegistry();
  registry.register(new ExecutiveSummaryTemplate());
  registry.register(new SecurityAuditTemplate());
  registry.register(new PerformanceReportTemplate());
  return registry;
}
