import { CommentSeverity } from '@core/domain/entities/ai-response.entity';
import type { MetricValue } from '@core/domain/entities/review-report.entity';

const SEVERITY_ICONS: Record<CommentSeverity, string> = {
  [CommentSeverity.ERROR]: '🔴',
  [CommentSeverity.WARNING]: '🟡',
  [CommentSeverity.SUGGESTION]: '🔵',
  [CommentSeverity.PRAISE]: '💚',
};

export function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatSeverity(severity: CommentSeverity): string {
  return `${SEVERITY_ICONS[severity]} ${titleCase(severity)}`;
}

export function formatScore(score: number | null | undefined): string {
  return typeof score === 'number' ? score.toFixed(2) : 'N/A';
}

/** `YYYY-MM-DD` of the UTC calendar day. */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function formatMetricValue(value: MetricValue): string {
  if (value === null) return 'N/A';
  if (typeof value === 'number' && !Number.isInteger(value)) return value.toFixed(2);
  return String(value);
}

export function formatMetricsTable(metrics: Record<string, MetricValue>): string {
  const entries = Object.entries(metrics);
  if (entries.length === 0) return '';
  const rows = entries.map(([key, value]) => `| ${key} | ${formatMetricValue(value)} |`);
  return ['| Metric | Value |', '|--------|-------|', ...rows].join('\n') + '\n';
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((total, value) => total + value, 0) / values.length;
}
