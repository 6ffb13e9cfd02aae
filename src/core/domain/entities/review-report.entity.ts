export type MetricValue = string | number | boolean | null;

export class ReportSection {
  constructor(
    public readonly title: string,
    public readonly content: string,
    public readonly severity?: string,
    public readonly metrics: Record<string, MetricValue> = {},
  ) {}
}

export class ReviewReport {
  constructor(
    public readonly title: string,
    public readonly summary: string,
    public readonly sections: ReportSection[],
    public readonly timestamp: Date = new Date(),
    public readonly metadata: Record<string, unknown> = {},
  ) {}

  get totalSections(): number {
    return this.sections.length;
  }

  getSectionsBySeverity(severity: string): ReportSection[] {
    return this.sections.filter(section => section.severity === severity);
  }
}
