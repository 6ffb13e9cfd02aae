import type { AIResponse } from '@core/domain/entities/ai-response.entity';
import type { ReportSection } from '@core/domain/entities/review-report.entity';
import type { ReviewType } from '@core/domain/entities/review-request.entity';
import { ConfigurationError, ReviewError } from '@core/domain/errors/review.errors';

/**
 * Values a template may read. Every key is optional here; each template
 * declares which ones it requires through `variables`.
 */
export interface TemplateValues {
  review: AIResponse;
  filePath: string;
  reviewType: ReviewType;
  includeCode: boolean;
  includeMetrics: boolean;
  generatedAt: Date;
}

export type TemplateContext = Partial<TemplateValues>;

export type TemplateVariableName = keyof TemplateValues;

export interface TemplateVariable {
  description: string;
  required: boolean;
  default?: boolean | string | number;
}

export interface TemplateSummary {
  id: string;
  name: string;
  description: string;
}

export interface TemplateInfo extends TemplateSummary {
  variables: Partial<Record<TemplateVariableName, TemplateVariable>>;
}

const ALL_VARIABLES: readonly TemplateVariableName[] = [
  'review',
  'filePath',
  'reviewType',
  'includeCode',
  'includeMetrics',
  'generatedAt',
];

export abstract class ReportTemplate {
  abstract readonly templateId: string;
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly variables: Partial<Record<TemplateVariableName, TemplateVariable>>;

  protected abstract renderSections(context: TemplateContext): ReportSection[];

  missingVariables(context: TemplateContext): TemplateVariableName[] {
    return this.variableNames().filter(name => this.variables[name]?.required && context[name] === undefined);
  }

  validateContext(context: TemplateContext): boolean {
    return this.missingVariables(context).length === 0;
  }

  render(context: TemplateContext): ReportSection[] {
    const missing = this.missingVariables(context);
    if (missing.length > 0) {
      throw new ReviewError(`Template ${this.templateId} is missing required variables: ${missing.join(', ')}`);
    }
    return this.renderSections(context);
  }

  /** Reads a required value; `render` has already checked it is present. */
  protected value<K extends TemplateVariableName>(context: TemplateContext, name: K): TemplateValues[K] {
    const value = context[name];
    if (value === undefined) {
      throw new ReviewError(`Template ${this.templateId} has no value for ${name}`);
    }
    return value;
  }

  protected flag(context: TemplateContext, name: 'includeCode' | 'includeMetrics'): boolean {
    const value = context[name];
    if (value !== undefined) return value;
    return this.variables[name]?.default === true;
  }

  private variableNames(): TemplateVariableName[] {
    return ALL_VARIABLES.filter(name => this.variables[name] !== undefined);
  }
}

export class TemplateRegistry {
  private readonly templates = new Map<string, ReportTemplate>();

  register(template: ReportTemplate): void {
    if (!template.templateId) {
      throw new ConfigurationError('Report template id must not be empty');
    }
    this.templates.set(template.templateId, template);
  }

  get(templateId: string): ReportTemplate | undefined {
    return this.templates.get(templateId);
  }

  list(): TemplateSummary[] {
    return Array.from(this.templates.values()).map(template => ({
      id: template.templateId,
      name: template.name,
      description: template.description,
    }));
  }

  getInfo(templateId: string): TemplateInfo | undefined {
    const template = this.templates.get(templateId);
    if (!template) return undefined;
    return {
      id: template.templateId,
      name: template.name,
      description: template.description,
      variables: { ...template.variables },
    };
  }
}
