export enum ReviewType {
  FULL = 'full',
  SECURITY = 'security',
  PERFORMANCE = 'performance',
  MAINTAINABILITY = 'maintainability',
  STYLE = 'style',
  DOCUMENTATION = 'documentation',
  QUICK = 'quick',
}

const REVIEW_TYPES: ReadonlySet<string> = new Set(Object.values(ReviewType));

export function isReviewType(value: unknown): value is ReviewType {
  return typeof value === 'string' && REVIEW_TYPES.has(value);
}

/**
 * Everything known about the file under review. Optional fields are filled in
 * by the orchestrator from the caller's shared context.
 */
export interface CodeContext {
  filePath: string;
  content: string;
  diff?: string;
  language?: string;
  repository?: string;
  baseBranch?: string;
  commitHash?: string;
  author?: string;
  changedFiles?: string[];
}

export type CodeContextMetadata = Omit<CodeContext, 'filePath' | 'content' | 'diff'>;

export interface ReviewSettings {
  maxComments?: number;
  minSeverity?: string;
  focusAreas?: string[];
  ignorePatterns?: string[];
  customRules?: Record<string, unknown>;
}

export type GenerationParams = Record<string, unknown>;

const SECURITY_PATTERNS = [
  'password', 'token', 'secret', 'auth', 'crypt',
  'security', 'permission', 'access', 'private',
];

const PERFORMANCE_PATTERNS = [
  'loop', 'query', 'algorithm', 'cache', 'performance',
  'optimization', 'batch', 'concurrent', 'thread',
];

export class AIRequest {
  constructor(
    public readonly codeContext: CodeContext,
    public readonly reviewType: ReviewType,
    public readonly generationParams: GenerationParams = {},
    public readonly settings?: ReviewSettings,
    public readonly maxTokens?: number,
    public readonly temperature: number = 0.7,
  ) {}

  validate(): boolean {
    if (!this.codeContext.content) return false;
    if (!this.codeContext.filePath) return false;
    if (!Number.isFinite(this.temperature) || this.temperature < 0 || this.temperature > 1) return false;
    return isReviewType(this.reviewType);
  }

  get isSecuritySensitive(): boolean {
    const content = this.codeContext.content.toLowerCase();
    return SECURITY_PATTERNS.some(pattern => content.includes(pattern));
  }

  get isPerformanceCritical(): boolean {
    const content = this.codeContext.content.toLowerCase();
    return PERFORMANCE_PATTERNS.some(pattern => content.includes(pattern));
  }
}
