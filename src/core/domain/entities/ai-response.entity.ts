export enum CommentSeverity {
  ERROR = 'error',
  WARNING = 'warning',
  SUGGESTION = 'suggestion',
  PRAISE = 'praise',
}

export enum CommentCategory {
  SECURITY = 'security',
  PERFORMANCE = 'performance',
  STYLE = 'style',
  LOGIC = 'logic',
  DOCUMENTATION = 'documentation',
  BEST_PRACTICES = 'best_practices',
  MAINTAINABILITY = 'maintainability',
}

// Most severe first
export const SEVERITY_ORDER: readonly CommentSeverity[] = [
  CommentSeverity.ERROR,
  CommentSeverity.WARNING,
  CommentSeverity.SUGGESTION,
  CommentSeverity.PRAISE,
];

export class ReviewComment {
  constructor(
    public readonly content: string,
    public readonly severity: CommentSeverity,
    public readonly category: CommentCategory,
    public readonly lineNumber?: number,
    public readonly suggestedFix?: string,
  ) {}
}

export class AIResponse {
  constructor(
    public readonly comments: ReviewComment[],
    public readonly summary: string,
    public readonly score?: number,
    public readonly metadata: Record<string, unknown> = {},
    public readonly timestamp: Date = new Date(),
  ) {}

  getCommentsBySeverity(severity: CommentSeverity): ReviewComment[] {
    return this.comments.filter(comment => comment.severity === severity);
  }

  getCommentsByCategory(category: CommentCategory): ReviewComment[] {
    return this.comments.filter(comment => comment.category === category);
  }

  get hasCriticalIssues(): boolean {
    return this.comments.some(comment => comment.severity === CommentSeverity.ERROR);
  }
}
