import { Logger } from '@nestjs/common';
import {
  AIResponse,
  CommentCategory,
  CommentSeverity,
  ReviewComment,
  SEVERITY_ORDER,
} from '@core/domain/entities/ai-response.entity';
import type { ReviewSettings } from '@core/domain/entities/review-request.entity';
import { ReviewError, errorMessage } from '@core/domain/errors/review.errors';

const logger = new Logger('AIResponseParser');

const SEVERITIES: ReadonlySet<string> = new Set(Object.values(CommentSeverity));
const CATEGORIES: ReadonlySet<string> = new Set(Object.values(CommentCategory));

const CATEGORY_ALIASES: Record<string, CommentCategory> = {
  best_practice: CommentCategory.BEST_PRACTICES,
  bug: CommentCategory.LOGIC,
  bugs: CommentCategory.LOGIC,
  docs: CommentCategory.DOCUMENTATION,
  maintenance: CommentCategory.MAINTAINABILITY,
};

type JsonObject = Record<string, unknown>;

function isSeverity(value: string): value is CommentSeverity {
  return SEVERITIES.has(value);
}

function isCategory(value: string): value is CommentCategory {
  return CATEGORIES.has(value);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the JSON object out of a model reply. Models wrap it in markdown
 * fences or surround it with prose often enough that both are handled.
 */
export function extractJsonObject(text: string): string {
  const fenced = text.match(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/);
  if (fenced) {
    return fenced[1];
  }

  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first === -1 || last <= first) {
    throw new ReviewError('No JSON object found in AI response');
  }
  return text.substring(first, last + 1);
}

export function normalizeSeverity(value: unknown): CommentSeverity {
  const normalized = String(value ?? '').trim().toLowerCase();
  return isSeverity(normalized) ? normalized : CommentSeverity.SUGGESTION;
}

export function normalizeCategory(value: unknown): CommentCategory {
  const normalized = String(value ?? '').trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (isCategory(normalized)) {
    return normalized;
  }
  return CATEGORY_ALIASES[normalized] ?? CommentCategory.BEST_PRACTICES;
}

function parseLineNumber(value: unknown): number | undefined {
  const line = typeof value === 'string' ? Number(value) : value;
  return typeof line === 'number' && Number.isInteger(line) && line > 0 ? line : undefined;
}

function parseScore(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1 ? value : undefined;
}

function parseComment(entry: unknown): ReviewComment | null {
  if (!isJsonObject(entry)) return null;

  const content = entry.content;
  if (typeof content !== 'string' || content.trim() === '') return null;

  const suggestedFix = entry.suggested_fix ?? entry.suggestedFix;

  return new ReviewComment(
    content,
    normalizeSeverity(entry.severity),
    normalizeCategory(entry.category),
    parseLineNumber(entry.line_number ?? entry.lineNumber),
    typeof suggestedFix === 'string' && suggestedFix !== '' ? suggestedFix : undefined,
  );
}

/**
 * Turn raw backend text into an AIResponse. Structural problems with the
 * payload raise a ReviewError; individual malformed comments are dropped.
 */
export function parseReviewPayload(raw: string, metadata: Record<string, unknown> = {}): AIResponse {
  const jsonText = extractJsonObject(raw);

  let payload: unknown;
  try {
    payload = JSON.parse(jsonText);
  } catch (error) {
    throw new ReviewError(`Error parsing AI response: ${errorMessage(error)}`, { cause: error });
  }

  if (!isJsonObject(payload)) {
    throw new ReviewError('AI response JSON is not an object');
  }

  const missing = ['summary', 'comments'].filter(field => !(field in payload));
  if (missing.length > 0) {
    throw new ReviewError(`AI response is missing required field(s): ${missing.join(', ')}`);
  }
  if (!Array.isArray(payload.comments)) {
    throw new ReviewError('AI response field "comments" must be an array');
  }

  const comments: ReviewComment[] = [];
  for (const entry of payload.comments) {
    const comment = parseComment(entry);
    if (comment) {
      comments.push(comment);
    }
  }

  const dropped = payload.comments.length - comments.length;
  if (dropped > 0) {
    logger.debug(`Dropped ${dropped} malformed comment(s) from AI response`);
  }

  const extraMetadata = isJsonObject(payload.metadata) ? payload.metadata : {};

  return new AIResponse(
    comments,
    String(payload.summary ?? ''),
    parseScore(payload.score),
    { ...extraMetadata, ...metadata },
  );
}

/**
 * Apply the caller's minimum severity and comment cap to a parsed response.
 */
export function applyReviewSettings(response: AIResponse, settings?: ReviewSettings): AIResponse {
  if (!settings) return response;

  let comments = response.comments;

  const minSeverity = settings.minSeverity?.toLowerCase();
  if (minSeverity && isSeverity(minSeverity)) {
    const threshold = SEVERITY_ORDER.indexOf(minSeverity);
    comments = comments.filter(comment => SEVERITY_ORDER.indexOf(comment.severity) <= threshold);
  }

  if (settings.maxComments !== undefined && settings.maxComments >= 0) {
    comments = comments.slice(0, settings.maxComments);
  }

  if (comments === response.comments) return response;

  return new AIResponse(comments, response.summary, response.score, response.metadata, response.timestamp);
}
