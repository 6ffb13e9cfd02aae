import { describe, it, expect } from 'vitest';
import {
  applyReviewSettings,
  extractJsonObject,
  normalizeCategory,
  normalizeSeverity,
  parseReviewPayload,
} from '../../../src/infrastructure/ai/ai-response.parser';
import { CommentCategory, CommentSeverity } from '../../../src/core/domain/entities/ai-response.entity';
import { ReviewError } from '../../../src/core/domain/errors/review.errors';
import { makeComment, makeResponse } from '../../mocks/ai-provider.mock';

describe('AI response parser', () => {
  describe('extractJsonObject', () => {
    it('should prefer a fenced json block', () => {
      const text = 'Here you go:\n```json\n{"summary":"ok","comments":[]}\n```\nThanks {not json}';

      expect(extractJsonObject(text)).toBe('{"summary":"ok","comments":[]}');
    });

    it('should stop at the first closing fence when a code block follows', () => {
      const text = 'Here:\n```json\n{"summary":"ok","comments":[]}\n```\nAnd example:\n```js\nconst a = {b:1}\n```';

      expect(extractJsonObject(text)).toBe('{"summary":"ok","comments":[]}');
      expect(parseReviewPayload(text).summary).toBe('ok');
    });

    it('should keep nested objects inside a fenced block', () => {
      const text = '```json\n{"summary":"ok","meta":{"a":1}}\n```\n```ts\nif (x) { y(); }\n```';

      expect(extractJsonObject(text)).toBe('{"summary":"ok","meta":{"a":1}}');
    });

    it('should fall back to the outermost braces', () => {
      expect(extractJsonObject('Result: {"a":{"b":1}} done')).toBe('{"a":{"b":1}}');
    });

    it('should throw a ReviewError when there is no object', () => {
      expect(() => extractJsonObject('no json here')).toThrow(ReviewError);
      expect(() => extractJsonObject('no json here')).toThrow('No JSON object found in AI response');
    });
  });

  describe('normalization', () => {
    it('should normalize severity case-insensitively', () => {
      expect(normalizeSeverity('ERROR')).toBe(CommentSeverity.ERROR);
      expect(normalizeSeverity(' Warning ')).toBe(CommentSeverity.WARNING);
    });

    it('should default unknown or missing severities to suggestion', () => {
      expect(normalizeSeverity('critical')).toBe(CommentSeverity.SUGGESTION);
      expect(normalizeSeverity(undefined)).toBe(CommentSeverity.SUGGESTION);
    });

    it('should fold spaces and dashes in categories and resolve aliases', () => {
      expect(normalizeCategory('Best-Practices')).toBe(CommentCategory.BEST_PRACTICES);
      expect(normalizeCategory('best practice')).toBe(CommentCategory.BEST_PRACTICES);
      expect(normalizeCategory('bug')).toBe(CommentCategory.LOGIC);
      expect(normalizeCategory('SECURITY')).toBe(CommentCategory.SECURITY);
    });

    it('should default unknown categories to best_practices', () => {
      expect(normalizeCategory('vibes')).toBe(CommentCategory.BEST_PRACTICES);
      expect(normalizeCategory(null)).toBe(CommentCategory.BEST_PRACTICES);
    });
  });

  describe('parseReviewPayload', () => {
    it('should fill in default severity and category', () => {
      const response = parseReviewPayload('{"summary":"ok","comments":[{"content":"x"}]}');

      expect(response.summary).toBe('ok');
      expect(response.comments).toHaveLength(1);
      expect(response.comments[0].content).toBe('x');
      expect(response.comments[0].severity).toBe(CommentSeverity.SUGGESTION);
      expect(response.comments[0].category).toBe(CommentCategory.BEST_PRACTICES);
      expect(response.comments[0].lineNumber).toBeUndefined();
    });

    it('should drop comments without content and keep the rest', () => {
      const raw = JSON.stringify({
        summary: 'mixed',
        comments: [
          { severity: 'error' },
          { content: '', severity: 'error' },
          'not an object',
          { content: 'Null check missing', severity: 'ERROR', category: 'logic', line_number: '12', suggested_fix: 'if (x) {}' },
        ],
      });

      const response = parseReviewPayload(raw);

      expect(response.comments).toHaveLength(1);
      expect(response.comments[0].content).toBe('Null check missing');
      expect(response.comments[0].severity).toBe(CommentSeverity.ERROR);
      expect(response.comments[0].category).toBe(CommentCategory.LOGIC);
      expect(response.comments[0].lineNumber).toBe(12);
      expect(response.comments[0].suggestedFix).toBe('if (x) {}');
      expect(response.hasCriticalIssues).toBe(true);
    });

    it('should accept camelCase comment fields', () => {
      const response = parseReviewPayload(
        '{"summary":"s","comments":[{"content":"c","lineNumber":3,"suggestedFix":"fix"}]}',
      );

      expect(response.comments[0].lineNumber).toBe(3);
      expect(response.comments[0].suggestedFix).toBe('fix');
    });

    it('should keep the score only within [0, 1]', () => {
      expect(parseReviewPayload('{"summary":"s","comments":[],"score":0.75}').score).toBe(0.75);
      expect(parseReviewPayload('{"summary":"s","comments":[],"score":7.5}').score).toBeUndefined();
    });

    it('should merge provider metadata over payload metadata', () => {
      const response = parseReviewPayload(
        '{"summary":"s","comments":[],"metadata":{"provider":"spoofed","lines":10}}',
        { provider: 'claude' },
      );

      expect(response.metadata).toEqual({ provider: 'claude', lines: 10 });
    });

    it('should reject payloads missing required fields', () => {
      expect(() => parseReviewPayload('{"score":0.5}')).toThrow(
        'AI response is missing required field(s): summary, comments',
      );
    });

    it('should reject a non-array comments field', () => {
      expect(() => parseReviewPayload('{"summary":"s","comments":"none"}')).toThrow(ReviewError);
    });

    it('should reject undecodable JSON', () => {
      expect(() => parseReviewPayload('{"summary": oops}')).toThrow(/^Error parsing AI response: /);
    });
  });

  describe('applyReviewSettings', () => {
    const response = makeResponse('s', [
      makeComment('praise', CommentSeverity.PRAISE),
      makeComment('bug', CommentSeverity.ERROR),
      makeComment('nit', CommentSeverity.SUGGESTION),
      makeComment('smell', CommentSeverity.WARNING),
    ]);

    it('should return the same response without settings', () => {
      expect(applyReviewSettings(response)).toBe(response);
    });

    it('should drop comments below the minimum severity', () => {
      const filtered = applyReviewSettings(response, { minSeverity: 'warning' });

      expect(filtered.comments.map(comment => comment.content)).toEqual(['bug', 'smell']);
      expect(filtered.summary).toBe('s');
    });

    it('should cap the number of comments after filtering', () => {
      const filtered = applyReviewSettings(response, { minSeverity: 'suggestion', maxComments: 2 });

      expect(filtered.comments.map(comment => comment.content)).toEqual(['bug', 'nit']);
    });
  });
});
