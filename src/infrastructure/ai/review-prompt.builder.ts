import { AIRequest, ReviewType } from '@core/domain/entities/review-request.entity';
import { CommentCategory, CommentSeverity } from '@core/domain/entities/ai-response.entity';

const REVIEW_INSTRUCTIONS: Record<ReviewType, string> = {
  [ReviewType.FULL]: `Perform a comprehensive review covering correctness, security, performance, maintainability, style and documentation.`,
  [ReviewType.SECURITY]: `Focus on security: injection, unsafe input handling, secrets in code, authentication and authorization flaws, insecure defaults.`,
  [ReviewType.PERFORMANCE]: `Focus on performance: algorithmic complexity, unnecessary allocations or I/O, missing caching, blocking calls on hot paths.`,
  [ReviewType.MAINTAINABILITY]: `Focus on maintainability: structure, coupling, duplication, naming, testability and error handling.`,
  [ReviewType.STYLE]: `Focus on code style and formatting consistency with the idioms of the language.`,
  [ReviewType.DOCUMENTATION]: `Focus on documentation: missing or outdated comments, unclear public APIs, undocumented parameters and errors.`,
  [ReviewType.QUICK]: `Give a quick pass and report only critical problems that would break behaviour or leak data.`,
};

function formatList(values: string[] | undefined): string | undefined {
  return values && values.length > 0 ? values.join(', ') : undefined;
}

/**
 * Build the review prompt for a single file. The reply format is the JSON
 * shape the response parser expects.
 */
export function buildReviewPrompt(request: AIRequest): string {
  const { codeContext, reviewType, settings } = request;

  let prompt = `You are a senior software engineer performing a code review.
${REVIEW_INSTRUCTIONS[reviewType]}
`;

  if (request.isSecuritySensitive && reviewType !== ReviewType.SECURITY) {
    prompt += `This file appears to handle sensitive data; call out any security concern you notice.\n`;
  }
  if (request.isPerformanceCritical && reviewType !== ReviewType.PERFORMANCE) {
    prompt += `This file appears to be performance sensitive; mention costly patterns you notice.\n`;
  }

  const focusAreas = formatList(settings?.focusAreas);
  if (focusAreas) {
    prompt += `Pay particular attention to: ${focusAreas}.\n`;
  }
  const ignored = formatList(settings?.ignorePatterns);
  if (ignored) {
    prompt += `Do not comment on code matching: ${ignored}.\n`;
  }
  if (settings?.customRules && Object.keys(settings.customRules).length > 0) {
    prompt += `Project rules: ${JSON.stringify(settings.customRules)}\n`;
  }

  prompt += `\n---FILE: ${codeContext.filePath}${codeContext.language ? ` (${codeContext.language})` : ''}---\n`;
  if (codeContext.repository) {
    prompt += `Repository: ${codeContext.repository}${codeContext.baseBranch ? ` (base: ${codeContext.baseBranch})` : ''}\n`;
  }
  const changedFiles = formatList(codeContext.changedFiles);
  if (changedFiles) {
    prompt += `Other files changed alongside: ${changedFiles}\n`;
  }
  prompt += `${codeContext.content}\n`;

  if (codeContext.diff) {
    prompt += `\n---DIFF---\n${codeContext.diff}\nConcentrate on the changed lines.\n`;
  }

  prompt += `
Respond with a single JSON object and nothing else:
{
  "summary": "Overall assessment",
  "score": 0.0,
  "comments": [
    {
      "line_number": 1,
      "content": "Description of the issue",
      "severity": "${Object.values(CommentSeverity).join(' | ')}",
      "category": "${Object.values(CommentCategory).join(' | ')}",
      "suggested_fix": "Optional replacement code"
    }
  ]
}
"score" is the overall quality between 0 and 1. Return an empty "comments" array when there is nothing to report.`;

  return prompt;
}
