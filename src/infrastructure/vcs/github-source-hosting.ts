import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError, ProviderError, errorMessage } from '@core/domain/errors/review.errors';
import type {
  ChangedFile,
  FeedbackComment,
  FeedbackDisposition,
  SourceHostingRepository,
} from '@core/domain/repositories/source-hosting.repository';
import { detectLanguage } from './language';

interface PullRequestFile {
  filename: string;
  status: string;
  patch?: string;
}

const PAGE_SIZE = 100;

const REVIEW_EVENTS: Record<FeedbackDisposition, string> = {
  approve: 'APPROVE',
  request_changes: 'REQUEST_CHANGES',
  comment: 'COMMENT',
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPullRequestFile(value: unknown): value is PullRequestFile {
  return (
    isObject(value) &&
    typeof value.filename === 'string' &&
    typeof value.status === 'string' &&
    (value.patch === undefined || typeof value.patch === 'string')
  );
}

/**
 * GitHub REST v3 adapter. `repository` is `owner/repo`, `revisionRef` the pull request number.
 */
@Injectable()
export class GithubSourceHosting implements SourceHostingRepository {
  private readonly logger = new Logger(GithubSourceHosting.name);
  private readonly baseUrl: string;
  private readonly authHeaders: Record<string, string>;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('GITHUB_API_URL', 'https://api.github.com').replace(/\/+$/, '');
    const token = this.configService.get<string>('GITHUB_API_TOKEN', '');

    this.authHeaders = {
      'Accept': 'application/vnd.github.v3+json',
      'X-GitHub-Api-Version': '2022-11-28',
      ...(token ? { Authorization: `token ${token}` } : {}),
    };
  }

  async fetchChangedFiles(repository: string, revisionRef: string): Promise<Map<string, ChangedFile>> {
    const [owner, repo] = this.parseRepository(repository);
    const pull = await this.getJson(`repos/${owner}/${repo}/pulls/${revisionRef}`);
    const headSha = isObject(pull) && isObject(pull.head) && typeof pull.head.sha === 'string' ? pull.head.sha : undefined;
    if (!headSha) {
      throw new ProviderError(`GitHub returned no head commit for ${repository}#${revisionRef}`);
    }

    const changed = new Map<string, ChangedFile>();
    for (const file of await this.listFiles(owner, repo, revisionRef)) {
      if (file.status === 'removed') continue;
      // Binary files come without a patch
      if (file.patch === undefined) {
        this.logger.debug(`Skipping ${file.filename}: no textual diff`);
        continue;
      }
      const content = await this.getFileContent(owner, repo, file.filename, headSha);
      changed.set(file.filename, { content, diff: file.patch, language: detectLanguage(file.filename) });
    }

    this.logger.log(`Fetched ${changed.size} changed file(s) from ${repository}#${revisionRef}`);
    return changed;
  }

  async submitFeedback(
    repository: string,
    revisionRef: string,
    comments: FeedbackComment[],
    summary: string,
    disposition: FeedbackDisposition,
  ): Promise<void> {
    const [owner, repo] = this.parseRepository(repository);

    const inline = comments.filter(comment => comment.line !== undefined);
    const general = comments.filter(comment => comment.line === undefined);
    const body = general.length > 0
      ? `${summary}\n\n${general.map(comment => `**${comment.path}**\n\n${comment.body}`).join('\n\n')}`
      : summary;

    const response = await this.request(`repos/${owner}/${repo}/pulls/${revisionRef}/reviews`, {
      method: 'POST',
      body: JSON.stringify({
        body,
        event: REVIEW_EVENTS[disposition],
        comments: inline.map(comment => ({ path: comment.path, line: comment.line, side: 'RIGHT', body: comment.body })),
      }),
    });
    if (!response.ok) {
      throw new ProviderError(`Failed to submit review (${response.status}): ${await response.text()}`);
    }
  }

  private parseRepository(repository: string): [string, string] {
    const parts = repository.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new ConfigurationError(`Invalid GitHub repository: ${repository}. Expected format: 'owner/repo'`);
    }
    return [parts[0], parts[1]];
  }

  private async listFiles(owner: string, repo: string, pullNumber: string): Promise<PullRequestFile[]> {
    const files: PullRequestFile[] = [];
    for (let page = 1; ; page++) {
      const data = await this.getJson(`repos/${owner}/${repo}/pulls/${pullNumber}/files?per_page=${PAGE_SIZE}&page=${page}`);
      if (!Array.isArray(data)) {
        throw new ProviderError(`Unexpected file list for ${owner}/${repo}#${pullNumber}`);
      }
      files.push(...data.filter(isPullRequestFile));
      if (data.length < PAGE_SIZE) return files;
    }
  }

  private async getFileContent(owner: string, repo: string, path: string, ref: string): Promise<string> {
    const encodedPath = path.split('/').map(encodeURIComponent).join('/');
    const data = await this.getJson(`repos/${owner}/${repo}/contents/${encodedPath}?ref=${ref}`);
    if (!isObject(data) || typeof data.content !== 'string') {
      throw new ProviderError(`GitHub returned no content for ${path}`);
    }
    // Contents are base64 encoded
    return Buffer.from(data.content, 'base64').toString('utf-8');
  }

  private async getJson(endpoint: string): Promise<unknown> {
    const response = await this.request(endpoint);
    if (!response.ok) {
      throw new ProviderError(`GitHub request ${endpoint} failed: ${response.status} ${response.statusText}`);
    }
    return response.json();
  }

  private async request(endpoint: string, options: RequestInit = {}): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}/${endpoint}`, {
        ...options,
        headers: { ...this.authHeaders, 'Content-Type': 'application/json' },
      });
    } catch (error) {
      throw new ProviderError(`GitHub request ${endpoint} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
