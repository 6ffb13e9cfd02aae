export interface ChangedFile {
  content: string;
  diff?: string;
  language?: string;
}

export interface FeedbackComment {
  path: string;
  line?: number;
  body: string;
}

export type FeedbackDisposition = 'approve' | 'request_changes' | 'comment';

/**
 * Repository interface for the hosting service the reviewed code lives on (GitHub, ...)
 */
export interface SourceHostingRepository {
  /**
   * Get the changed files of a revision (pull request number, commit, ...) with their diffs
   */
  fetchChangedFiles(repository: string, revisionRef: string): Promise<Map<string, ChangedFile>>;

  /**
   * Publish line comments and an overall verdict on the revision
   */
  submitFeedback(
    repository: string,
    revisionRef: string,
    comments: FeedbackComment[],
    summary: string,
    disposition: FeedbackDisposition,
  ): Promise<void>;
}
