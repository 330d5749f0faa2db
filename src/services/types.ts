/** Options narrowing the history read from `git log`. */
export interface LogOptions {
  /** Only commits on or after this date (anything `git log --since` takes). */
  since?: string
}

/** Interface for reading history from a git repository. */
export interface IGitService {
  /** Checks whether the working directory is inside a git repository. */
  isGitRepo(): Promise<boolean>
  /** Returns the absolute path to the repository root. */
  getRepoRoot(): Promise<string>
  /**
   * Streams `git log --numstat` output line by line in the format the log
   * parser reads. Yields nothing for a repository without commits. Rejects
   * with GitError when git cannot run or exits non-zero.
   */
  streamLog(options?: LogOptions): AsyncIterable<string>
}
