import type { GitpulseConfig } from "@/config"

/** Output format for CLI commands. */
export type OutputFormat = "text" | "json"

/** Time bucket used by the volume and churn series. */
export const GRANULARITIES = ["day", "week", "month"] as const

/** A time bucket size for time-series queries. */
export type Granularity = (typeof GRANULARITIES)[number]

/** A single file touched by a commit, as reported by `git log --numstat`. */
export interface FileChange {
  /** Repository-relative path (final path for renames). */
  filePath: string
  /** Lines added; 0 for binary files. */
  additions: number
  /** Lines deleted; 0 for binary files. */
  deletions: number
}

/** Totals derived from a commit's file list. */
export interface FileTally {
  /** File changes with duplicate paths merged, in first-seen order. */
  files: FileChange[]
  additions: number
  deletions: number
  filesChanged: number
}

/** A commit parsed from log output, with totals computed from its files. */
export interface ParsedCommit extends FileTally {
  /** Full commit hash (lowercase hex). */
  hash: string
  /** Author display name. */
  authorName: string
  /** Author email address. */
  authorEmail: string
  /** Author date as an ISO 8601 UTC string with second precision. */
  authoredAt: string
  /** Full commit message. */
  message: string
}

/** Result of matching a commit message against the fix vocabulary. */
export interface Classification {
  /** True when at least one keyword matched. */
  isFix: boolean
  /** Matched keywords in order of first occurrence, without duplicates. */
  tags: string[]
}

/** A parsed commit after classification, ready to be written. */
export interface CommitRecord extends ParsedCommit {
  isFix: boolean
  errorTags: string[]
}

/** Outcome of writing a single commit. */
export interface UpsertResult {
  /** "unchanged" when the stored rows already matched the record. */
  status: "written" | "unchanged"
  /** Number of file rows inserted by this write. */
  fileRows: number
}

/** Progress of an ingestion run. */
export interface IngestProgress {
  phase: "reading" | "done"
  /** Well-formed commits seen so far. */
  parsed: number
  /** Malformed commits skipped so far. */
  skipped: number
  /** Commits whose write failed so far. */
  failed: number
  /** Hash of the commit most recently handled. */
  currentHash?: string
}

/** Counts reported at the end of an ingestion run. */
export interface IngestSummary {
  /** Well-formed commits read from the log. */
  parsed: number
  /** Commits whose rows were (re)written. */
  written: number
  /** Commits already stored with identical rows. */
  unchanged: number
  /** Commits dropped because their header was malformed. */
  skipped: number
  /** Commits whose write failed and was rolled back. */
  failed: number
  /** File rows inserted across the run. */
  fileRowsWritten: number
}

/** Database health and run metadata shown by `gitpulse status`. */
export interface StatusInfo {
  commits: number
  fileRows: number
  fixCommits: number
  firstCommitAt: string | null
  lastCommitAt: string | null
  lastRun: string | null
  repoPath: string | null
  dbPath: string
  dbSize: number
  config?: GitpulseConfig
}

/**
 * Validated query filter. Range bounds are stored-timestamp strings: `start`
 * is inclusive, `end` exclusive. Produced by `parseFilter`.
 */
export interface CommitFilter {
  range?: { start?: string; end?: string }
  /** Author emails; an empty or missing list selects everyone. */
  authors?: string[]
  /** SQL LIKE pattern matched against file paths. */
  filePattern?: string
  fixesOnly?: boolean
}
