/** Database row representation of a commit record. */
export interface CommitRow {
  /** Full commit hash (primary key). */
  hash: string
  /** Author display name. */
  author_name: string
  /** Author email address. */
  author_email: string
  /** ISO 8601 UTC author timestamp. */
  authored_at: string
  /** Full commit message. */
  message: string
  /** Lines added across all files. */
  additions: number
  /** Lines deleted across all files. */
  deletions: number
  /** Number of distinct file paths touched. */
  files_changed: number
  /** 1 when the message matched the fix vocabulary, else 0. */
  is_fix: number
  /** Matched keywords joined with ",", or null when none matched. */
  error_tags: string | null
}

/** Database row representation of a file within a commit. */
export interface CommitFileRow {
  id: number
  commit_hash: string
  file_path: string
  additions: number
  deletions: number
}

/** Headline numbers for a filter. */
export interface Kpis {
  commits: number
  additions: number
  deletions: number
  fixCommits: number
}

/** Commit count for one time bucket. */
export interface VolumePoint {
  /** Bucket label: YYYY-MM-DD, YYYY-Www or YYYY-MM. */
  period: string
  commits: number
}

export interface AuthorCount {
  /** Most recent name used with this email. */
  author_name: string
  author_email: string
  commits: number
}

export interface FileCount {
  file_path: string
  /** Distinct matching commits that touched the path. */
  commits: number
}

/** Line changes to matching files for one time bucket. */
export interface ChurnPoint {
  period: string
  additions: number
  deletions: number
  /** additions + deletions */
  churn: number
}

/** A commit as listed in the details table. */
export type CommitListItem = Omit<CommitRow, "error_tags"> & {
  error_tags: string[]
}

/** Values for populating filter controls. */
export interface FilterOptions {
  /** Earliest author date (YYYY-MM-DD), or null for an empty store. */
  firstDate: string | null
  /** Latest author date (YYYY-MM-DD), or null for an empty store. */
  lastDate: string | null
  authors: AuthorCount[]
  /** Most frequently changed paths, most popular first. */
  popularFiles: string[]
}

/** Every result set shown for one filter by the dashboard and `report`. */
export interface InsightsSnapshot {
  kpis: Kpis
  volume: VolumePoint[]
  topAuthors: AuthorCount[]
  topFiles: FileCount[]
  /** Empty unless the filter has a file pattern. */
  churn: ChurnPoint[]
  commits: CommitListItem[]
}
