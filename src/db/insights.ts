import type { CommitFilter, Granularity } from "@/types"
import type { Database } from "@db/database"
import type {
  AuthorCount,
  ChurnPoint,
  CommitListItem,
  CommitRow,
  FileCount,
  FilterOptions,
  InsightsSnapshot,
  Kpis,
  VolumePoint,
} from "@db/types"
import { parseTags } from "@services/classifier"

type SqlParam = string | number

interface WhereClause {
  sql: string
  params: SqlParam[]
}

/** Rows shown in the commit details table. */
export const COMMIT_TABLE_LIMIT = 100

export interface SnapshotQuery {
  filter: CommitFilter
  granularity: Granularity
  /** Length of the author and file rankings. */
  limit: number
  commitLimit?: number
}

/** Bucket expressions over `c.authored_at`, keyed by granularity. */
const BUCKETS: Record<Granularity, string> = {
  day: "substr(c.authored_at, 1, 10)",
  week: "strftime('%Y-W%W', c.authored_at)",
  month: "substr(c.authored_at, 1, 7)",
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(", ")
}

/**
 * Builds the WHERE clause shared by every commit-level query. Only
 * placeholder counts are interpolated; every value is bound.
 */
export function buildWhere(
  filter: CommitFilter,
  { includeFilePattern = true }: { includeFilePattern?: boolean } = {},
): WhereClause {
  const clauses: string[] = []
  const params: SqlParam[] = []

  if (filter.range?.start) {
    clauses.push("c.authored_at >= ?")
    params.push(filter.range.start)
  }
  if (filter.range?.end) {
    clauses.push("c.authored_at < ?")
    params.push(filter.range.end)
  }
  if (filter.authors && filter.authors.length > 0) {
    clauses.push(`c.author_email IN (${placeholders(filter.authors.length)})`)
    params.push(...filter.authors)
  }
  if (includeFilePattern && filter.filePattern) {
    clauses.push(
      "EXISTS (SELECT 1 FROM commit_files f WHERE f.commit_hash = c.hash AND f.file_path LIKE ?)",
    )
    params.push(filter.filePattern)
  }
  if (filter.fixesOnly) {
    clauses.push("c.is_fix = 1")
  }

  return {
    sql: clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "",
    params,
  }
}

/** Read-only analytical queries behind the dashboard and `report`. */
export class InsightsRepository {
  private db: Database

  /** @param db - The SQLite database instance. */
  constructor(db: Database) {
    this.db = db
  }

  getKpis(filter: CommitFilter): Kpis {
    const where = buildWhere(filter)
    const row = this.db
      .prepare<SqlParam[], Kpis>(
        `SELECT COUNT(*) AS commits,
                COALESCE(SUM(c.additions), 0) AS additions,
                COALESCE(SUM(c.deletions), 0) AS deletions,
                COALESCE(SUM(c.is_fix), 0) AS fixCommits
         FROM commits c ${where.sql}`,
      )
      .get(...where.params)
    return row ?? { commits: 0, additions: 0, deletions: 0, fixCommits: 0 }
  }

  /** Commits per time bucket, oldest bucket first. Empty buckets are omitted. */
  getCommitVolume(filter: CommitFilter, granularity: Granularity): VolumePoint[] {
    const where = buildWhere(filter)
    return this.db
      .prepare<SqlParam[], VolumePoint>(
        `SELECT ${BUCKETS[granularity]} AS period, COUNT(*) AS commits
         FROM commits c ${where.sql}
         GROUP BY period
         ORDER BY period`,
      )
      .all(...where.params)
  }

  /**
   * Authors ranked by matching commits. Authors are grouped by email; the name
   * shown is the one on their most recent commit.
   */
  getTopAuthors(filter: CommitFilter, limit: number): AuthorCount[] {
    const where = buildWhere(filter)
    return this.db
      .prepare<SqlParam[], AuthorCount>(
        `SELECT (SELECT c2.author_name FROM commits c2
                 WHERE c2.author_email = c.author_email
                 ORDER BY c2.authored_at DESC, c2.hash LIMIT 1) AS author_name,
                c.author_email AS author_email,
                COUNT(*) AS commits
         FROM commits c ${where.sql}
         GROUP BY c.author_email
         ORDER BY commits DESC, c.author_email
         LIMIT ?`,
      )
      .all(...where.params, limit)
  }

  /**
   * Paths ranked by how many matching commits touched them. With a file
   * pattern, every path of a matching commit is counted, not only the paths
   * that match.
   */
  getTopFiles(filter: CommitFilter, limit: number): FileCount[] {
    const where = buildWhere(filter)
    return this.db
      .prepare<SqlParam[], FileCount>(
        `SELECT f.file_path AS file_path, COUNT(DISTINCT f.commit_hash) AS commits
         FROM commit_files f
         JOIN commits c ON c.hash = f.commit_hash
         ${where.sql}
         GROUP BY f.file_path
         ORDER BY commits DESC, f.file_path
         LIMIT ?`,
      )
      .all(...where.params, limit)
  }

  /**
   * Line changes per time bucket, counting only file rows whose path matches
   * the filter's pattern. Returns [] when the filter has no pattern.
   */
  getFileChurn(filter: CommitFilter, granularity: Granularity): ChurnPoint[] {
    if (!filter.filePattern) return []
    const where = buildWhere(filter, { includeFilePattern: false })
    const sql = where.sql
      ? `${where.sql} AND f.file_path LIKE ?`
      : "WHERE f.file_path LIKE ?"
    return this.db
      .prepare<SqlParam[], ChurnPoint>(
        `SELECT ${BUCKETS[granularity]} AS period,
                SUM(f.additions) AS additions,
                SUM(f.deletions) AS deletions,
                SUM(f.additions + f.deletions) AS churn
         FROM commit_files f
         JOIN commits c ON c.hash = f.commit_hash
         ${sql}
         GROUP BY period
         ORDER BY period`,
      )
      .all(...where.params, filter.filePattern)
  }

  /** Most recent matching commits first. */
  getCommits(filter: CommitFilter, limit: number): CommitListItem[] {
    const where = buildWhere(filter)
    return this.db
      .prepare<SqlParam[], CommitRow>(
        `SELECT c.* FROM commits c ${where.sql}
         ORDER BY c.authored_at DESC, c.hash
         LIMIT ?`,
      )
      .all(...where.params, limit)
      .map((row) => ({ ...row, error_tags: parseTags(row.error_tags) }))
  }

  getSnapshot({
    filter,
    granularity,
    limit,
    commitLimit = COMMIT_TABLE_LIMIT,
  }: SnapshotQuery): InsightsSnapshot {
    return {
      kpis: this.getKpis(filter),
      volume: this.getCommitVolume(filter, granularity),
      topAuthors: this.getTopAuthors(filter, limit),
      topFiles: this.getTopFiles(filter, limit),
      churn: this.getFileChurn(filter, granularity),
      commits: this.getCommits(filter, commitLimit),
    }
  }

  /**
   * Date span, every author, and the `limit` most frequently changed paths,
   * for populating filter controls.
   */
  getFilterOptions(limit: number): FilterOptions {
    const span = this.db
      .prepare<[], { firstDate: string | null; lastDate: string | null }>(
        `SELECT substr(MIN(authored_at), 1, 10) AS firstDate,
                substr(MAX(authored_at), 1, 10) AS lastDate
         FROM commits`,
      )
      .get()

    const authors = this.db
      .prepare<[], AuthorCount>(
        `SELECT (SELECT c2.author_name FROM commits c2
                 WHERE c2.author_email = c.author_email
                 ORDER BY c2.authored_at DESC, c2.hash LIMIT 1) AS author_name,
                c.author_email AS author_email,
                COUNT(*) AS commits
         FROM commits c
         GROUP BY c.author_email
         ORDER BY commits DESC, c.author_email`,
      )
      .all()

    const popularFiles = this.db
      .prepare<[number], { file_path: string }>(
        `SELECT file_path FROM commit_files
         GROUP BY file_path
         ORDER BY COUNT(*) DESC, file_path
         LIMIT ?`,
      )
      .all(limit)
      .map((r) => r.file_path)

    return {
      firstDate: span?.firstDate ?? null,
      lastDate: span?.lastDate ?? null,
      authors,
      popularFiles,
    }
  }
}
