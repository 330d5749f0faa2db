import type { CommitRecord, FileChange, UpsertResult } from "@/types"
import type { Database } from "@db/database"
import type { CommitFileRow, CommitRow } from "@db/types"
import { serializeTags } from "@services/classifier"
import { tallyFiles } from "@services/tally"

type CommitValues = Omit<CommitRow, "hash">

function sameCommit(stored: CommitRow, next: CommitValues): boolean {
  return (
    stored.author_name === next.author_name &&
    stored.author_email === next.author_email &&
    stored.authored_at === next.authored_at &&
    stored.message === next.message &&
    stored.additions === next.additions &&
    stored.deletions === next.deletions &&
    stored.files_changed === next.files_changed &&
    stored.is_fix === next.is_fix &&
    stored.error_tags === next.error_tags
  )
}

function sameFiles(stored: CommitFileRow[], next: FileChange[]): boolean {
  return (
    stored.length === next.length &&
    stored.every(
      (row, i) =>
        row.file_path === next[i].filePath &&
        row.additions === next[i].additions &&
        row.deletions === next[i].deletions,
    )
  )
}

/** Repository for reading and writing commit records in the SQLite database. */
export class CommitRepository {
  private db: Database
  private upsertTransaction: (record: CommitRecord) => UpsertResult

  /** @param db - The SQLite database instance. */
  constructor(db: Database) {
    this.db = db
    this.upsertTransaction = db.transaction((record: CommitRecord) =>
      this.writeCommit(record),
    )
  }

  /**
   * Replaces a commit and all of its file rows in one transaction.
   *
   * Totals are recomputed from the file list, with duplicate paths summed; the
   * record's own totals are ignored. When the stored rows already match, nothing
   * is written. Any failure rolls back the whole commit and is rethrown.
   */
  upsertCommit(record: CommitRecord): UpsertResult {
    return this.upsertTransaction(record)
  }

  private writeCommit(record: CommitRecord): UpsertResult {
    const tally = tallyFiles(record.files)
    const values: CommitValues = {
      author_name: record.authorName,
      author_email: record.authorEmail,
      authored_at: record.authoredAt,
      message: record.message,
      additions: tally.additions,
      deletions: tally.deletions,
      files_changed: tally.filesChanged,
      is_fix: record.isFix ? 1 : 0,
      error_tags: serializeTags(record.errorTags),
    }

    const stored = this.getCommit(record.hash)
    if (
      stored &&
      sameCommit(stored, values) &&
      sameFiles(this.getCommitFiles(record.hash), tally.files)
    ) {
      return { status: "unchanged", fileRows: 0 }
    }

    this.db
      .prepare<[string]>("DELETE FROM commit_files WHERE commit_hash = ?")
      .run(record.hash)

    const updated = this.db
      .prepare<[CommitValues & { hash: string }]>(
        `UPDATE commits SET author_name = @author_name, author_email = @author_email,
           authored_at = @authored_at, message = @message, additions = @additions,
           deletions = @deletions, files_changed = @files_changed, is_fix = @is_fix,
           error_tags = @error_tags
         WHERE hash = @hash`,
      )
      .run({ hash: record.hash, ...values })

    if (updated.changes === 0) {
      this.db
        .prepare<[CommitValues & { hash: string }]>(
          `INSERT INTO commits (hash, author_name, author_email, authored_at, message,
             additions, deletions, files_changed, is_fix, error_tags)
           VALUES (@hash, @author_name, @author_email, @authored_at, @message,
             @additions, @deletions, @files_changed, @is_fix, @error_tags)`,
        )
        .run({ hash: record.hash, ...values })
    }

    const insertFile = this.db.prepare<[string, string, number, number]>(
      "INSERT INTO commit_files (commit_hash, file_path, additions, deletions) VALUES (?, ?, ?, ?)",
    )
    for (const file of tally.files) {
      insertFile.run(record.hash, file.filePath, file.additions, file.deletions)
    }

    return { status: "written", fileRows: tally.files.length }
  }

  /**
   * Retrieves a single commit by its hash.
   * @param hash - The full commit hash.
   * @returns The commit row, or null if not found.
   */
  getCommit(hash: string): CommitRow | null {
    return (
      this.db
        .prepare<[string], CommitRow>("SELECT * FROM commits WHERE hash = ?")
        .get(hash) ?? null
    )
  }

  /** Returns a commit's file rows in insertion order. */
  getCommitFiles(hash: string): CommitFileRow[] {
    return this.db
      .prepare<[string], CommitFileRow>(
        "SELECT * FROM commit_files WHERE commit_hash = ? ORDER BY id",
      )
      .all(hash)
  }

  /** Returns the total number of commits in the database. */
  getTotalCommitCount(): number {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM commits")
      .get()
    return row?.count ?? 0
  }

  /** Returns the total number of file rows in the database. */
  getFileRowCount(): number {
    const row = this.db
      .prepare<[], { count: number }>(
        "SELECT COUNT(*) AS count FROM commit_files",
      )
      .get()
    return row?.count ?? 0
  }

  /** Returns the number of commits classified as fixes. */
  getFixCommitCount(): number {
    const row = this.db
      .prepare<[], { count: number }>(
        "SELECT COUNT(*) AS count FROM commits WHERE is_fix = 1",
      )
      .get()
    return row?.count ?? 0
  }

  /** Earliest and latest author timestamps, or nulls for an empty store. */
  getDateSpan(): { first: string | null; last: string | null } {
    const row = this.db
      .prepare<[], { first: string | null; last: string | null }>(
        "SELECT MIN(authored_at) AS first, MAX(authored_at) AS last FROM commits",
      )
      .get()
    return { first: row?.first ?? null, last: row?.last ?? null }
  }
}
