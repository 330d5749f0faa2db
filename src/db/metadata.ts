import type { Database } from "@db/database"

/** Keys written to the metadata table. */
export const METADATA_KEYS = {
  /** ISO 8601 timestamp of the last completed ingestion. */
  lastRun: "last_run",
  /** Absolute path of the repository last ingested. */
  repoPath: "repo_path",
} as const

export type MetadataKey = (typeof METADATA_KEYS)[keyof typeof METADATA_KEYS]

/** Key/value run metadata stored beside the commit tables. */
export class MetadataRepository {
  private db: Database

  constructor(db: Database) {
    this.db = db
  }

  get(key: MetadataKey): string | null {
    const row = this.db
      .prepare<[string], { value: string }>(
        "SELECT value FROM metadata WHERE key = ?",
      )
      .get(key)
    return row?.value ?? null
  }

  set(key: MetadataKey, value: string): void {
    this.db
      .prepare<[string, string]>(
        "INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)",
      )
      .run(key, value)
  }
}
