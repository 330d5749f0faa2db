import { existsSync } from "fs"
import { mkdtemp, rm } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"
import { afterEach, beforeEach, describe, expect, test } from "vitest"

import { StoreError } from "@/errors"
import { createDatabase, openDatabase, withDatabase } from "@db/database"

describe("createDatabase", () => {
  test("creates all tables", () => {
    const db = createDatabase(":memory:")
    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((r) => r.name)

    expect(tables).toEqual(["commit_files", "commits", "metadata"])
    db.close()
  })

  test("creates the lookup indexes", () => {
    const db = createDatabase(":memory:")
    const indexes = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%' ORDER BY name",
      )
      .all()
      .map((r) => r.name)

    expect(indexes).toEqual([
      "idx_commit_files_commit_hash",
      "idx_commit_files_file_path",
      "idx_commits_author",
      "idx_commits_authored_at",
    ])
    db.close()
  })

  test("rejects negative line counts", () => {
    const db = createDatabase(":memory:")
    expect(() =>
      db
        .prepare(
          "INSERT INTO commit_files (commit_hash, file_path, additions, deletions) VALUES ('h', 'a.ts', -1, 0)",
        )
        .run(),
    ).toThrow()
    db.close()
  })

  test("rejects a duplicate path within one commit", () => {
    const db = createDatabase(":memory:")
    const insert = db.prepare(
      "INSERT INTO commit_files (commit_hash, file_path) VALUES ('h', 'a.ts')",
    )
    insert.run()
    expect(() => insert.run()).toThrow()
    db.close()
  })
})

describe("file-backed databases", () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "gitpulse-db-"))
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  test("createDatabase is idempotent on an existing file", () => {
    const path = join(tmpDir, "gitpulse.db")
    createDatabase(path).close()
    const db = createDatabase(path)
    const mode = db.pragma("journal_mode", { simple: true })
    expect(mode).toBe("wal")
    db.close()
  })

  test("a read-only open requires an existing file", () => {
    const path = join(tmpDir, "missing.db")
    expect(() => openDatabase(path, { readonly: true })).toThrow(StoreError)
    expect(existsSync(path)).toBe(false)
  })

  test("a read-only handle cannot write", () => {
    const path = join(tmpDir, "gitpulse.db")
    createDatabase(path).close()

    withDatabase(path, { readonly: true }, (db) => {
      expect(() =>
        db
          .prepare("INSERT INTO metadata (key, value) VALUES ('k', 'v')")
          .run(),
      ).toThrow()
    })
  })

  test("withDatabase returns the callback's value and closes the handle", () => {
    const path = join(tmpDir, "gitpulse.db")
    let handle: ReturnType<typeof createDatabase> | undefined

    const count = withDatabase(path, {}, (db) => {
      handle = db
      return db
        .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM commits")
        .get()?.n
    })

    expect(count).toBe(0)
    expect(handle?.open).toBe(false)
  })

  test("withDatabase closes the handle when the callback throws", () => {
    const path = join(tmpDir, "gitpulse.db")
    let handle: ReturnType<typeof createDatabase> | undefined

    expect(() =>
      withDatabase(path, {}, (db) => {
        handle = db
        throw new Error("boom")
      }),
    ).toThrow("boom")
    expect(handle?.open).toBe(false)
  })

  test("wraps open failures in StoreError", () => {
    const path = join(tmpDir, "no-such-dir", "gitpulse.db")
    expect(() => createDatabase(path)).toThrow(
      `cannot open database ${path}`,
    )
  })
})
