import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"

import { createLogger } from "@/logger"
import type { CommitRecord } from "@/types"
import {
  type DatabaseAccess,
  createFetchHandler,
  parseDashboardQuery,
} from "@commands/dashboard/command"
import { CommitRepository } from "@db/commits"
import { type Database, createDatabase } from "@db/database"
import { METADATA_KEYS, MetadataRepository } from "@db/metadata"
import type { InsightsSnapshot } from "@db/types"

const ANN = "ann@example.com"
const BEN = "ben@example.com"

function record(
  hash: string,
  authorEmail: string,
  authoredAt: string,
  filePath: string,
  isFix = false,
): CommitRecord {
  return {
    hash: hash.repeat(40),
    authorName: authorEmail === ANN ? "Ann" : "Ben",
    authorEmail,
    authoredAt,
    message: isFix ? "Fix timeout" : "Add endpoint",
    files: [{ filePath, additions: 4, deletions: 2 }],
    additions: 4,
    deletions: 2,
    filesChanged: 1,
    isFix,
    errorTags: isFix ? ["fix"] : [],
  }
}

describe("parseDashboardQuery", () => {
  test("applies defaults to an empty query", () => {
    expect(parseDashboardQuery(new URLSearchParams(), 10)).toEqual({
      filter: {},
      granularity: "day",
      limit: 10,
    })
  })

  test("reads every parameter", () => {
    const params = new URLSearchParams(
      "start=2024-01-01&end=2024-01-31&author=a@example.com&author=b@example.com&files=src&fixes=1&granularity=week&limit=5",
    )
    expect(parseDashboardQuery(params, 10)).toEqual({
      filter: {
        range: { start: "2024-01-01T00:00:00Z", end: "2024-02-01T00:00:00Z" },
        authors: ["a@example.com", "b@example.com"],
        filePattern: "%src%",
        fixesOnly: true,
      },
      granularity: "week",
      limit: 5,
    })
  })

  test("treats empty values as absent", () => {
    const params = new URLSearchParams("start=&end=&files=&fixes=0")
    expect(parseDashboardQuery(params, 10).filter).toEqual({})
  })
})

describe("createFetchHandler", () => {
  let db: Database
  const logger = createLogger({ silent: true })
  const withDb: DatabaseAccess = (fn) => fn(db)

  function handler(access: DatabaseAccess = withDb) {
    return createFetchHandler({
      html: "<html>dashboard</html>",
      withDb: access,
      logger,
      defaultLimit: 10,
    })
  }

  function get(path: string, access?: DatabaseAccess): Response {
    return handler(access)(new Request(`http://localhost${path}`))
  }

  beforeEach(() => {
    db = createDatabase(":memory:")
    const commits = new CommitRepository(db)
    commits.upsertCommit(record("a", ANN, "2024-01-02T10:00:00Z", "src/api.ts"))
    commits.upsertCommit(record("b", ANN, "2024-01-03T10:00:00Z", "src/api.ts", true))
    commits.upsertCommit(record("c", BEN, "2024-01-03T12:00:00Z", "docs/intro.md"))
    const metadata = new MetadataRepository(db)
    metadata.set(METADATA_KEYS.repoPath, "/work/service")
    metadata.set(METADATA_KEYS.lastRun, "2024-01-04T00:00:00.000Z")
  })

  afterEach(() => {
    db.close()
    vi.restoreAllMocks()
  })

  test("serves the page at /", async () => {
    const res = get("/")
    expect(res.status).toBe(200)
    expect(res.headers.get("Content-Type")).toBe("text/html; charset=utf-8")
    expect(await res.text()).toBe("<html>dashboard</html>")
  })

  test("returns 404 for unknown paths", () => {
    expect(get("/nope").status).toBe(404)
  })

  test("rejects other methods", () => {
    const res = handler()(new Request("http://localhost/", { method: "POST" }))
    expect(res.status).toBe(405)
  })

  test("/api/options lists filter values and run metadata", async () => {
    const res = get("/api/options")
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      firstDate: "2024-01-02",
      lastDate: "2024-01-03",
      authors: [
        { author_name: "Ann", author_email: ANN, commits: 2 },
        { author_name: "Ben", author_email: BEN, commits: 1 },
      ],
      popularFiles: ["src/api.ts", "docs/intro.md"],
      repoPath: "/work/service",
      lastRun: "2024-01-04T00:00:00.000Z",
    })
  })

  test("/api/dashboard returns every result set for the filter", async () => {
    const res = get("/api/dashboard?author=ann@example.com&files=api")
    expect(res.status).toBe(200)

    const body = (await res.json()) as InsightsSnapshot
    expect(body.kpis).toEqual({
      commits: 2,
      additions: 8,
      deletions: 4,
      fixCommits: 1,
    })
    expect(body.volume).toEqual([
      { period: "2024-01-02", commits: 1 },
      { period: "2024-01-03", commits: 1 },
    ])
    expect(body.topAuthors).toEqual([
      { author_name: "Ann", author_email: ANN, commits: 2 },
    ])
    expect(body.topFiles).toEqual([{ file_path: "src/api.ts", commits: 2 }])
    expect(body.churn).toEqual([
      { period: "2024-01-02", additions: 4, deletions: 2, churn: 6 },
      { period: "2024-01-03", additions: 4, deletions: 2, churn: 6 },
    ])
    expect(body.commits.map((c) => c.hash[0])).toEqual([
      "b",
      "a",
    ])
  })

  test("answers 400 for an invalid filter", async () => {
    const res = get("/api/dashboard?start=2024-02-01&end=2024-01-01")
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'Invalid filter: "start" must not be after "end"',
    })
  })

  test("answers 400 for a bad limit", async () => {
    const res = get("/api/dashboard?limit=0")
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'invalid limit "0": must be a positive integer',
    })
  })

  test("answers 500 and logs when the store fails", async () => {
    const error = vi.spyOn(logger, "error")
    const broken: DatabaseAccess = () => {
      throw new Error("database is locked")
    }

    const res = get("/api/dashboard", broken)

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: "database is locked" })
    expect(error).toHaveBeenCalledWith(
      "/api/dashboard failed: database is locked",
    )
  })
})
