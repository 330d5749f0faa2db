import { execFileSync } from "child_process"
import { writeFileSync } from "fs"
import { mkdtemp, realpath, rm } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"
import { afterEach, beforeEach, describe, expect, test } from "vitest"

import { GitError } from "@/errors"
import { GitService, buildLogArgs } from "@services/git"
import { LOG_FORMAT, LogParser, parseLogStream } from "@services/log-parser"
import type { ParsedCommit } from "@/types"

describe("buildLogArgs", () => {
  test("reads numstat history with the parser's header format", () => {
    expect(buildLogArgs("/repo")).toEqual([
      "-c",
      "core.quotePath=false",
      "-C",
      "/repo",
      "log",
      "--numstat",
      "--date=iso-strict",
      `--format=${LOG_FORMAT}`,
    ])
  })

  test("appends --since when given", () => {
    const args = buildLogArgs("/repo", { since: "2024-01-01" })
    expect(args[args.length - 1]).toBe("--since=2024-01-01")
  })
})

describe("GitService without git", () => {
  test("reports a missing executable as a GitError", async () => {
    const git = new GitService(tmpdir(), { gitPath: "gitpulse-missing-git" })
    await expect(git.isGitRepo()).rejects.toThrow("git executable not found")
  })

  test("streamLog rejects when the executable is missing", async () => {
    const git = new GitService(tmpdir(), { gitPath: "gitpulse-missing-git" })
    const consume = async () => {
      for await (const _line of git.streamLog()) {
        // drain
      }
    }
    await expect(consume()).rejects.toBeInstanceOf(GitError)
  })
})

describe("GitService", () => {
  let tmpDir: string
  let git: GitService

  function runGit(args: string[], date = "2024-01-15T10:00:00+00:00"): void {
    execFileSync("git", ["-C", tmpDir, ...args], {
      stdio: "ignore",
      env: {
        ...process.env,
        GIT_AUTHOR_DATE: date,
        GIT_COMMITTER_DATE: date,
      },
    })
  }

  function makeCommit(
    filename: string,
    content: string,
    message: string,
    date?: string,
  ): void {
    writeFileSync(join(tmpDir, filename), content)
    runGit(["add", filename], date)
    runGit(["commit", "-q", "-m", message], date)
  }

  async function collectLog(service: GitService, since?: string) {
    const parser = new LogParser()
    const commits: ParsedCommit[] = []
    for await (const commit of parseLogStream(
      service.streamLog({ since }),
      parser,
    )) {
      commits.push(commit)
    }
    return { commits, skipped: parser.skipped }
  }

  beforeEach(async () => {
    tmpDir = await realpath(await mkdtemp(join(tmpdir(), "gitpulse-test-")))
    git = new GitService(tmpDir)
    runGit(["init", "-q"])
    runGit(["config", "user.email", "test@example.com"])
    runGit(["config", "user.name", "Test User"])
    runGit(["config", "commit.gpgsign", "false"])
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  test("isGitRepo returns true for git repos", async () => {
    expect(await git.isGitRepo()).toBe(true)
  })

  test("isGitRepo returns false for non-git dirs", async () => {
    const nonGit = await mkdtemp(join(tmpdir(), "gitpulse-nongit-"))
    try {
      expect(await new GitService(nonGit).isGitRepo()).toBe(false)
    } finally {
      await rm(nonGit, { recursive: true, force: true })
    }
  })

  test("getRepoRoot returns the working tree root", async () => {
    expect(await git.getRepoRoot()).toBe(tmpDir)
  })

  test("hasCommits is false until the first commit", async () => {
    expect(await git.hasCommits()).toBe(false)
    makeCommit("a.txt", "one\n", "Add a")
    expect(await git.hasCommits()).toBe(true)
  })

  test("streamLog yields nothing for a repository without commits", async () => {
    const lines: string[] = []
    for await (const line of git.streamLog()) lines.push(line)
    expect(lines).toEqual([])
  })

  test("streams commits newest first with their file stats", async () => {
    makeCommit("a.txt", "one\ntwo\n", "Add a", "2024-01-10T09:00:00+00:00")
    makeCommit(
      "b.txt",
      "x\n",
      "Fix b\n\nWith a body",
      "2024-01-12T12:00:00+02:00",
    )

    const { commits, skipped } = await collectLog(git)
    expect(skipped).toBe(0)
    expect(commits.map((c) => c.message)).toEqual([
      "Fix b\n\nWith a body",
      "Add a",
    ])
    expect(commits[0]).toMatchObject({
      authorName: "Test User",
      authorEmail: "test@example.com",
      authoredAt: "2024-01-12T10:00:00Z",
      files: [{ filePath: "b.txt", additions: 1, deletions: 0 }],
      additions: 1,
      filesChanged: 1,
    })
    expect(commits[1].files).toEqual([
      { filePath: "a.txt", additions: 2, deletions: 0 },
    ])
    expect(commits[0].hash).toMatch(/^[0-9a-f]{40}$/)
  })

  test("limits history with since", async () => {
    makeCommit("old.txt", "old\n", "Old", "2023-06-01T00:00:00+00:00")
    makeCommit("new.txt", "new\n", "New", "2024-06-01T00:00:00+00:00")

    const { commits } = await collectLog(git, "2024-01-01")
    expect(commits.map((c) => c.message)).toEqual(["New"])
  })

  test("keeps non-ASCII paths unquoted", async () => {
    makeCommit("café.txt", "x\n", "Accent")
    const { commits } = await collectLog(git)
    expect(commits[0].files[0].filePath).toBe("café.txt")
  })

  test("streamLog rejects with git's message outside a repository", async () => {
    const nonGit = await mkdtemp(join(tmpdir(), "gitpulse-nongit-"))
    try {
      await expect(collectLog(new GitService(nonGit))).rejects.toBeInstanceOf(
        GitError,
      )
    } finally {
      await rm(nonGit, { recursive: true, force: true })
    }
  })
})
