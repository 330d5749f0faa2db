import { execFile, spawn } from "child_process"
import { createInterface } from "readline"

import { GitError } from "@/errors"
import { LOG_FORMAT } from "@services/log-parser"
import type { IGitService, LogOptions } from "@services/types"

interface GitResult {
  code: number
  stdout: string
  stderr: string
}

type ExitResult = { error: Error } | { code: number | null }

function errnoCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined
}

function spawnFailure(err: unknown): GitError {
  if (errnoCode(err) === "ENOENT") {
    return new GitError("git executable not found")
  }
  const message = err instanceof Error ? err.message : String(err)
  return new GitError(`git failed to start: ${message}`)
}

/**
 * Builds the full argument list for the history read. Paths are printed
 * unquoted so that non-ASCII file names survive as-is.
 */
export function buildLogArgs(repo: string, options: LogOptions = {}): string[] {
  const args = [
    "-c",
    "core.quotePath=false",
    "-C",
    repo,
    "log",
    "--numstat",
    "--date=iso-strict",
    `--format=${LOG_FORMAT}`,
  ]
  if (options.since) args.push(`--since=${options.since}`)
  return args
}

export interface GitServiceOptions {
  /** git executable to run. Defaults to "git" on the PATH. */
  gitPath?: string
}

/** Interacts with a local git repository through the git executable. */
export class GitService implements IGitService {
  private cwd: string
  private gitPath: string

  /** @param cwd - Path to the git working directory. */
  constructor(cwd: string, options: GitServiceOptions = {}) {
    this.cwd = cwd
    this.gitPath = options.gitPath ?? "git"
  }

  async isGitRepo(): Promise<boolean> {
    const result = await this.run(["rev-parse", "--is-inside-work-tree"])
    return result.code === 0 && result.stdout.trim() === "true"
  }

  async getRepoRoot(): Promise<string> {
    const result = await this.run(["rev-parse", "--show-toplevel"])
    if (result.code !== 0) {
      throw new GitError(result.stderr.trim() || "not a git repository")
    }
    return result.stdout.trim()
  }

  /** Whether HEAD resolves to a commit; false in a repository with no history. */
  async hasCommits(): Promise<boolean> {
    const result = await this.run(["rev-parse", "--verify", "-q", "HEAD"])
    return result.code === 0
  }

  /**
   * Spawns `git log` once and yields its stdout line by line. Stopping the
   * iteration early kills the child process. A repository without commits
   * yields nothing.
   */
  async *streamLog(
    options: LogOptions = {},
  ): AsyncGenerator<string, void, undefined> {
    if (!(await this.hasCommits()) && (await this.isGitRepo())) return

    const child = spawn(this.gitPath, buildLogArgs(this.cwd, options), {
      stdio: ["ignore", "pipe", "pipe"],
    })

    let stderr = ""
    child.stderr.setEncoding("utf8")
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk
    })

    const exited = new Promise<ExitResult>((resolve) => {
      child.once("error", (error) => resolve({ error }))
      child.once("close", (code) => resolve({ code }))
    })

    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity })
    child.once("error", () => lines.close())
    let drained = false
    try {
      for await (const line of lines) yield line
      drained = true
    } finally {
      lines.close()
      if (!drained) child.kill()
    }

    const result = await exited
    if ("error" in result) throw spawnFailure(result.error)
    if (result.code !== 0) {
      throw new GitError(
        stderr.trim() || `git log exited with code ${result.code}`,
      )
    }
  }

  private run(args: string[]): Promise<GitResult> {
    return new Promise((resolve, reject) => {
      execFile(
        this.gitPath,
        ["-C", this.cwd, ...args],
        { encoding: "utf8" },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ code: 0, stdout, stderr })
            return
          }
          const code = errnoCode(error)
          if (typeof code === "number") {
            resolve({ code, stdout, stderr })
            return
          }
          reject(spawnFailure(error))
        },
      )
    })
  }
}
