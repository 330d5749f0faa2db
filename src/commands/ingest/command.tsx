import { Command } from "@commander-js/extra-typings"
import { existsSync } from "fs"
import { render } from "ink"
import { resolve } from "path"
import React from "react"
import { z } from "zod"

import { GitError, ValidationError } from "@/errors"
import { formatOutput } from "@/output"
import type { IngestSummary } from "@/types"
import { IngestCommand, type IngestRunner } from "@commands/ingest/IngestCommand"
import { runCommand } from "@commands/utils/command-context"
import { CommitRepository } from "@db/commits"
import { METADATA_KEYS, MetadataRepository } from "@db/metadata"
import { createClassifier } from "@services/classifier"
import { GitService } from "@services/git"
import { IngestionService } from "@services/ingester"

const HELP_TEXT = `
Reads the full history of <repo> with a single git log and stores every
commit, its file changes and its fix classification in the database.

Re-running is safe: commits already stored with the same data are left
untouched. Use --since (or indexStartDate in .gitpulse/config.json) to
skip commits authored before that day, counted from midnight UTC.

Examples:
  gitpulse ingest .
  gitpulse ingest ../service --since 2024-01-01
  gitpulse --db /tmp/service.db ingest ../service --json`

export function parseSince(value: string | undefined): string | undefined {
  if (value === undefined) return undefined
  if (!z.iso.date().safeParse(value).success) {
    throw new ValidationError(`invalid --since "${value}": must be YYYY-MM-DD`)
  }
  return value
}

export const ingestCommand = new Command("ingest")
  .description("Read a repository's commit history into the database")
  .argument("<repo>", "Path to a git repository")
  .option(
    "--since <date>",
    "Only ingest commits authored on or after this date (UTC)",
  )
  .addHelpText("after", HELP_TEXT)
  .action(async (repo, opts, cmd) => {
    await runCommand(
      cmd.parent!.opts(),
      { dbMustExist: false, needsLock: true },
      async ({ format, cwd, db, config, logger }) => {
        const since = parseSince(opts.since) ?? config.indexStartDate ?? undefined
        const target = resolve(cwd, repo)
        if (!existsSync(target)) {
          throw new GitError(`repository path does not exist: ${target}`)
        }

        let git = new GitService(target)
        if (!(await git.isGitRepo())) {
          throw new GitError(`not a git repository: ${target}`)
        }
        const repoPath = await git.getRepoRoot()
        if (repoPath !== target) git = new GitService(repoPath)

        const commits = new CommitRepository(db)
        const metadata = new MetadataRepository(db)
        const service = new IngestionService({
          git,
          commits,
          classify: createClassifier(config.fixKeywords),
          logger,
          since,
        })

        let summary: IngestSummary | undefined
        if (format === "json") {
          summary = await service.run(() => {})
        } else {
          let pending: Promise<IngestSummary> | undefined
          const run: IngestRunner = (onProgress, signal) => {
            pending = service.run(onProgress, signal)
            return pending
          }
          const instance = render(
            <IngestCommand run={run} repoPath={repoPath} />,
          )
          await instance.waitUntilExit()
          // An interrupted run finishes the commit in flight before the
          // database is closed.
          summary = await pending
        }

        if (!summary) return

        metadata.set(METADATA_KEYS.lastRun, new Date().toISOString())
        metadata.set(METADATA_KEYS.repoPath, repoPath)

        formatOutput(format, {
          success: true,
          repo_path: repoPath,
          since: since ?? null,
          parsed: summary.parsed,
          written: summary.written,
          unchanged: summary.unchanged,
          skipped: summary.skipped,
          failed: summary.failed,
          file_rows_written: summary.fileRowsWritten,
          total_commits: commits.getTotalCommitCount(),
        })
      },
    )
  })
