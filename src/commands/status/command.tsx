import { Command } from "@commander-js/extra-typings"
import { statSync } from "fs"
import { render } from "ink"
import React from "react"

import { formatOutput } from "@/output"
import type { StatusInfo } from "@/types"
import { StatusCommand } from "@commands/status/StatusCommand"
import { runCommand } from "@commands/utils/command-context"
import { CommitRepository } from "@db/commits"
import type { Database } from "@db/database"
import { METADATA_KEYS, MetadataRepository } from "@db/metadata"

const HELP_TEXT = `
Displays stored commit and file-row counts, the span of author dates,
the last ingestion run and repository, and the database path and size.

Requires a prior gitpulse ingest run.`

/** Collects store counts and run metadata for a database file. */
export function collectStatus(db: Database, dbPath: string): StatusInfo {
  const commits = new CommitRepository(db)
  const metadata = new MetadataRepository(db)
  const span = commits.getDateSpan()

  return {
    commits: commits.getTotalCommitCount(),
    fileRows: commits.getFileRowCount(),
    fixCommits: commits.getFixCommitCount(),
    firstCommitAt: span.first,
    lastCommitAt: span.last,
    lastRun: metadata.get(METADATA_KEYS.lastRun),
    repoPath: metadata.get(METADATA_KEYS.repoPath),
    dbPath,
    dbSize: statSync(dbPath).size,
  }
}

export const statusCommand = new Command("status")
  .alias("s")
  .description("Show database contents and the last ingestion run")
  .addHelpText("after", HELP_TEXT)
  .action(async (_opts, cmd) => {
    await runCommand(
      cmd.parent!.opts(),
      {},
      async ({ format, db, dbPath, config }) => {
        const status: StatusInfo = { ...collectStatus(db, dbPath), config }

        if (formatOutput(format, status)) return

        render(<StatusCommand status={status} />).unmount()
      },
    )
  })
