import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import React from "react"

import { parseFilter, parseGranularity, parseLimit } from "@/filters"
import { formatOutput } from "@/output"
import { ReportCommand } from "@commands/report/ReportCommand"
import { runCommand } from "@commands/utils/command-context"
import { InsightsRepository } from "@db/insights"

/** Recent commits listed under the report. */
const RECENT_COMMITS = 5

const HELP_TEXT = `
Prints the dashboard's numbers in the terminal: KPIs, commit volume,
top authors and files, and line changes for --files.

Dates are YYYY-MM-DD (whole days, --until inclusive) or ISO date-times
with an offset. --files takes a SQL LIKE pattern; plain text matches
anywhere in the path.

Examples:
  gitpulse report
  gitpulse report --since 2024-01-01 --granularity week
  gitpulse report --author alice@example.com --author bob@example.com
  gitpulse report --files src/api --fixes-only --json`

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

export const reportCommand = new Command("report")
  .alias("r")
  .description("Summarize commit activity in the terminal")
  .addHelpText("after", HELP_TEXT)
  .option("--since <date>", "Include commits on/after this date")
  .option("--until <date>", "Include commits up to this date")
  .option("--author <email>", "Only this author (repeatable)", collect)
  .option("--files <pattern>", "Only commits touching matching paths")
  .option("--fixes-only", "Only commits classified as fixes")
  .option("-g, --granularity <granularity>", "day, week or month", "day")
  .option("-l, --limit <number>", "Length of author and file rankings")
  .action(async (opts, cmd) => {
    await runCommand(cmd.parent!.opts(), {}, ({ format, db, config }) => {
      const filter = parseFilter({
        start: opts.since,
        end: opts.until,
        authors: opts.author,
        files: opts.files,
        fixesOnly: opts.fixesOnly,
      })
      const granularity = parseGranularity(opts.granularity)
      const limit = parseLimit(opts.limit, config.topN)

      const snapshot = new InsightsRepository(db).getSnapshot({
        filter,
        granularity,
        limit,
        commitLimit: RECENT_COMMITS,
      })

      if (formatOutput(format, { filter, granularity, ...snapshot })) return

      render(
        <ReportCommand
          snapshot={snapshot}
          granularity={granularity}
          filePattern={filter.filePattern}
        />,
      ).unmount()
    })
  })
