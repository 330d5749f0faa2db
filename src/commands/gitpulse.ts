import { Command, Option } from "@commander-js/extra-typings"

import { DEFAULT_DB_FILE } from "@commands/utils/command-context"

const HELP_TEXT = `
Getting started:
  1. Optionally write a config file:   gitpulse init
  2. Read a repository's history:      gitpulse ingest ../my-repo
  3. Explore it in the browser:        gitpulse dashboard
     or in the terminal:               gitpulse report --since 2024-01-01

Global options --format json and --json work with every command.
The database path comes from --db, then GITPULSE_DB, then ./${DEFAULT_DB_FILE}.`

const gitpulseCommand = new Command()
  .name("gitpulse")
  .description("Commit history analytics backed by SQLite")
  .version("0.1.0")
  .option("--format <format>", "Output format (text or json)", "text")
  .option("--json", "Shorthand for --format json")
  .addOption(
    new Option("--db <path>", "SQLite database file")
      .env("GITPULSE_DB")
      .default(DEFAULT_DB_FILE),
  )
  .option("-v, --verbose", "Log debug diagnostics to stderr")
  .addHelpText("after", HELP_TEXT)

export { gitpulseCommand }
