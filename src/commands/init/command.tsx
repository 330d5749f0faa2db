import { Command, Option } from "@commander-js/extra-typings"
import { render } from "ink"
import { resolve } from "path"
import React from "react"

import {
  CONFIG_DIR,
  type GitpulseConfig,
  LOG_LEVELS,
  type LogLevel,
  createConfig,
} from "@/config"
import { formatOutput } from "@/output"
import { InitCommand } from "@commands/init/InitCommand"
import { runCommand } from "@commands/utils/command-context"
import { parsePort, parsePositiveInt } from "@commands/utils/parse-int"

/** Splits a comma-separated keyword list, dropping blanks. */
export function parseKeywordList(value: string): string[] {
  return value
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0)
}

export interface InitOptions {
  indexStartDate?: string
  fixKeywords?: string[]
  topN?: number
  dashboardPort?: number
  logLevel?: LogLevel
}

/** Builds config overrides from init flags; createConfig validates them. */
export function toOverrides(
  opts: InitOptions,
): Partial<GitpulseConfig> | undefined {
  const overrides: Partial<GitpulseConfig> = {}
  if (opts.indexStartDate !== undefined)
    overrides.indexStartDate = opts.indexStartDate
  if (opts.fixKeywords !== undefined) overrides.fixKeywords = opts.fixKeywords
  if (opts.topN !== undefined) overrides.topN = opts.topN
  if (opts.dashboardPort !== undefined)
    overrides.dashboardPort = opts.dashboardPort
  if (opts.logLevel !== undefined) overrides.logLevel = opts.logLevel
  return Object.keys(overrides).length > 0 ? overrides : undefined
}

const HELP_TEXT = `
Creates .gitpulse/config.json in the current directory. Every setting is
optional; commands run with the defaults when no config file exists.

Examples:
  gitpulse init
  gitpulse init --index-start-date 2024-01-01
  gitpulse init --fix-keywords fix,bug,hotfix,rollback --top-n 20`

export const initCommand = new Command("init")
  .description("Write a gitpulse config file in the current directory")
  .addHelpText("after", HELP_TEXT)
  .option(
    "--index-start-date <date>",
    "Only ingest commits on/after this date (YYYY-MM-DD)",
  )
  .option(
    "--fix-keywords <list>",
    "Comma-separated words that mark a commit as a fix",
    parseKeywordList,
  )
  .option("--top-n <number>", "Length of author and file rankings", parsePositiveInt)
  .option("--dashboard-port <port>", "Default dashboard port", parsePort)
  .addOption(
    new Option("--log-level <level>", "Diagnostic log level").choices(
      LOG_LEVELS,
    ),
  )
  .action(async (opts, cmd) => {
    await runCommand(
      cmd.parent!.opts(),
      { needsConfig: false, needsDb: false },
      ({ format, cwd }) => {
        const config = createConfig(resolve(cwd, CONFIG_DIR), toOverrides(opts))

        if (formatOutput(format, { success: true, config })) return

        render(<InitCommand config={config} />).unmount()
      },
    )
  })
