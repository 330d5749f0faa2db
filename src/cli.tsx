#!/usr/bin/env tsx
import { handleError } from "@/errors"
import { dashboardCommand } from "@commands/dashboard/command"
import { gitpulseCommand } from "@commands/gitpulse"
import { ingestCommand } from "@commands/ingest/command"
import { initCommand } from "@commands/init/command"
import { reportCommand } from "@commands/report/command"
import { statusCommand } from "@commands/status/command"

const program = gitpulseCommand
  .addCommand(initCommand)
  .addCommand(ingestCommand)
  .addCommand(dashboardCommand)
  .addCommand(reportCommand)
  .addCommand(statusCommand)

program.parseAsync().catch((err: unknown) => {
  handleError(err, program.opts().json ? "json" : "text")
})
