import { closeSync, constants, existsSync, openSync, rmSync, writeFileSync } from "fs"
import { resolve } from "path"

import { CONFIG_DIR, DEFAULTS, type GitpulseConfig, loadConfig } from "@/config"
import { LockError, NotFoundError, handleError } from "@/errors"
import { type Logger, createLogger } from "@/logger"
import { resolveFormat } from "@/output"
import type { OutputFormat } from "@/types"
import { type Database, createDatabase } from "@db/database"

export const DEFAULT_DB_FILE = "gitpulse.db"

/** Options defined on the root command and shared by every subcommand. */
export interface GlobalOptions {
  format?: string
  json?: boolean
  db?: string
  verbose?: boolean
}

export interface CommandContext {
  format: OutputFormat
  cwd: string
  /** Open store handle; throws when the command asked for no database. */
  db: Database
  /** Absolute database path, or "" when the command uses no database. */
  dbPath: string
  config: GitpulseConfig
  logger: Logger
}

export interface CommandRequirements {
  /** Whether the command opens the database. Defaults to true. */
  needsDb?: boolean
  /** Whether the database file must already exist. Defaults to true. */
  dbMustExist?: boolean
  /** Whether this command performs writes and needs an exclusive lock. */
  needsLock?: boolean
  /** Whether `.gitpulse/config.json` is read. Defaults to true. */
  needsConfig?: boolean
}

export function getDbPath(opts: GlobalOptions, cwd: string): string {
  return resolve(cwd, opts.db ?? DEFAULT_DB_FILE)
}

/** Path of the lock file guarding writes to a database. */
export function getLockPath(dbPath: string): string {
  return `${dbPath}.lock`
}

function acquireLock(dbPath: string): string {
  const lockPath = getLockPath(dbPath)
  try {
    const fd = openSync(
      lockPath,
      constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY,
    )
    writeFileSync(fd, `${process.pid}\n`)
    closeSync(fd)
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new LockError(lockPath)
    }
    throw err
  }
  return lockPath
}

/**
 * Resolves format, config, logger and (optionally) a locked database handle,
 * runs the handler, and releases everything afterwards. Any error is reported
 * through handleError, which exits with the error's code.
 */
export async function runCommand(
  programOpts: GlobalOptions,
  requirements: CommandRequirements,
  handler: (ctx: CommandContext) => void | Promise<void>,
): Promise<void> {
  let format: OutputFormat = programOpts.json ? "json" : "text"

  try {
    format = resolveFormat(programOpts)
    const cwd = process.cwd()

    const config =
      requirements.needsConfig === false
        ? { ...DEFAULTS }
        : loadConfig(resolve(cwd, CONFIG_DIR))
    const logger = createLogger({
      level: programOpts.verbose ? "debug" : config.logLevel,
    })

    let db: Database | undefined
    let dbPath = ""
    let lockPath: string | undefined
    try {
      if (requirements.needsDb !== false) {
        dbPath = getDbPath(programOpts, cwd)
        if (requirements.dbMustExist !== false && !existsSync(dbPath)) {
          throw new NotFoundError(
            `no database found at ${dbPath}`,
            "run `gitpulse ingest <repo>` first",
          )
        }
        if (requirements.needsLock) lockPath = acquireLock(dbPath)
        db = createDatabase(dbPath)
      }

      const opened = db
      await handler({
        format,
        cwd,
        dbPath,
        config,
        logger,
        get db(): Database {
          if (!opened) throw new Error("this command opens no database")
          return opened
        },
      })
    } finally {
      db?.close()
      if (lockPath) rmSync(lockPath, { force: true })
    }
  } catch (err) {
    handleError(err, format)
  }
}
