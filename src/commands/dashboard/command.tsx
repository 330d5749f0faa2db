import { Command } from "@commander-js/extra-typings"
import { serve } from "@hono/node-server"
import { basename } from "path"

import { ValidationError } from "@/errors"
import { parseFilter, parseGranularity, parseLimit } from "@/filters"
import type { Logger } from "@/logger"
import { generatePage } from "@commands/dashboard/page"
import { runCommand } from "@commands/utils/command-context"
import { parsePort } from "@commands/utils/parse-int"
import { type Database, withDatabase } from "@db/database"
import { InsightsRepository, type SnapshotQuery } from "@db/insights"
import { METADATA_KEYS, MetadataRepository } from "@db/metadata"

/** Suggestions offered under the file-pattern input. */
export const POPULAR_FILES = 20

/** Runs `fn` against a database handle that lives for one request. */
export type DatabaseAccess = <T>(fn: (db: Database) => T) => T

export interface DashboardHandlerOptions {
  html: string
  withDb: DatabaseAccess
  logger: Logger
  /** Ranking length used when a request has no `limit`. */
  defaultLimit: number
}

/**
 * Reads the dashboard query string: `start`, `end`, repeated `author`,
 * `files`, `fixes`, `granularity` and `limit`.
 */
export function parseDashboardQuery(
  params: URLSearchParams,
  defaultLimit: number,
): SnapshotQuery {
  const fixes = params.get("fixes")
  return {
    filter: parseFilter({
      start: params.get("start") || undefined,
      end: params.get("end") || undefined,
      authors: params.getAll("author"),
      files: params.get("files") ?? undefined,
      fixesOnly: fixes === "1" || fixes === "true",
    }),
    granularity: parseGranularity(params.get("granularity") ?? undefined),
    limit: parseLimit(params.get("limit") ?? undefined, defaultLimit),
  }
}

export function createFetchHandler({
  html,
  withDb,
  logger,
  defaultLimit,
}: DashboardHandlerOptions): (req: Request) => Response {
  function respond(url: URL, load: () => unknown): Response {
    try {
      return Response.json(load())
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      if (err instanceof ValidationError) {
        return Response.json({ error: message }, { status: 400 })
      }
      logger.error(`${url.pathname} failed: ${message}`)
      return Response.json({ error: message }, { status: 500 })
    }
  }

  return (req: Request) => {
    const url = new URL(req.url)
    if (req.method !== "GET") {
      return new Response("Method not allowed", { status: 405 })
    }
    if (url.pathname === "/")
      return new Response(html, {
        headers: { "Content-Type": "text/html; charset=utf-8" },
      })
    if (url.pathname === "/api/options")
      return respond(url, () =>
        withDb((db) => {
          const metadata = new MetadataRepository(db)
          return {
            ...new InsightsRepository(db).getFilterOptions(POPULAR_FILES),
            repoPath: metadata.get(METADATA_KEYS.repoPath),
            lastRun: metadata.get(METADATA_KEYS.lastRun),
          }
        }),
      )
    if (url.pathname === "/api/dashboard")
      return respond(url, () => {
        const query = parseDashboardQuery(url.searchParams, defaultLimit)
        return withDb((db) => new InsightsRepository(db).getSnapshot(query))
      })
    return new Response("Not found", { status: 404 })
  }
}

const HELP_TEXT = `
Serves a local dashboard over the ingested history: filter by date
range, authors, file pattern and fix commits, and see KPIs, commit
volume, top authors and files, a file change trend and the matching
commits.

The server runs until you press Ctrl+C. The port defaults to
dashboardPort from .gitpulse/config.json (8787).

Examples:
  gitpulse dashboard
  gitpulse dashboard --port 0
  gitpulse --db /tmp/service.db dashboard --host 0.0.0.0`

export const dashboardCommand = new Command("dashboard")
  .alias("d")
  .description("Serve the interactive history dashboard")
  .addHelpText("after", HELP_TEXT)
  .option("-p, --port <number>", "Server port (0 for auto)", parsePort)
  .option("--host <host>", "Interface to listen on", "127.0.0.1")
  .action(async (opts, cmd) => {
    await runCommand(
      cmd.parent!.opts(),
      {},
      async ({ db, dbPath, config, logger }) => {
        const metadata = new MetadataRepository(db)
        const repoPath = metadata.get(METADATA_KEYS.repoPath)
        const html = generatePage({
          repoName: repoPath ? basename(repoPath) : null,
          lastRun: metadata.get(METADATA_KEYS.lastRun),
        })

        const handler = createFetchHandler({
          html,
          withDb: (fn) => withDatabase(dbPath, { readonly: true }, fn),
          logger,
          defaultLimit: config.topN,
        })

        await new Promise<void>((resolve, reject) => {
          const server = serve(
            {
              fetch: handler,
              port: opts.port ?? config.dashboardPort,
              hostname: opts.host,
            },
            (info) => {
              console.log(`Dashboard: http://${opts.host}:${info.port}`)
            },
          )
          server.once("error", reject)
          process.once("SIGINT", () => {
            server.close(() => resolve())
          })
        })
      },
    )
  })
