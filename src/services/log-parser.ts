import { z } from "zod"

import { toUtcTimestamp } from "@/dates"
import type { FileChange, ParsedCommit } from "@/types"
import { tallyFiles } from "@services/tally"

/** Opens a commit header. */
export const HEADER_START = "\x1e"
/** Separates the five header fields. */
export const FIELD_SEPARATOR = "\x1f"
/** Closes a commit header; the message before it may span several lines. */
export const HEADER_END = "\x1d"

/**
 * `git log --format` string producing the header the parser expects:
 * hash, author name, author email, strict ISO author date, full message.
 * Changing one side without the other silently breaks parsing.
 */
export const LOG_FORMAT = "%x1e%H%x1f%an%x1f%ae%x1f%aI%x1f%B%x1d"

const HEADER_FIELDS = 5

const headerSchema = z.object({
  hash: z.string().regex(/^(?:[0-9a-f]{40}|[0-9a-f]{64})$/, "invalid hash"),
  authorName: z.string().trim().min(1, "empty author name"),
  authorEmail: z.string().trim().min(1, "empty author email"),
  authoredAt: z.string().transform((value, ctx) => {
    const utc = toUtcTimestamp(value.trim())
    if (utc === null) {
      ctx.addIssue({ code: "custom", message: `invalid date "${value}"` })
      return z.NEVER
    }
    return utc
  }),
  message: z.string().transform((m) => m.trimEnd()),
})

type CommitHeader = z.output<typeof headerSchema>

interface PendingCommit {
  header: CommitHeader
  files: FileChange[]
}

const NUMSTAT_LINE = /^([^\t]*)\t([^\t]*)\t(.+)$/

function parseCount(raw: string): number {
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : 0
}

/**
 * Resolves numstat rename notation to the final path:
 * `src/{old => new}/a.ts` → `src/new/a.ts`, `old.ts => new.ts` → `new.ts`.
 */
export function resolveRenamedPath(path: string): string {
  if (!path.includes(" => ")) return path
  if (/\{[^{}]* => [^{}]*\}/.test(path)) {
    return path
      .replace(/\{[^{}]* => ([^{}]*)\}/g, "$1")
      .replace(/\/{2,}/g, "/")
      .replace(/^\//, "")
  }
  return path.slice(path.lastIndexOf(" => ") + 4)
}

/**
 * Parses one `<additions>\t<deletions>\t<path>` line. Non-numeric counts
 * (git prints "-" for binary files) become 0. Returns null for other lines.
 */
export function parseNumstatLine(line: string): FileChange | null {
  const match = NUMSTAT_LINE.exec(line)
  if (!match) return null
  return {
    filePath: resolveRenamedPath(match[3]),
    additions: parseCount(match[1]),
    deletions: parseCount(match[2]),
  }
}

export interface LogParserOptions {
  /** Called once for every commit dropped because of a malformed header. */
  onSkip?: (reason: string) => void
}

/**
 * Incremental parser for `git log --numstat --format=LOG_FORMAT` output.
 *
 * Feed it one line at a time with `push`; a commit is returned once the next
 * header (or `end`) shows that all of its numstat lines have been read.
 * Malformed commits are counted in `skipped` and never raise.
 */
export class LogParser {
  /** Commits dropped because their header was malformed. */
  skipped = 0

  private headerLines: string[] | null = null
  private current: PendingCommit | null = null
  private onSkip?: (reason: string) => void

  constructor(options: LogParserOptions = {}) {
    this.onSkip = options.onSkip
  }

  push(rawLine: string): ParsedCommit | null {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine

    if (this.headerLines) {
      if (line.startsWith(HEADER_START)) {
        this.headerLines = null
        this.skip("unterminated header")
      } else {
        const end = line.indexOf(HEADER_END)
        if (end === -1) {
          this.headerLines.push(line)
        } else {
          this.headerLines.push(line.slice(0, end))
          this.open(this.headerLines.join("\n"))
          this.headerLines = null
        }
        return null
      }
    }

    if (line.startsWith(HEADER_START)) {
      const finished = this.close()
      const rest = line.slice(HEADER_START.length)
      const end = rest.indexOf(HEADER_END)
      if (end === -1) {
        this.headerLines = [rest]
      } else {
        this.open(rest.slice(0, end))
      }
      return finished
    }

    if (this.current && line !== "") {
      const file = parseNumstatLine(line)
      if (file) this.current.files.push(file)
    }
    return null
  }

  /** Flushes the last commit once the input is exhausted. */
  end(): ParsedCommit | null {
    if (this.headerLines) {
      this.headerLines = null
      this.skip("unterminated header")
    }
    return this.close()
  }

  private open(text: string): void {
    const fields = text.split(FIELD_SEPARATOR)
    if (fields.length < HEADER_FIELDS) {
      this.skip(`expected ${HEADER_FIELDS} header fields, got ${fields.length}`)
      return
    }

    const result = headerSchema.safeParse({
      hash: fields[0],
      authorName: fields[1],
      authorEmail: fields[2],
      authoredAt: fields[3],
      message: fields.slice(HEADER_FIELDS - 1).join(FIELD_SEPARATOR),
    })
    if (!result.success) {
      this.skip(result.error.issues[0]?.message ?? "invalid header")
      return
    }
    this.current = { header: result.data, files: [] }
  }

  private close(): ParsedCommit | null {
    if (!this.current) return null
    const { header, files } = this.current
    this.current = null
    return { ...header, ...tallyFiles(files) }
  }

  private skip(reason: string): void {
    this.skipped++
    this.current = null
    this.onSkip?.(reason)
  }
}

/** Lazily parses a complete log string. */
export function* parseLog(
  text: string,
  parser: LogParser = new LogParser(),
): Generator<ParsedCommit, void, undefined> {
  for (const line of text.split("\n")) {
    const commit = parser.push(line)
    if (commit) yield commit
  }
  const last = parser.end()
  if (last) yield last
}

/** Lazily parses a stream of log lines, such as git's stdout via readline. */
export async function* parseLogStream(
  lines: AsyncIterable<string>,
  parser: LogParser = new LogParser(),
): AsyncGenerator<ParsedCommit, void, undefined> {
  for await (const line of lines) {
    const commit = parser.push(line)
    if (commit) yield commit
  }
  const last = parser.end()
  if (last) yield last
}
