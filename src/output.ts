import { ValidationError } from "@/errors"
import type { OutputFormat } from "@/types"

/**
 * Resolves CLI flags to a typed output format.
 * --json shorthand wins if both --json and --format are provided.
 */
export function resolveFormat(opts: {
  format?: string
  json?: boolean
}): OutputFormat {
  if (opts.json) return "json"
  if (opts.format === undefined || opts.format === "text") return "text"
  if (opts.format === "json") return "json"
  throw new ValidationError(
    `invalid format "${opts.format}". Valid values: text, json`,
  )
}

/**
 * When format is "json", writes JSON to stdout and returns true.
 * When format is "text", returns false (caller handles Ink rendering).
 */
export function formatOutput(format: OutputFormat, data: unknown): boolean {
  if (format === "json") {
    console.log(JSON.stringify(data, null, 2))
    return true
  }
  return false
}

/** Human-readable byte size: "512 B", "1.5 KB", "2.0 MB". */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/** Integer with en-US thousands separators. */
export function formatCount(n: number): string {
  return n.toLocaleString("en-US")
}
