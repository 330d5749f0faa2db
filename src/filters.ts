import { z } from "zod"

import { addSeconds, nextDay, startOfDay, toUtcTimestamp } from "@/dates"
import { ValidationError } from "@/errors"
import { type CommitFilter, GRANULARITIES, type Granularity } from "@/types"

/** Raw filter values as they arrive from CLI flags or query parameters. */
export interface FilterInput {
  /** Inclusive lower bound: YYYY-MM-DD or an ISO date-time with offset. */
  start?: string
  /** Inclusive upper bound: a whole day for YYYY-MM-DD, else that second. */
  end?: string
  /** Author emails. */
  authors?: string[]
  /** SQL LIKE pattern; plain text is matched as a substring. */
  files?: string
  fixesOnly?: boolean
}

const DATE_RULE = "must be YYYY-MM-DD or an ISO date-time with offset"

type Bound = { kind: "date"; date: string } | { kind: "time"; at: string }

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/

function parseBound(value: string): Bound | null {
  if (DATE_ONLY.test(value)) {
    const at = toUtcTimestamp(startOfDay(value))
    // impossible dates such as 2024-02-30 either fail or roll over
    return at?.startsWith(value) ? { kind: "date", date: value } : null
  }
  const at = toUtcTimestamp(value)
  return at ? { kind: "time", at } : null
}

const boundSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const bound = parseBound(value)
    if (!bound) {
      ctx.addIssue({ code: "custom", message: DATE_RULE })
      return z.NEVER
    }
    return bound
  })

const filterSchema = z.object({
  start: boundSchema.optional(),
  end: boundSchema.optional(),
  authors: z
    .array(z.string().trim().min(1, "must be non-empty strings"))
    .optional(),
  files: z.string().trim().optional(),
  fixesOnly: z.boolean().optional(),
})

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return "Invalid filter"
  const field = issue.path[0]
  return typeof field === "string"
    ? `Invalid filter: "${field}" ${issue.message}`
    : `Invalid filter: ${issue.message}`
}

function lowerBound(bound: Bound): string {
  return bound.kind === "date" ? startOfDay(bound.date) : bound.at
}

function upperBound(bound: Bound): string {
  return bound.kind === "date"
    ? startOfDay(nextDay(bound.date))
    : addSeconds(bound.at, 1)
}

/** Wraps a pattern without LIKE wildcards so it matches as a substring. */
export function toLikePattern(pattern: string): string {
  return pattern.includes("%") || pattern.includes("_")
    ? pattern
    : `%${pattern}%`
}

/**
 * Validates raw filter values and converts them to a query filter.
 * Dates become an inclusive start and exclusive end over stored timestamps.
 * @throws ValidationError naming the offending field.
 */
export function parseFilter(input: FilterInput): CommitFilter {
  const result = filterSchema.safeParse(input)
  if (!result.success) {
    throw new ValidationError(describeIssue(result.error))
  }
  const { start, end, authors, files, fixesOnly } = result.data

  const filter: CommitFilter = {}
  if (start || end) {
    filter.range = {}
    if (start) filter.range.start = lowerBound(start)
    if (end) filter.range.end = upperBound(end)
    if (
      filter.range.start &&
      filter.range.end &&
      filter.range.start >= filter.range.end
    ) {
      throw new ValidationError(
        'Invalid filter: "start" must not be after "end"',
      )
    }
  }
  if (authors && authors.length > 0) {
    filter.authors = [...new Set(authors)]
  }
  if (files) {
    filter.filePattern = toLikePattern(files)
  }
  if (fixesOnly) {
    filter.fixesOnly = true
  }
  return filter
}

const granularitySchema = z.enum(GRANULARITIES)

/** Validates a granularity name, defaulting to "day" when absent. */
export function parseGranularity(value: string | undefined): Granularity {
  if (value === undefined || value === "") return "day"
  const result = granularitySchema.safeParse(value)
  if (!result.success) {
    throw new ValidationError(
      `invalid granularity "${value}". Valid values: ${GRANULARITIES.join(", ")}`,
    )
  }
  return result.data
}

const limitSchema = z.coerce.number().int().positive()

/** Validates a positive integer limit, falling back when absent. */
export function parseLimit(
  value: string | number | undefined,
  fallback: number,
): number {
  if (value === undefined || value === "") return fallback
  const result = limitSchema.safeParse(value)
  if (!result.success) {
    throw new ValidationError(
      `invalid limit "${value}": must be a positive integer`,
    )
  }
  return result.data
}
