const ISO_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/

/**
 * Normalizes a strict ISO 8601 timestamp with an offset to UTC with second
 * precision ("2024-01-15T10:00:00Z"). Returns null for anything else.
 */
export function toUtcTimestamp(value: string): string | null {
  if (!ISO_TIMESTAMP.test(value)) return null
  const ms = Date.parse(value)
  if (Number.isNaN(ms)) return null
  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, "Z")
}

/** Midnight UTC of a "YYYY-MM-DD" date, as a stored-timestamp string. */
export function startOfDay(date: string): string {
  return `${date}T00:00:00Z`
}

/** Returns the "YYYY-MM-DD" date following the given one. */
export function nextDay(date: string): string {
  const d = new Date(`${date}T00:00:00Z`)
  d.setUTCDate(d.getUTCDate() + 1)
  return d.toISOString().slice(0, 10)
}

/** Returns the "YYYY-MM-DD" date before the given one. */
export function previousDay(date: string): string {
  const d = new Date(`${date}T00:00:00Z`)
  d.setUTCDate(d.getUTCDate() - 1)
  return d.toISOString().slice(0, 10)
}

/** Adds whole seconds to a UTC timestamp produced by toUtcTimestamp. */
export function addSeconds(timestamp: string, seconds: number): string {
  const d = new Date(Date.parse(timestamp) + seconds * 1000)
  return d.toISOString().replace(/\.\d{3}Z$/, "Z")
}
