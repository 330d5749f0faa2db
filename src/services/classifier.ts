import { normalizeKeywords } from "@/config"
import type { Classification } from "@/types"

/** Separator used when tags are stored in `commits.error_tags`. */
export const TAG_DELIMITER = ","

export type Classifier = (message: string) => Classification

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Builds a classifier over a keyword vocabulary.
 *
 * A keyword matches, case-insensitively, wherever it begins a word: "fix"
 * matches "Fixed" and "fixes" but not "prefix". Longer keywords are tried
 * first so that "hotfix" is reported as "hotfix" when both are configured.
 */
export function createClassifier(keywords: readonly string[]): Classifier {
  const vocabulary = normalizeKeywords([...keywords]).filter((k) => k !== "")
  if (vocabulary.length === 0) {
    return () => ({ isFix: false, tags: [] })
  }

  const alternation = [...vocabulary]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|")
  const source = `(?<![\\p{L}\\p{N}])(${alternation})`

  return (message) => {
    const pattern = new RegExp(source, "giu")
    const tags: string[] = []
    for (const match of message.matchAll(pattern)) {
      const tag = match[1].toLowerCase()
      if (!tags.includes(tag)) tags.push(tag)
    }
    return { isFix: tags.length > 0, tags }
  }
}

/** Joins tags for storage; an empty list is stored as NULL. */
export function serializeTags(tags: readonly string[]): string | null {
  return tags.length > 0 ? tags.join(TAG_DELIMITER) : null
}

/** Splits a stored tag string back into its keywords. */
export function parseTags(stored: string | null): string[] {
  if (!stored) return []
  return stored.split(TAG_DELIMITER).filter((t) => t.length > 0)
}
