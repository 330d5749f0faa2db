import type { FileChange, FileTally } from "@/types"

/**
 * Merges file changes that share a path and computes commit totals.
 *
 * Counts for a repeated path are summed. Paths keep the order in which they
 * first appeared.
 */
export function tallyFiles(files: readonly FileChange[]): FileTally {
  const byPath = new Map<string, FileChange>()
  for (const file of files) {
    const existing = byPath.get(file.filePath)
    if (existing) {
      existing.additions += file.additions
      existing.deletions += file.deletions
    } else {
      byPath.set(file.filePath, { ...file })
    }
  }

  const merged = [...byPath.values()]
  let additions = 0
  let deletions = 0
  for (const file of merged) {
    additions += file.additions
    deletions += file.deletions
  }

  return { files: merged, additions, deletions, filesChanged: merged.length }
}
