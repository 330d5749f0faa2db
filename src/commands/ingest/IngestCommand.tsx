import { Box, Text, useApp } from "ink"
import Spinner from "ink-spinner"
import React, { useEffect, useState } from "react"

import { formatCount } from "@/output"
import type { IngestProgress, IngestSummary } from "@/types"

export type IngestRunner = (
  onProgress: (progress: IngestProgress) => void,
  signal: AbortSignal,
) => Promise<IngestSummary>

interface IngestCommandProps {
  /** Starts the ingestion pass; usually `IngestionService.run`. */
  run: IngestRunner
  repoPath: string
}

/**
 * Runs an ingestion pass and shows a live commit counter, then a summary.
 * A failed run exits the ink app with the error so the caller can report it.
 */
export function IngestCommand({ run, repoPath }: IngestCommandProps) {
  const { exit } = useApp()
  const [progress, setProgress] = useState<IngestProgress>({
    phase: "reading",
    parsed: 0,
    skipped: 0,
    failed: 0,
  })
  const [summary, setSummary] = useState<IngestSummary | null>(null)
  const [error, setError] = useState<Error | null>(null)

  useEffect(() => {
    const controller = new AbortController()

    run((p) => setProgress(p), controller.signal)
      .then(setSummary)
      .catch((err: unknown) =>
        setError(err instanceof Error ? err : new Error(String(err))),
      )

    return () => controller.abort()
  }, [run])

  useEffect(() => {
    if (error) exit(error)
    else if (summary) exit()
  }, [summary, error, exit])

  if (error) return null

  if (summary) {
    return (
      <Box flexDirection="column">
        <Text color="green">
          Ingested {formatCount(summary.parsed)} commits from {repoPath}
        </Text>
        <Text>
          {"  "}written {formatCount(summary.written)}, unchanged{" "}
          {formatCount(summary.unchanged)}, skipped{" "}
          {formatCount(summary.skipped)}, failed {formatCount(summary.failed)}
        </Text>
        {summary.failed > 0 && (
          <Text color="yellow">
            {"  "}Some commits could not be stored; rerun with --verbose for
            details.
          </Text>
        )}
      </Box>
    )
  }

  return (
    <Box>
      <Text color="cyan">
        <Spinner type="dots" />
      </Text>
      <Text>
        {" "}
        Reading history... {formatCount(progress.parsed)} commits
        {progress.currentHash ? ` [${progress.currentHash.slice(0, 7)}]` : ""}
      </Text>
    </Box>
  )
}
