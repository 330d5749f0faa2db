import { render } from "ink-testing-library"
import React from "react"
import { describe, expect, test, vi } from "vitest"

import type { IngestSummary } from "@/types"
import { IngestCommand, type IngestRunner } from "@commands/ingest/IngestCommand"
import { waitForFrame } from "@commands/utils/test-utils"

function summary(overrides: Partial<IngestSummary> = {}): IngestSummary {
  return {
    parsed: 1234,
    written: 1200,
    unchanged: 34,
    skipped: 2,
    failed: 0,
    fileRowsWritten: 5000,
    ...overrides,
  }
}

function runnerFor(result: IngestSummary): IngestRunner {
  return vi.fn(async (onProgress) => {
    onProgress({
      phase: "reading",
      parsed: 1,
      skipped: 0,
      failed: 0,
      currentHash: "abc1234def",
    })
    onProgress({
      phase: "done",
      parsed: result.parsed,
      skipped: result.skipped,
      failed: result.failed,
    })
    return result
  })
}

describe("IngestCommand", () => {
  test("shows the summary when the run completes", async () => {
    const { frames } = render(
      <IngestCommand run={runnerFor(summary())} repoPath="/work/repo" />,
    )

    const output = await waitForFrame(frames, (f) => f.includes("Ingested"))
    expect(output).toContain("Ingested 1,234 commits from /work/repo")
    expect(output).toContain(
      "written 1,200, unchanged 34, skipped 2, failed 0",
    )
    expect(output).not.toContain("could not be stored")
  })

  test("warns when some commits failed to store", async () => {
    const { frames } = render(
      <IngestCommand
        run={runnerFor(summary({ failed: 3 }))}
        repoPath="/work/repo"
      />,
    )

    const output = await waitForFrame(frames, (f) =>
      f.includes("could not be stored"),
    )
    expect(output).toContain("failed 3")
    expect(output).toContain("rerun with --verbose")
  })

  test("shows a live counter while reading", async () => {
    const run: IngestRunner = (onProgress) => {
      onProgress({
        phase: "reading",
        parsed: 42,
        skipped: 0,
        failed: 0,
        currentHash: "0123456789abcdef",
      })
      return new Promise(() => {})
    }
    const { frames, unmount } = render(
      <IngestCommand run={run} repoPath="/work/repo" />,
    )

    const output = await waitForFrame(frames, (f) => f.includes("42 commits"))
    expect(output).toContain("Reading history... 42 commits [0123456]")
    unmount()
  })

  test("aborts the run when unmounted", async () => {
    let signal: AbortSignal | undefined
    const run: IngestRunner = (_onProgress, s) => {
      signal = s
      return new Promise(() => {})
    }
    const { unmount } = render(<IngestCommand run={run} repoPath="/repo" />)

    await vi.waitFor(() => expect(signal).toBeDefined())
    expect(signal?.aborted).toBe(false)
    unmount()
    expect(signal?.aborted).toBe(true)
  })
})
