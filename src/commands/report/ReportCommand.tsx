import { Box, Text } from "ink"
import React from "react"

import { formatCount } from "@/output"
import type { Granularity } from "@/types"
import type { InsightsSnapshot, VolumePoint } from "@db/types"

/** Most recent periods drawn in the volume chart. */
export const VOLUME_ROWS = 12
const BAR_WIDTH = 30

/** A bar of `width` cells scaled against `max`; never empty for a non-zero value. */
export function bar(value: number, max: number, width = BAR_WIDTH): string {
  if (value <= 0 || max <= 0) return ""
  return "█".repeat(Math.max(1, Math.round((value / max) * width)))
}

interface ReportCommandProps {
  snapshot: InsightsSnapshot
  granularity: Granularity
  /** File pattern from the filter, shown above the churn table. */
  filePattern?: string
}

function VolumeChart({ volume }: { volume: VolumePoint[] }) {
  const shown = volume.slice(-VOLUME_ROWS)
  const hidden = volume.length - shown.length
  const max = Math.max(0, ...shown.map((p) => p.commits))
  const labelWidth = Math.max(0, ...shown.map((p) => p.period.length))

  return (
    <Box flexDirection="column">
      {hidden > 0 && (
        <Text color="gray">
          {"  "}({hidden} earlier periods not shown)
        </Text>
      )}
      {shown.map((p) => (
        <Text key={p.period}>
          {"  "}
          {p.period.padEnd(labelWidth)} <Text color="cyan">{bar(p.commits, max)}</Text>{" "}
          {formatCount(p.commits)}
        </Text>
      ))}
    </Box>
  )
}

/** Terminal rendering of the dashboard's result sets. */
export function ReportCommand({
  snapshot,
  granularity,
  filePattern,
}: ReportCommandProps) {
  const { kpis } = snapshot

  if (kpis.commits === 0) {
    return (
      <Box flexDirection="column">
        <Text bold>gitpulse report</Text>
        <Text color="yellow">No commits match these filters.</Text>
      </Box>
    )
  }

  const fixPct = Math.round((kpis.fixCommits / kpis.commits) * 100)

  return (
    <Box flexDirection="column">
      <Text bold>gitpulse report</Text>
      <Text> </Text>
      <Text>
        Commits: {formatCount(kpis.commits)} Added:{" "}
        <Text color="green">+{formatCount(kpis.additions)}</Text> Deleted:{" "}
        <Text color="red">-{formatCount(kpis.deletions)}</Text> Fixes:{" "}
        {formatCount(kpis.fixCommits)} ({fixPct}%)
      </Text>

      <Text> </Text>
      <Text bold>Commits per {granularity}</Text>
      <VolumeChart volume={snapshot.volume} />

      <Text> </Text>
      <Text bold>Top authors</Text>
      {snapshot.topAuthors.map((a) => (
        <Text key={a.author_email}>
          {"  "}
          {formatCount(a.commits).padStart(6)}{" "}
          {`${a.author_name} <${a.author_email}>`}
        </Text>
      ))}

      <Text> </Text>
      <Text bold>Top files</Text>
      {snapshot.topFiles.map((f) => (
        <Text key={f.file_path}>
          {"  "}
          {formatCount(f.commits).padStart(6)} {f.file_path}
        </Text>
      ))}

      {filePattern && snapshot.churn.length > 0 && (
        <>
          <Text> </Text>
          <Text bold>Line changes in {filePattern}</Text>
          {snapshot.churn.slice(-VOLUME_ROWS).map((p) => (
            <Text key={p.period}>
              {"  "}
              {p.period} <Text color="green">+{formatCount(p.additions)}</Text>{" "}
              <Text color="red">-{formatCount(p.deletions)}</Text>
            </Text>
          ))}
        </>
      )}

      {snapshot.commits.length > 0 && (
        <>
          <Text> </Text>
          <Text bold>Recent commits</Text>
          {snapshot.commits.map((c) => (
            <Text key={c.hash}>
              {"  "}
              {c.hash.slice(0, 7)} {c.authored_at.slice(0, 10)}{" "}
              {c.is_fix ? <Text color="red">fix </Text> : null}
              {firstLine(c.message)}
            </Text>
          ))}
        </>
      )}
    </Box>
  )
}

function firstLine(message: string): string {
  const line = message.split("\n", 1)[0]
  return line.length > 60 ? `${line.slice(0, 57)}...` : line
}
