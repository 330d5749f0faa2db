import React from "react"
import { Box, Text } from "ink"

import { formatBytes, formatCount } from "@/output"
import type { StatusInfo } from "@/types"

interface StatusCommandProps {
  status: StatusInfo
}

/** Ink component that displays store counts, run metadata and config. */
export function StatusCommand({ status }: StatusCommandProps) {
  const fixPct =
    status.commits > 0
      ? Math.round((status.fixCommits / status.commits) * 100)
      : 0
  const config = status.config

  return (
    <Box flexDirection="column">
      <Text bold>gitpulse status</Text>
      <Text> </Text>
      <Text>Commits: {formatCount(status.commits)}</Text>
      <Text>File rows: {formatCount(status.fileRows)}</Text>
      <Text>
        Fix commits: {formatCount(status.fixCommits)} ({fixPct}%)
      </Text>
      <Text>
        History:{" "}
        {status.firstCommitAt && status.lastCommitAt
          ? `${status.firstCommitAt} to ${status.lastCommitAt}`
          : "empty"}
      </Text>
      <Text>Repository: {status.repoPath ?? "none"}</Text>
      <Text>Last run: {status.lastRun ?? "never"}</Text>
      <Text>DB: {status.dbPath}</Text>
      <Text>DB size: {formatBytes(status.dbSize)}</Text>

      {config && (
        <>
          <Text> </Text>
          <Text bold>Config:</Text>
          <Text>
            {"  "}Index start date: {config.indexStartDate ?? "all history"}
          </Text>
          <Text>
            {"  "}Fix keywords: {config.fixKeywords.length}
          </Text>
          <Text>
            {"  "}Top N: {config.topN}
          </Text>
          <Text>
            {"  "}Dashboard port: {config.dashboardPort}
          </Text>
        </>
      )}
    </Box>
  )
}
