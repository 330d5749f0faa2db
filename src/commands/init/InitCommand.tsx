import React from "react"
import { Box, Text } from "ink"

import type { GitpulseConfig } from "@/config"

interface InitCommandProps {
  config: GitpulseConfig
}

export function InitCommand({ config }: InitCommandProps) {
  return (
    <Box flexDirection="column">
      <Text bold color="green">
        Initialized gitpulse
      </Text>
      <Text> </Text>
      <Text> Index start date: {config.indexStartDate ?? "all history"}</Text>
      <Text> Fix keywords: {config.fixKeywords.join(", ")}</Text>
      <Text> Top N: {config.topN}</Text>
      <Text> Dashboard port: {config.dashboardPort}</Text>
      <Text> Log level: {config.logLevel}</Text>
      <Text> </Text>
      <Text color="gray">
        {"Run `gitpulse ingest <repo>` to read a repository's history."}
      </Text>
    </Box>
  )
}
