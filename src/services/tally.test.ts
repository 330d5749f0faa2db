import { describe, expect, test } from "vitest"

import { tallyFiles } from "@services/tally"

describe("tallyFiles", () => {
  test("sums totals across files", () => {
    const tally = tallyFiles([
      { filePath: "a.ts", additions: 3, deletions: 1 },
      { filePath: "b.ts", additions: 2, deletions: 5 },
    ])
    expect(tally).toEqual({
      files: [
        { filePath: "a.ts", additions: 3, deletions: 1 },
        { filePath: "b.ts", additions: 2, deletions: 5 },
      ],
      additions: 5,
      deletions: 6,
      filesChanged: 2,
    })
  })

  test("merges repeated paths by summing, keeping first-seen order", () => {
    const tally = tallyFiles([
      { filePath: "b.ts", additions: 1, deletions: 0 },
      { filePath: "a.ts", additions: 2, deletions: 2 },
      { filePath: "b.ts", additions: 4, deletions: 3 },
    ])
    expect(tally.files).toEqual([
      { filePath: "b.ts", additions: 5, deletions: 3 },
      { filePath: "a.ts", additions: 2, deletions: 2 },
    ])
    expect(tally.filesChanged).toBe(2)
    expect(tally.additions).toBe(7)
    expect(tally.deletions).toBe(5)
  })

  test("does not mutate its input", () => {
    const input = [
      { filePath: "a.ts", additions: 1, deletions: 1 },
      { filePath: "a.ts", additions: 1, deletions: 1 },
    ]
    tallyFiles(input)
    expect(input[0]).toEqual({ filePath: "a.ts", additions: 1, deletions: 1 })
  })

  test("an empty list tallies to zero", () => {
    expect(tallyFiles([])).toEqual({
      files: [],
      additions: 0,
      deletions: 0,
      filesChanged: 0,
    })
  })
})
