import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { emptyTotals } from "../../src/core/aggregate.js"
import { excludePattern, includePattern } from "../../src/core/glob.js"
import { buildReport, renderJsonSummary, suggestFix, summarizeReports } from "../../src/core/report.js"
import type { ClassifiedEntry, Report } from "../../src/core/types.js"

const keep: ReadonlyArray<ClassifiedEntry> = [
  { path: "src/lib.rs", size: 10, hint: undefined, role: "Essential" }
]

const waste: ReadonlyArray<ClassifiedEntry> = [
  { path: "tests/a.rs", size: 5, hint: undefined, role: "Test" },
  { path: "data/blob", size: 7, hint: "binary", role: "Other" }
]

const reportInput = {
  metadata: { name: "demo", version: "1.0.0" },
  totals: {
    ...emptyTotals,
    Essential: { bytes: 10, files: 1 },
    Test: { bytes: 5, files: 1 },
    Other: { bytes: 7, files: 1 }
  },
  infoByExtension: new Map([
    ["rs", { totalBytes: 15, totalFiles: 2 }],
    ["(none)", { totalBytes: 7, totalFiles: 1 }]
  ]),
  keep,
  waste,
  patterns: [includePattern("src/**")]
}

const buildOrThrow = (): Report => {
  const result = buildReport(reportInput)
  if (Either.isLeft(result)) {
    throw new Error(result.left.message)
  }
  return result.right
}

describe("buildReport", () => {
  it.effect("derives byte and file counts from the partition", () =>
    Effect.sync(() => {
      const report = buildOrThrow()
      expect([report.totalBytes, report.keepBytes, report.wasteBytes]).toEqual([22, 10, 12])
      expect([report.totalFiles, report.keepFiles, report.wasteFiles]).toEqual([3, 1, 2])
      expect(report.wasteByRole).toEqual([["Test", 5], ["Other", 7]])
      expect(report.infoByExtension).toEqual([
        ["(none)", { totalBytes: 7, totalFiles: 1 }],
        ["rs", { totalBytes: 15, totalFiles: 2 }]
      ])
      expect(report.wastedFiles).toEqual([
        { path: "tests/a.rs", size: 5, role: "Test" },
        { path: "data/blob", size: 7, role: "Other" }
      ])
    }))

  it.effect("rejects totals that disagree with the partition", () =>
    Effect.sync(() => {
      const result = buildReport({
        ...reportInput,
        totals: { ...reportInput.totals, Essential: { bytes: 11, files: 1 } }
      })
      expect(Either.isLeft(result) ? result.left._tag : undefined).toBe("ReportInvariantViolation")
    }))
})

describe("suggestFix", () => {
  const patterns = [includePattern("src/**"), excludePattern("src/big.bin")]

  it.effect("returns null when nothing is wasted", () =>
    Effect.sync(() => {
      expect(suggestFix({}, patterns, 0)).toBe(null)
    }))

  it.effect("picks the fix kind from the declared manifest lists", () =>
    Effect.sync(() => {
      expect(suggestFix({}, patterns, 1)).toEqual({
        kind: "NewInclude",
        include: ["src/**", "!src/big.bin"],
        previousInclude: [],
        previousExclude: []
      })
      expect(suggestFix({ include: ["**/*"], exclude: ["tests"] }, patterns, 1)?.kind).toBe("ImprovedInclude")
      expect(suggestFix({ exclude: ["tests"] }, patterns, 1)).toEqual({
        kind: "RemoveExcludeAndUseInclude",
        include: ["src/**", "!src/big.bin"],
        previousInclude: [],
        previousExclude: ["tests"]
      })
    }))
})

describe("summarizeReports", () => {
  it.effect("adds totals and merges role and extension breakdowns", () =>
    Effect.sync(() => {
      const report = buildOrThrow()
      const summary = summarizeReports([report, report])
      expect(summary.packages).toBe(2)
      expect([summary.totalBytes, summary.keepBytes, summary.wasteBytes]).toEqual([44, 20, 24])
      expect([summary.totalFiles, summary.wasteFiles]).toEqual([6, 4])
      expect(summary.wasteByRole).toEqual([["Test", 10], ["Other", 14]])
      expect(JSON.parse(renderJsonSummary(summary))).toEqual({
        packages: 2,
        total_bytes: 44,
        keep_bytes: 20,
        waste_bytes: 24,
        total_files: 6,
        waste_files: 4,
        waste_by_role: { Test: 10, Other: 14 },
        info_by_extension: {
          "(none)": { total_bytes: 14, total_files: 2 },
          rs: { total_bytes: 30, total_files: 4 }
        }
      })
    }))

  it.effect("summarizes an empty collection to zeros", () =>
    Effect.sync(() => {
      expect(summarizeReports([])).toEqual({
        packages: 0,
        totalBytes: 0,
        keepBytes: 0,
        wasteBytes: 0,
        totalFiles: 0,
        wasteFiles: 0,
        wasteByRole: [],
        infoByExtension: []
      })
    }))
})
