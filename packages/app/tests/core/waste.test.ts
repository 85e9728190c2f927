import { describe, expect, it } from "@effect/vitest"
import { Effect, FastCheck } from "effect"
import * as Either from "effect/Either"

import {
  computeWasteReport,
  defaultConventionSettings,
  renderJsonReport,
  selectIncluded
} from "../../src/index.js"
import type { Listing, RawFileEntry, Report } from "../../src/index.js"

const reportOrThrow = (listing: Listing): Report => {
  const result = computeWasteReport(listing, defaultConventionSettings)
  if (Either.isLeft(result)) {
    throw new Error(result.left.message)
  }
  return result.right
}

const crate: Listing = {
  package: {},
  entries: [
    { path: "src/lib.rs", size: 500 },
    { path: "src/main.rs", size: 300 },
    { path: "tests/t1.rs", size: 2000 },
    { path: "README.md", size: 100 }
  ]
}

describe("computeWasteReport", () => {
  it.effect("reports waste and a single include for a typical crate", () =>
    Effect.sync(() => {
      const report = reportOrThrow(crate)
      expect([report.keepBytes, report.wasteBytes]).toEqual([800, 2100])
      expect(report.wasteByRole).toEqual([["Test", 2000], ["Documentation", 100]])
      expect(JSON.parse(renderJsonReport(report))).toEqual({
        package: { name: null, version: null },
        total_bytes: 2900,
        keep_bytes: 800,
        waste_bytes: 2100,
        total_files: 4,
        keep_files: 2,
        waste_files: 2,
        waste_by_role: { Test: 2000, Documentation: 100 },
        info_by_extension: {
          md: { total_bytes: 100, total_files: 1 },
          rs: { total_bytes: 2800, total_files: 3 }
        },
        wasted_files: [
          { path: "tests/t1.rs", size: 2000, role: "Test" },
          { path: "README.md", size: 100, role: "Documentation" }
        ],
        patterns: ["src/**"],
        suggested_fix: {
          kind: "NewInclude",
          include: ["src/**"],
          previous_include: [],
          previous_exclude: []
        }
      })
    }))

  it.effect("selects exactly the essential files when a directory is mixed", () =>
    Effect.sync(() => {
      const report = reportOrThrow({
        package: {},
        entries: [{ path: "src/lib.rs", size: 10 }, { path: "src/data.bin", size: 90 }]
      })
      expect(selectIncluded(report.patterns, ["src/lib.rs", "src/data.bin"])).toEqual(["src/lib.rs"])
      expect(report.wastedFiles).toEqual([{ path: "src/data.bin", size: 90, role: "Other" }])
    }))

  it.effect("produces a zero report for an empty listing", () =>
    Effect.sync(() => {
      const report = reportOrThrow({ package: {}, entries: [] })
      expect(report).toEqual({
        packageName: undefined,
        packageVersion: undefined,
        totalBytes: 0,
        keepBytes: 0,
        wasteBytes: 0,
        totalFiles: 0,
        keepFiles: 0,
        wasteFiles: 0,
        wasteByRole: [],
        infoByExtension: [],
        wastedFiles: [],
        patterns: [],
        suggestedFix: null
      })
    }))

  it.effect("suggests no fix when every file is essential", () =>
    Effect.sync(() => {
      const report = reportOrThrow({ package: { name: "tiny" }, entries: [{ path: "src/lib.rs", size: 5 }] })
      expect(report.suggestedFix).toBe(null)
      expect(report.wasteBytes).toBe(0)
    }))

  it.effect("keeps the declared build script and targets", () =>
    Effect.sync(() => {
      const report = reportOrThrow({
        package: { build: "tools/build.rs", targets: ["bench-runner/main.rs"] },
        entries: [
          { path: "tools/build.rs", size: 3 },
          { path: "bench-runner/main.rs", size: 4 },
          { path: "build.rs", size: 5 }
        ]
      })
      expect(report.keepBytes).toBe(7)
      expect(report.wastedFiles).toEqual([{ path: "build.rs", size: 5, role: "Other" }])
    }))

  it.effect("fails on malformed entries", () =>
    Effect.sync(() => {
      const result = computeWasteReport(
        { package: {}, entries: [{ path: "src/lib.rs", size: -1 }] },
        defaultConventionSettings
      )
      expect(Either.isLeft(result) ? result.left._tag : undefined).toBe("MalformedInput")
    }))

  it.effect("renders identical JSON for identical input", () =>
    Effect.sync(() => {
      expect(renderJsonReport(reportOrThrow(crate))).toBe(renderJsonReport(reportOrThrow(crate)))
    }))

  it.effect("conserves bytes and reproduces the keep set for any listing", () =>
    Effect.sync(() => {
      const directory = FastCheck.constantFrom("src", "tests", "examples", "docs", "util", "assets")
      const fileName = FastCheck.constantFrom("lib.rs", "mod.rs", "README.md", "data.bin", "case.snap", "Cargo.toml")
      const entry = FastCheck.tuple(
        FastCheck.array(directory, { maxLength: 3 }),
        fileName,
        FastCheck.nat({ max: 10_000 })
      )
      FastCheck.assert(
        FastCheck.property(FastCheck.array(entry, { maxLength: 25 }), (items) => {
          const sizes = new Map<string, number>()
          for (const [directories, name, size] of items) {
            sizes.set([...directories, name].join("/"), size)
          }
          const entries: ReadonlyArray<RawFileEntry> = [...sizes.entries()].map(([path, size]) => ({ path, size }))
          const report = reportOrThrow({ package: {}, entries })
          const paths = entries.map((item) => item.path)
          const wasted = new Set(report.wastedFiles.map((file) => file.path))
          const total = entries.reduce((sum, item) => sum + item.size, 0)
          const roleSum = report.wasteByRole.reduce((sum, [, bytes]) => sum + bytes, 0)
          expect(report.totalBytes).toBe(total)
          expect(report.keepBytes + report.wasteBytes).toBe(total)
          expect(roleSum).toBe(report.wasteBytes)
          expect(report.keepFiles + report.wasteFiles).toBe(entries.length)
          expect(selectIncluded(report.patterns, paths)).toEqual(paths.filter((path) => !wasted.has(path)))
        })
      )
    }))
})
