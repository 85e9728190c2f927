import * as Either from "effect/Either"

import { mergeExtensionInfo } from "./aggregate.js"
import type { ReportInvariantViolation } from "./errors.js"
import { reportInvariantViolation } from "./errors.js"
import { renderPattern } from "./glob.js"
import { compareCodeUnits } from "./package-path.js"
import type {
  ClassifiedEntry,
  CollectionSummary,
  ExtensionInfo,
  GlobPattern,
  PackageMetadata,
  Report,
  Role,
  RoleTotals,
  SuggestedFix,
  WastedFile,
  WasteRole
} from "./types.js"
import { roles, wasteRoles } from "./types.js"

// CHANGE: assemble the immutable waste report and render it as JSON
// WHY: the report is the only artifact handed to presentation collaborators
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: r.totalBytes = r.keepBytes + r.wasteBytes ∧ r.wasteBytes = Σ r.wasteByRole
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: equal inputs render byte-identical JSON
// COMPLEXITY: O(n log n)

export interface ReportInput {
  readonly metadata: PackageMetadata
  readonly totals: RoleTotals
  readonly infoByExtension: ReadonlyMap<string, ExtensionInfo>
  readonly keep: ReadonlyArray<ClassifiedEntry>
  readonly waste: ReadonlyArray<ClassifiedEntry>
  readonly patterns: ReadonlyArray<GlobPattern>
}

const sumSizes = (entries: ReadonlyArray<ClassifiedEntry>): number => {
  let total = 0
  for (const entry of entries) {
    total += entry.size
  }
  return total
}

const sumRoles = (totals: RoleTotals, selected: ReadonlyArray<Role>): { bytes: number; files: number } => {
  let bytes = 0
  let files = 0
  for (const role of selected) {
    bytes += totals[role].bytes
    files += totals[role].files
  }
  return { bytes, files }
}

const isWasteRole = (role: Role): role is WasteRole => role !== "Essential"

const toWastedFiles = (waste: ReadonlyArray<ClassifiedEntry>): ReadonlyArray<WastedFile> => {
  const result: Array<WastedFile> = []
  for (const entry of waste) {
    if (isWasteRole(entry.role)) {
      result.push({ path: entry.path, size: entry.size, role: entry.role })
    }
  }
  return result
}

const sortExtensions = (
  info: ReadonlyMap<string, ExtensionInfo>
): ReadonlyArray<readonly [string, ExtensionInfo]> =>
  [...info.entries()].toSorted(([left], [right]) => compareCodeUnits(left, right))

const wasteByRoleOf = (totals: RoleTotals): ReadonlyArray<readonly [WasteRole, number]> =>
  wasteRoles
    .filter((role) => totals[role].bytes > 0)
    .map((role) => [role, totals[role].bytes] as const)

/**
 * Choose how the synthesized include list should replace the declared manifest patterns.
 *
 * @param metadata - Declared include/exclude lists.
 * @param patterns - Synthesized patterns.
 * @param wasteFiles - Number of wasted files.
 * @returns null when nothing is wasted.
 *
 * @pure true
 * @complexity O(k)
 */
export const suggestFix = (
  metadata: PackageMetadata,
  patterns: ReadonlyArray<GlobPattern>,
  wasteFiles: number
): SuggestedFix | null => {
  if (wasteFiles === 0) {
    return null
  }
  const previousInclude = metadata.include ?? []
  const previousExclude = metadata.exclude ?? []
  const include = patterns.map((pattern) => renderPattern(pattern))
  if (previousInclude.length > 0) {
    return { kind: "ImprovedInclude", include, previousInclude, previousExclude }
  }
  if (previousExclude.length > 0) {
    return { kind: "RemoveExcludeAndUseInclude", include, previousInclude, previousExclude }
  }
  return { kind: "NewInclude", include, previousInclude, previousExclude }
}

const checkInvariant = (
  holds: boolean,
  message: string
): Either.Either<void, ReportInvariantViolation> =>
  holds ? Either.right(undefined) : Either.left(reportInvariantViolation(message))

/**
 * Build a Report from aggregation results and synthesized patterns.
 *
 * @param input - Totals, keep/waste partition, extension info and patterns.
 * @returns Report or ReportInvariantViolation when the byte accounting disagrees.
 *
 * @pure true
 * @invariant totalBytes = keepBytes + wasteBytes
 * @complexity O(n log n)
 */
export const buildReport = (input: ReportInput): Either.Either<Report, ReportInvariantViolation> => {
  const all = sumRoles(input.totals, roles)
  const wasted = sumRoles(input.totals, wasteRoles)
  const keepBytes = sumSizes(input.keep)
  const wasteBytes = sumSizes(input.waste)
  const wasteByRole = wasteByRoleOf(input.totals)
  const wasteByRoleSum = wasteByRole.reduce((total, [, bytes]) => total + bytes, 0)
  const checks = [
    checkInvariant(
      keepBytes === input.totals.Essential.bytes && input.keep.length === input.totals.Essential.files,
      `keep bytes ${keepBytes} differ from essential total ${input.totals.Essential.bytes}`
    ),
    checkInvariant(
      wasteBytes === wasted.bytes && input.waste.length === wasted.files,
      `waste bytes ${wasteBytes} differ from non-essential totals ${wasted.bytes}`
    ),
    checkInvariant(
      wasteBytes === all.bytes - keepBytes,
      `waste bytes ${wasteBytes} differ from total ${all.bytes} minus keep ${keepBytes}`
    ),
    checkInvariant(
      wasteByRoleSum === wasteBytes,
      `waste by role sums to ${wasteByRoleSum}, expected ${wasteBytes}`
    )
  ]
  for (const check of checks) {
    if (Either.isLeft(check)) {
      return Either.left(check.left)
    }
  }
  const wasteFiles = input.waste.length
  return Either.right({
    packageName: input.metadata.name,
    packageVersion: input.metadata.version,
    totalBytes: all.bytes,
    keepBytes,
    wasteBytes,
    totalFiles: all.files,
    keepFiles: input.keep.length,
    wasteFiles,
    wasteByRole,
    infoByExtension: sortExtensions(input.infoByExtension),
    wastedFiles: toWastedFiles(input.waste),
    patterns: input.patterns,
    suggestedFix: suggestFix(input.metadata, input.patterns, wasteFiles)
  })
}

const mergeRoleBytes = (
  left: ReadonlyArray<readonly [WasteRole, number]>,
  right: ReadonlyArray<readonly [WasteRole, number]>
): ReadonlyArray<readonly [WasteRole, number]> => {
  const merged = new Map<WasteRole, number>(left)
  for (const [role, bytes] of right) {
    merged.set(role, (merged.get(role) ?? 0) + bytes)
  }
  return wasteRoles.flatMap((role): ReadonlyArray<readonly [WasteRole, number]> => {
    const bytes = merged.get(role)
    return bytes === undefined ? [] : [[role, bytes] as const]
  })
}

const mergeExtensions = (
  left: ReadonlyArray<readonly [string, ExtensionInfo]>,
  right: ReadonlyArray<readonly [string, ExtensionInfo]>
): ReadonlyArray<readonly [string, ExtensionInfo]> => sortExtensions(mergeExtensionInfo(new Map(left), new Map(right)))

export const emptySummary: CollectionSummary = {
  packages: 0,
  totalBytes: 0,
  keepBytes: 0,
  wasteBytes: 0,
  totalFiles: 0,
  wasteFiles: 0,
  wasteByRole: [],
  infoByExtension: []
}

/**
 * Fold a report into a collection summary.
 *
 * @pure true
 * @invariant totals are additive
 * @complexity O(r + e)
 */
export const addToSummary = (summary: CollectionSummary, report: Report): CollectionSummary => ({
  packages: summary.packages + 1,
  totalBytes: summary.totalBytes + report.totalBytes,
  keepBytes: summary.keepBytes + report.keepBytes,
  wasteBytes: summary.wasteBytes + report.wasteBytes,
  totalFiles: summary.totalFiles + report.totalFiles,
  wasteFiles: summary.wasteFiles + report.wasteFiles,
  wasteByRole: mergeRoleBytes(summary.wasteByRole, report.wasteByRole),
  infoByExtension: mergeExtensions(summary.infoByExtension, report.infoByExtension)
})

export const summarizeReports = (reports: ReadonlyArray<Report>): CollectionSummary => {
  let summary = emptySummary
  for (const report of reports) {
    summary = addToSummary(summary, report)
  }
  return summary
}

interface SuggestedFixJson {
  readonly kind: SuggestedFix["kind"]
  readonly include: ReadonlyArray<string>
  readonly previous_include: ReadonlyArray<string>
  readonly previous_exclude: ReadonlyArray<string>
}

const extensionsToJson = (
  info: ReadonlyArray<readonly [string, ExtensionInfo]>
): Record<string, { total_bytes: number; total_files: number }> =>
  Object.fromEntries(
    info.map(([extension, value]) => [extension, { total_bytes: value.totalBytes, total_files: value.totalFiles }])
  )

const fixToJson = (fix: SuggestedFix | null): SuggestedFixJson | null =>
  fix === null ? null : {
    kind: fix.kind,
    include: fix.include,
    previous_include: fix.previousInclude,
    previous_exclude: fix.previousExclude
  }

/**
 * Render report as JSON text.
 *
 * @param report - Report data.
 * @returns JSON string with snake_case field names.
 *
 * @pure true
 * @invariant patterns keep their synthesized order
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      package: {
        name: report.packageName ?? null,
        version: report.packageVersion ?? null
      },
      total_bytes: report.totalBytes,
      keep_bytes: report.keepBytes,
      waste_bytes: report.wasteBytes,
      total_files: report.totalFiles,
      keep_files: report.keepFiles,
      waste_files: report.wasteFiles,
      waste_by_role: Object.fromEntries(report.wasteByRole),
      info_by_extension: extensionsToJson(report.infoByExtension),
      wasted_files: report.wastedFiles,
      patterns: report.patterns.map((pattern) => renderPattern(pattern)),
      suggested_fix: fixToJson(report.suggestedFix)
    },
    null,
    2
  )

export const renderJsonSummary = (summary: CollectionSummary): string =>
  JSON.stringify(
    {
      packages: summary.packages,
      total_bytes: summary.totalBytes,
      keep_bytes: summary.keepBytes,
      waste_bytes: summary.wasteBytes,
      total_files: summary.totalFiles,
      waste_files: summary.wasteFiles,
      waste_by_role: Object.fromEntries(summary.wasteByRole),
      info_by_extension: extensionsToJson(summary.infoByExtension)
    },
    null,
    2
  )
