import * as Either from "effect/Either"

import { classify } from "./classify.js"
import type { Conventions } from "./conventions.js"
import type { MalformedInput } from "./errors.js"
import { malformedInput } from "./errors.js"
import { directorySegments, extensionOf, normalizePackagePath } from "./package-path.js"
import type {
  ByteCount,
  ClassifiedEntry,
  ExtensionInfo,
  FileEntry,
  PackagePath,
  RawFileEntry,
  Role,
  RoleTotals
} from "./types.js"

// CHANGE: aggregate classified entries into role totals and a keep/waste partition
// WHY: waste bytes per role and the keep set feed both the report and pattern synthesis
// REF: req-aggregate-1
// SOURCE: n/a
// FORMAT THEOREM: ∀xs: keep(agg(xs)) ∪ waste(agg(xs)) = xs ∧ keep ∩ waste = ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: keep and waste preserve input enumeration order; totals are additive
// COMPLEXITY: O(n) where n = number of entries

export const noExtension = "(none)"

export interface Aggregation {
  readonly totals: RoleTotals
  readonly infoByExtension: ReadonlyMap<string, ExtensionInfo>
  readonly keep: ReadonlyArray<ClassifiedEntry>
  readonly waste: ReadonlyArray<ClassifiedEntry>
}

const zero: ByteCount = { bytes: 0, files: 0 }

export const emptyTotals: RoleTotals = {
  Essential: zero,
  Test: zero,
  Example: zero,
  Documentation: zero,
  Metadata: zero,
  Other: zero
}

const addCount = (left: ByteCount, right: ByteCount): ByteCount => ({
  bytes: left.bytes + right.bytes,
  files: left.files + right.files
})

export const mergeTotals = (left: RoleTotals, right: RoleTotals): RoleTotals => ({
  Essential: addCount(left.Essential, right.Essential),
  Test: addCount(left.Test, right.Test),
  Example: addCount(left.Example, right.Example),
  Documentation: addCount(left.Documentation, right.Documentation),
  Metadata: addCount(left.Metadata, right.Metadata),
  Other: addCount(left.Other, right.Other)
})

/**
 * Merge per-extension statistics, keeping first-seen key order.
 *
 * @pure true
 * @complexity O(n + m)
 */
export const mergeExtensionInfo = (
  left: ReadonlyMap<string, ExtensionInfo>,
  right: ReadonlyMap<string, ExtensionInfo>
): ReadonlyMap<string, ExtensionInfo> => {
  const merged = new Map<string, ExtensionInfo>(left)
  for (const [extension, info] of right) {
    const current = merged.get(extension)
    merged.set(
      extension,
      current === undefined ? info : {
        totalBytes: current.totalBytes + info.totalBytes,
        totalFiles: current.totalFiles + info.totalFiles
      }
    )
  }
  return merged
}

/**
 * Merge two aggregations; left entries precede right entries.
 *
 * @param left - Aggregation of the earlier chunk.
 * @param right - Aggregation of the later chunk.
 * @returns Combined aggregation.
 *
 * @pure true
 * @invariant totals are additive and path order is left ++ right
 * @complexity O(n + m)
 */
export const mergeAggregations = (left: Aggregation, right: Aggregation): Aggregation => ({
  totals: mergeTotals(left.totals, right.totals),
  infoByExtension: mergeExtensionInfo(left.infoByExtension, right.infoByExtension),
  keep: [...left.keep, ...right.keep],
  waste: [...left.waste, ...right.waste]
})

const directoryPrefixes = (path: PackagePath): ReadonlyArray<PackagePath> => {
  const segments = directorySegments(path)
  return segments.map((_, index) => segments.slice(0, index + 1).join("/"))
}

const validateSize = (entry: RawFileEntry): Either.Either<number, MalformedInput> => {
  if (!Number.isFinite(entry.size) || !Number.isInteger(entry.size)) {
    return Either.left(malformedInput("invalid-size", entry.path))
  }
  if (entry.size < 0) {
    return Either.left(malformedInput("negative-size", entry.path))
  }
  if (!Number.isSafeInteger(entry.size)) {
    return Either.left(malformedInput("invalid-size", entry.path))
  }
  return Either.right(entry.size)
}

/**
 * Validate raw entries: sizes, path normalization, uniqueness, and no path used as both file and directory.
 *
 * @param entries - Raw entries in enumeration order.
 * @returns Normalized entries or the first MalformedInput encountered.
 *
 * @pure true
 * @invariant result paths are unique and normalized
 * @complexity O(n)
 */
export const validateEntries = (
  entries: ReadonlyArray<RawFileEntry>
): Either.Either<ReadonlyArray<FileEntry>, MalformedInput> => {
  const seen = new Set<PackagePath>()
  const result: Array<FileEntry> = []
  for (const entry of entries) {
    const size = validateSize(entry)
    if (Either.isLeft(size)) {
      return Either.left(size.left)
    }
    const path = normalizePackagePath(entry.path)
    if (Either.isLeft(path)) {
      return Either.left(path.left)
    }
    if (seen.has(path.right)) {
      return Either.left(malformedInput("duplicate-path", path.right))
    }
    seen.add(path.right)
    result.push({ path: path.right, size: size.right, hint: entry.hint })
  }
  const conflict = result.find((entry) => directoryPrefixes(entry.path).some((prefix) => seen.has(prefix)))
  if (conflict !== undefined) {
    return Either.left(malformedInput("path-conflict", conflict.path))
  }
  return Either.right(result)
}

const addToRole = (totals: Record<Role, ByteCount>, role: Role, size: number): void => {
  totals[role] = addCount(totals[role], { bytes: size, files: 1 })
}

/**
 * Classify validated entries and accumulate totals and the keep/waste partition.
 *
 * @param entries - Validated entries.
 * @param conventions - Classifier conventions.
 * @returns Aggregation with keep = Essential entries and waste = the rest.
 *
 * @pure true
 * @invariant keep.length + waste.length = entries.length
 * @complexity O(n)
 */
export const aggregateValidated = (
  entries: ReadonlyArray<FileEntry>,
  conventions: Conventions
): Aggregation => {
  const totals: Record<Role, ByteCount> = { ...emptyTotals }
  const infoByExtension = new Map<string, ExtensionInfo>()
  const keep: Array<ClassifiedEntry> = []
  const waste: Array<ClassifiedEntry> = []
  for (const entry of entries) {
    const role = classify(entry.path, entry.hint, conventions)
    const classified: ClassifiedEntry = { ...entry, role }
    addToRole(totals, role, entry.size)
    const extension = extensionOf(entry.path) ?? noExtension
    const current = infoByExtension.get(extension)
    infoByExtension.set(extension, {
      totalBytes: (current?.totalBytes ?? 0) + entry.size,
      totalFiles: (current?.totalFiles ?? 0) + 1
    })
    if (role === "Essential") {
      keep.push(classified)
    } else {
      waste.push(classified)
    }
  }
  return { totals, infoByExtension, keep, waste }
}

/**
 * Validate, classify and aggregate raw entries.
 *
 * @param entries - Raw entries in enumeration order.
 * @param conventions - Classifier conventions.
 * @returns Aggregation or MalformedInput; aggregation halts on the first bad entry.
 *
 * @pure true
 * @invariant Σ totals.bytes = Σ entry.size
 * @complexity O(n)
 */
export const aggregate = (
  entries: ReadonlyArray<RawFileEntry>,
  conventions: Conventions
): Either.Either<Aggregation, MalformedInput> =>
  Either.map(validateEntries(entries), (validated) => aggregateValidated(validated, conventions))
