import * as Either from "effect/Either"

import type { MalformedInput } from "./errors.js"
import { malformedInput } from "./errors.js"
import type { PackagePath } from "./types.js"

// CHANGE: centralize package path normalization rules
// WHY: classifier, aggregator and synthesizer must agree on one spelling per file
// REF: req-package-path-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: normalize(p) = Right(q) → q is relative ∧ q has no ".", ".." or empty segments
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a normalized path never leaves the package root; whitespace is part of the name
// COMPLEXITY: O(n)/O(n)

const normalizeSlashes = (value: string): string => value.replaceAll("\\", "/")

const isAbsolutePath = (value: string): boolean => {
  if (value.startsWith("/")) {
    return true
  }
  const windowsDrive = /^[a-zA-Z]:\//u
  return windowsDrive.test(value)
}

/**
 * Normalize a raw relative path into a PackagePath.
 *
 * @param raw - Path as reported by the enumerator.
 * @returns Normalized path or MalformedInput when it is empty, absolute or escapes the root.
 *
 * @pure true
 * @invariant result segments are non-empty and never "." or ".."
 * @complexity O(n)
 */
export const normalizePackagePath = (raw: string): Either.Either<PackagePath, MalformedInput> => {
  const slashed = normalizeSlashes(raw)
  if (slashed.length === 0) {
    return Either.left(malformedInput("empty-path", raw))
  }
  if (isAbsolutePath(slashed)) {
    return Either.left(malformedInput("path-escapes-root", raw))
  }
  const segments: Array<string> = []
  for (const segment of slashed.split("/")) {
    if (segment === "" || segment === ".") {
      continue
    }
    if (segment === "..") {
      if (segments.length === 0) {
        return Either.left(malformedInput("path-escapes-root", raw))
      }
      segments.pop()
      continue
    }
    segments.push(segment)
  }
  if (segments.length === 0) {
    return Either.left(malformedInput("empty-path", raw))
  }
  return Either.right(segments.join("/"))
}

const pathSegments = (path: PackagePath): ReadonlyArray<string> => path.split("/")

export const baseName = (path: PackagePath): string => {
  const index = path.lastIndexOf("/")
  return index === -1 ? path : path.slice(index + 1)
}

/**
 * Lower-cased extension of the basename, without the dot.
 *
 * @returns undefined for dot files without a second dot and for names without any dot.
 *
 * @pure true
 * @complexity O(n)
 */
export const extensionOf = (path: PackagePath): string | undefined => {
  const name = baseName(path)
  const index = name.lastIndexOf(".")
  if (index <= 0 || index === name.length - 1) {
    return undefined
  }
  return name.slice(index + 1).toLowerCase()
}

/** Text before the first dot of the basename; the whole name for dot files. */
export const stemOf = (path: PackagePath): string => {
  const name = baseName(path)
  const index = name.indexOf(".", 1)
  return index === -1 ? name : name.slice(0, index)
}

export const directorySegments = (path: PackagePath): ReadonlyArray<string> => pathSegments(path).slice(0, -1)

export const compareCodeUnits = (left: string, right: string): number => {
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}
