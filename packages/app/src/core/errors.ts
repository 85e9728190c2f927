import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the waste report core and its shell
// WHY: provide typed failures for program flow and exit codes
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type MalformedReason =
  | "negative-size"
  | "invalid-size"
  | "duplicate-path"
  | "path-escapes-root"
  | "empty-path"
  | "path-conflict"

export type MalformedInput = {
  readonly _tag: "MalformedInput"
  readonly reason: MalformedReason
  readonly path: string
  readonly message: string
}
export type PatternSynthesisInvariantViolation = {
  readonly _tag: "PatternSynthesisInvariantViolation"
  readonly missing: ReadonlyArray<string>
  readonly unexpected: ReadonlyArray<string>
  readonly message: string
}
export type ReportInvariantViolation = {
  readonly _tag: "ReportInvariantViolation"
  readonly message: string
}
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ListingError = { readonly _tag: "ListingError"; readonly file: string; readonly error: string }
export type DirectoryNotFound = { readonly _tag: "DirectoryNotFound"; readonly path: string }

export type AppError =
  | CliError
  | MalformedInput
  | PatternSynthesisInvariantViolation
  | ReportInvariantViolation
  | ConfigError
  | FileError
  | ListingError
  | DirectoryNotFound

const describeReason = (reason: MalformedReason): string =>
  Match.value(reason).pipe(
    Match.when("negative-size", () => "size must not be negative"),
    Match.when("invalid-size", () => "size must be a non-negative integer"),
    Match.when("duplicate-path", () => "path is listed more than once"),
    Match.when("path-escapes-root", () => "path escapes the package root"),
    Match.when("empty-path", () => "path is empty"),
    Match.when("path-conflict", () => "path lies below another listed file"),
    Match.exhaustive
  )

export const malformedInput = (reason: MalformedReason, path: string): MalformedInput => ({
  _tag: "MalformedInput",
  reason,
  path,
  message: `${describeReason(reason)}: ${JSON.stringify(path)}`
})

export const patternSynthesisInvariantViolation = (
  missing: ReadonlyArray<string>,
  unexpected: ReadonlyArray<string>
): PatternSynthesisInvariantViolation => ({
  _tag: "PatternSynthesisInvariantViolation",
  missing,
  unexpected,
  message: `synthesized patterns do not reproduce the keep set ` +
    `(missing: ${missing.length}, unexpected: ${unexpected.length})`
})

export const reportInvariantViolation = (message: string): ReportInvariantViolation => ({
  _tag: "ReportInvariantViolation",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const listingError = (file: string, error: string): ListingError => ({
  _tag: "ListingError",
  file,
  error
})

export const directoryNotFound = (path: string): DirectoryNotFound => ({
  _tag: "DirectoryNotFound",
  path
})

/**
 * Render any application error as a single diagnostic line.
 *
 * @pure true
 * @invariant output starts with the error tag
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `CliError: ${value.message}`),
    Match.tag("MalformedInput", (value) => `MalformedInput: ${value.message}`),
    Match.tag("PatternSynthesisInvariantViolation", (value) => `PatternSynthesisInvariantViolation: ${value.message}`),
    Match.tag("ReportInvariantViolation", (value) => `ReportInvariantViolation: ${value.message}`),
    Match.tag("ConfigError", (value) => `ConfigError: ${value.message}`),
    Match.tag("FileError", (value) => `FileError: ${value.message}`),
    Match.tag("ListingError", (value) => `ListingError: ${value.file}: ${value.error}`),
    Match.tag("DirectoryNotFound", (value) => `DirectoryNotFound: ${value.path}`),
    Match.exhaustive
  )
