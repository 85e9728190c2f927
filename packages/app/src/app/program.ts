import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"
import * as Logger from "effect/Logger"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { resolveConfig } from "../core/config.js"
import type { ConventionSettings } from "../core/conventions.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { renderJsonReport, renderJsonSummary, summarizeReports } from "../core/report.js"
import type { CollectionSummary, Listing, Report } from "../core/types.js"
import { computeWasteReport } from "../core/waste.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readListing } from "../shell/listing.js"
import { levelFor } from "../shell/logger.js"
import { scanDirectory } from "../shell/scan.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0, 2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export type ProgramOutput =
  | { readonly _tag: "Report"; readonly report: Report }
  | { readonly _tag: "Summary"; readonly summary: CollectionSummary }

export interface ProgramResult {
  readonly output: ProgramOutput
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emit = (
  cli: CliArgs,
  payload: string
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (cli.outPath !== undefined) {
      const fs = yield* _(FileSystem)
      yield* _(
        fs.writeFileString(cli.outPath, `${payload}\n`).pipe(Effect.mapError((error) => fileError(String(error))))
      )
      yield* _(Effect.logDebug(`wrote ${cli.outPath}`))
      return
    }
    if (cli.silent) {
      return
    }
    yield* _(writeStdout(payload))
  })

const exitCodeFor = (cli: CliArgs, wasteBytes: number): number => cli.failOnWaste && wasteBytes > 0 ? 2 : 0

const loadSettings = (cli: CliArgs): Effect.Effect<ConventionSettings, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    return resolveConfig(cli, fileConfig)
  })

const reportFor = (
  listing: Listing,
  settings: ConventionSettings,
  label: string
): Effect.Effect<Report, AppError> =>
  Effect.gen(function*(_) {
    const report = yield* _(fromEither(computeWasteReport(listing, settings)))
    yield* _(
      Effect.logInfo(
        `${label}: ${report.wasteBytes} of ${report.totalBytes} bytes wasted in ${report.wasteFiles} files`
      )
    )
    return report
  })

const handleReport = (
  cli: CliArgs,
  settings: ConventionSettings
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const source = cli.source
    const listing = yield* _(
      source._tag === "Directory" ? scanDirectory(source.path) : readListing(source.paths[0] ?? "")
    )
    const label = source._tag === "Directory" ? source.path : source.paths[0] ?? ""
    const report = yield* _(reportFor(listing, settings, label))
    yield* _(emit(cli, renderJsonReport(report)))
    const output: ProgramOutput = { _tag: "Report", report }
    return { output, exitCode: exitCodeFor(cli, report.wasteBytes) }
  })

const handleSummary = (
  cli: CliArgs,
  settings: ConventionSettings
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const paths = cli.source._tag === "Listing" ? cli.source.paths : []
    const reports = yield* _(
      Effect.forEach(
        paths,
        (path) => Effect.flatMap(readListing(path), (listing) => reportFor(listing, settings, path)),
        { concurrency: 1 }
      )
    )
    const summary = summarizeReports(reports)
    yield* _(emit(cli, renderJsonSummary(summary)))
    const output: ProgramOutput = { _tag: "Summary", summary }
    return { output, exitCode: exitCodeFor(cli, summary.wasteBytes) }
  })

const executeCommand = (
  cli: CliArgs,
  settings: ConventionSettings
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("report", () => handleReport(cli, settings)),
    Match.when("summary", () => handleSummary(cli, settings)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the report or summary and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = Effect.gen(function*(_) {
      const settings = yield* _(loadSettings(cli))
      yield* _(Effect.logDebug(`source root ${settings.sourceRoot}`))
      return yield* _(executeCommand(cli, settings))
    })
    return yield* _(program.pipe(Logger.withMinimumLogLevel(levelFor(cli))))
  })
