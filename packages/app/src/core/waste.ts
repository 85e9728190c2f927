import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import { aggregate } from "./aggregate.js"
import type { ConventionSettings } from "./conventions.js"
import { buildConventions } from "./conventions.js"
import type { MalformedInput, PatternSynthesisInvariantViolation, ReportInvariantViolation } from "./errors.js"
import { buildReport } from "./report.js"
import { synthesize } from "./synthesize.js"
import type { Listing, Report } from "./types.js"

// CHANGE: wire classifier, aggregator, synthesizer and report model into one pure pipeline
// WHY: the shell needs a single entry point from an enumerated listing to a Report
// REF: req-waste-pipeline-1
// SOURCE: n/a
// FORMAT THEOREM: ∀l: compute(l) = Right(r) → selectIncluded(r.patterns, paths(l)) = keep(l)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the computation is total and deterministic for fixed inputs
// COMPLEXITY: O(n * d + n * k)

export type WasteError = MalformedInput | PatternSynthesisInvariantViolation | ReportInvariantViolation

/**
 * Compute the waste report of one package listing.
 *
 * @param listing - Package metadata and enumerated entries.
 * @param settings - Classifier convention settings.
 * @returns Report, or the first error raised by aggregation, synthesis or report assembly.
 *
 * @pure true
 * @invariant empty listings yield a zero report with no patterns
 * @complexity O(n * d + n * k)
 */
export const computeWasteReport = (
  listing: Listing,
  settings: ConventionSettings
): Either.Either<Report, WasteError> => {
  const conventions = buildConventions(settings, listing.package)
  return pipe(
    aggregate(listing.entries, conventions),
    Either.flatMap((aggregation) => {
      const keep = aggregation.keep.map((entry) => entry.path)
      const allPaths = [...keep, ...aggregation.waste.map((entry) => entry.path)]
      return Either.map(synthesize(keep, allPaths), (patterns) => ({ aggregation, patterns }))
    }),
    Either.flatMap(({ aggregation, patterns }) =>
      buildReport({
        metadata: listing.package,
        totals: aggregation.totals,
        infoByExtension: aggregation.infoByExtension,
        keep: aggregation.keep,
        waste: aggregation.waste,
        patterns
      })
    )
  )
}
