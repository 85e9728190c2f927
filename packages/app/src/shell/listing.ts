import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { AppError } from "../core/errors.js"
import { fileError, listingError } from "../core/errors.js"
import type { Listing } from "../core/types.js"

// CHANGE: read enumerated package listings with schema validation
// WHY: the enumerator hands over paths, sizes and manifest facts as JSON
// REF: req-listing-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f: read(f) = Right(l) → ∀e ∈ l.entries: typeof e.size = "number"
// PURITY: SHELL
// EFFECT: Effect<Listing, AppError, FileSystem>
// INVARIANT: JSON is validated before use; sizes are checked later by the aggregator
// COMPLEXITY: O(n)

const ContentKindSchema = Schema.Literal("source", "text", "binary")

const EntrySchema = Schema.Struct({
  path: Schema.String,
  size: Schema.Number,
  hint: Schema.optional(ContentKindSchema)
})

const MetadataSchema = Schema.Struct({
  name: Schema.optional(Schema.String),
  version: Schema.optional(Schema.String),
  include: Schema.optional(Schema.Array(Schema.String)),
  exclude: Schema.optional(Schema.Array(Schema.String)),
  build: Schema.optional(Schema.String),
  targets: Schema.optional(Schema.Array(Schema.String))
})

const ListingSchema = Schema.Struct({
  package: Schema.optional(MetadataSchema),
  entries: Schema.Array(EntrySchema)
})

const ListingParseSchema = Schema.parseJson(ListingSchema)

/**
 * Decode listing JSON text.
 *
 * @param file - Source name used in diagnostics.
 * @param raw - JSON text.
 * @returns Listing with an empty metadata object when "package" is absent.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeListing = (file: string, raw: string): Effect.Effect<Listing, AppError> =>
  pipe(
    Schema.decodeUnknown(ListingParseSchema)(raw),
    Effect.map((decoded): Listing => ({
      package: decoded.package ?? {},
      entries: decoded.entries
    })),
    Effect.mapError((error) => listingError(file, TreeFormatter.formatErrorSync(error)))
  )

export const readListing = (
  path: string
): Effect.Effect<Listing, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const listing = yield* _(decodeListing(path, raw))
    yield* _(Effect.logDebug(`read ${listing.entries.length} entries from ${path}`))
    return listing
  })
