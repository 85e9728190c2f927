import type { PlatformError } from "@effect/platform/Error"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { directoryNotFound, fileError } from "../core/errors.js"
import { compareCodeUnits, extensionOf } from "../core/package-path.js"
import type { ContentKind, Listing, RawFileEntry } from "../core/types.js"

// CHANGE: enumerate an unpacked package directory into a listing
// WHY: allow reports on a checked-out crate without an external enumerator
// REF: req-scan-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ files(dir): ∃e ∈ listing.entries: e.path = relative(dir, f) ∧ e.size = size(f)
// PURITY: SHELL
// EFFECT: Effect<Listing, AppError, FileSystem | Path>
// INVARIANT: entries are sorted by path; only the first block of extensionless files is read
// COMPLEXITY: O(n) stats + at most 8000 bytes read per extensionless file

const sniffLength = 8000

const normalizePath = (value: string): string => value.replaceAll("\\", "/")

const mapFsError = (error: PlatformError): AppError => fileError(String(error))

/**
 * Guess whether bytes are text or binary: a NUL byte in the first block means binary.
 *
 * @pure true
 * @complexity O(min(n, 8000))
 */
export const sniffContentKind = (bytes: Uint8Array): ContentKind => {
  const limit = Math.min(bytes.length, sniffLength)
  for (let index = 0; index < limit; index += 1) {
    if (bytes[index] === 0) {
      return "binary"
    }
  }
  return "text"
}

const ensureDirectoryExists = (
  fs: FileSystemService,
  dirPath: string
): Effect.Effect<void, AppError> =>
  Effect.gen(function*(_) {
    const exists = yield* _(fs.exists(dirPath).pipe(Effect.mapError(mapFsError)))
    if (!exists) {
      return yield* _(Effect.fail(directoryNotFound(dirPath)))
    }
  })

const readHead = (
  fs: FileSystemService,
  absolute: string,
  length: number
): Effect.Effect<Uint8Array, AppError> =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const buffer = new Uint8Array(length)
      if (length === 0) {
        return buffer
      }
      const file = yield* _(fs.open(absolute, { flag: "r" }))
      const bytesRead = yield* _(file.read(buffer))
      return buffer.subarray(0, Number(bytesRead))
    })
  ).pipe(Effect.mapError(mapFsError))

const readEntry = (
  fs: FileSystemService,
  path: PathService,
  dirPath: string,
  relative: string
): Effect.Effect<RawFileEntry | undefined, AppError> =>
  Effect.gen(function*(_) {
    const absolute = path.join(dirPath, relative)
    const info = yield* _(fs.stat(absolute).pipe(Effect.mapError(mapFsError)))
    if (info.type !== "File") {
      return undefined
    }
    const packagePath = normalizePath(relative)
    const size = Number(info.size)
    if (extensionOf(packagePath) !== undefined) {
      return { path: packagePath, size }
    }
    const bytes = yield* _(readHead(fs, absolute, Math.min(size, sniffLength)))
    return { path: packagePath, size, hint: sniffContentKind(bytes) }
  })

/**
 * Enumerate every regular file below a directory.
 *
 * @param dirPath - Root of the unpacked package.
 * @returns Listing with empty package metadata.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant entry paths are relative to dirPath and slash-normalized
 * @complexity O(n log n)
 */
export const scanDirectory = (
  dirPath: string
): Effect.Effect<Listing, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)

    yield* _(ensureDirectoryExists(fs, dirPath))
    const relatives = yield* _(
      fs.readDirectory(dirPath, { recursive: true }).pipe(Effect.mapError(mapFsError))
    )
    const sorted = relatives.toSorted((left, right) => compareCodeUnits(normalizePath(left), normalizePath(right)))
    const entries = yield* _(
      Effect.forEach(sorted, (relative) => readEntry(fs, path, dirPath, relative), { concurrency: 1 })
    )
    const files = entries.filter((entry): entry is RawFileEntry => entry !== undefined)
    yield* _(Effect.logDebug(`enumerated ${files.length} files below ${dirPath}`))
    return { package: {}, entries: files }
  })
