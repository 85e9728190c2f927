import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { scanDirectory, sniffContentKind } from "../../src/shell/scan.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("sniffContentKind", () => {
  it.effect("flags a NUL byte as binary", () =>
    Effect.sync(() => {
      expect(sniffContentKind(new Uint8Array([35, 33, 47, 98]))).toBe("text")
      expect(sniffContentKind(new Uint8Array([127, 69, 0, 70]))).toBe("binary")
      expect(sniffContentKind(new Uint8Array([]))).toBe("text")
    }))

  it.effect("looks only at the first block", () =>
    Effect.sync(() => {
      const bytes = new Uint8Array(9000).fill(65)
      bytes[8500] = 0
      expect(sniffContentKind(bytes)).toBe("text")
    }))
})

describe("scanDirectory", () => {
  it.effect("lists regular files with sizes in path order", () =>
    provideNodeContext(
      withTempDir(({ fs, path, tempDir }) =>
        Effect.gen(function*(_) {
          yield* _(fs.makeDirectory(path.join(tempDir, "src", "bin"), { recursive: true }))
          yield* _(fs.writeFileString(path.join(tempDir, "README.md"), "# demo\n"))
          yield* _(fs.writeFileString(path.join(tempDir, "Cargo.toml"), "[package]\n"))
          yield* _(fs.writeFileString(path.join(tempDir, "src", "lib.rs"), "pub fn a() {}\n"))
          yield* _(fs.writeFileString(path.join(tempDir, "src", "bin", "run"), "#!/bin/sh\n"))
          yield* _(fs.writeFile(path.join(tempDir, "src", "blob"), new Uint8Array([0, 1, 2])))

          const listing = yield* _(scanDirectory(tempDir))

          expect(listing).toEqual({
            package: {},
            entries: [
              { path: "Cargo.toml", size: 10 },
              { path: "README.md", size: 7 },
              { path: "src/bin/run", size: 10, hint: "text" },
              { path: "src/blob", size: 3, hint: "binary" },
              { path: "src/lib.rs", size: 14 }
            ]
          })
        })
      )
    ))

  it.effect("sniffs only the head of large extensionless files", () =>
    provideNodeContext(
      withTempDir(({ fs, path, tempDir }) =>
        Effect.gen(function*(_) {
          const late = new Uint8Array(20_000).fill(65)
          late[12_000] = 0
          const early = new Uint8Array(20_000).fill(65)
          early[100] = 0
          yield* _(fs.writeFile(path.join(tempDir, "late"), late))
          yield* _(fs.writeFile(path.join(tempDir, "early"), early))
          yield* _(fs.writeFile(path.join(tempDir, "empty"), new Uint8Array([])))

          const listing = yield* _(scanDirectory(tempDir))

          expect(listing.entries).toEqual([
            { path: "early", size: 20_000, hint: "binary" },
            { path: "empty", size: 0, hint: "text" },
            { path: "late", size: 20_000, hint: "text" }
          ])
        })
      )
    ))

  it.effect("fails when the directory does not exist", () =>
    provideNodeContext(
      withTempDir(({ path, tempDir }) =>
        Effect.gen(function*(_) {
          const missing = path.join(tempDir, "nowhere")
          const error = yield* _(Effect.flip(scanDirectory(missing)))
          expect(error).toEqual({ _tag: "DirectoryNotFound", path: missing })
        })
      )
    ))
})
