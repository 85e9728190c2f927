import { describe, expect, it } from "@effect/vitest"
import { Effect, FastCheck } from "effect"
import * as Either from "effect/Either"

import { includePattern, renderPattern, selectIncluded } from "../../src/core/glob.js"
import { planPatterns, synthesize, verifyPatterns } from "../../src/core/synthesize.js"
import type { GlobPattern } from "../../src/core/types.js"

const rendered = (
  keep: ReadonlyArray<string>,
  allPaths: ReadonlyArray<string>
): ReadonlyArray<string> | string => {
  const result = synthesize(keep, allPaths)
  return Either.isLeft(result) ? result.left.message : result.right.map((pattern) => renderPattern(pattern))
}

const sortedCopy = (values: ReadonlyArray<string>): ReadonlyArray<string> => [...values].sort()

// Directory and file names never overlap, so no path is both a file and a directory.
const directoryName = FastCheck.constantFrom("a", "b", "d", "*x", "[c]")
const fileName = FastCheck.constantFrom("c.rs", "e.md", "?.rs", "f", "a.rs", "[x].rs")

const filePath = FastCheck.tuple(FastCheck.array(directoryName, { maxLength: 3 }), fileName).map(
  ([directories, name]) => [...directories, name].join("/")
)

const population = FastCheck.array(FastCheck.tuple(filePath, FastCheck.boolean()), { maxLength: 30 }).map((items) => {
  const flags = new Map<string, boolean>()
  for (const [path, keep] of items) {
    flags.set(path, keep)
  }
  return {
    allPaths: [...flags.keys()],
    keep: [...flags.entries()].filter(([, keep]) => keep).map(([path]) => path)
  }
})

describe("synthesize", () => {
  it.effect("collapses a fully kept directory into one include", () =>
    Effect.sync(() => {
      expect(rendered(
        ["src/lib.rs", "src/main.rs"],
        ["src/lib.rs", "src/main.rs", "tests/t1.rs", "README.md"]
      )).toEqual(["src/**"])
    }))

  it.effect("lists files one by one when the directory is mostly waste", () =>
    Effect.sync(() => {
      const allPaths = ["src/lib.rs", "src/data.bin"]
      const result = synthesize(["src/lib.rs"], allPaths)
      expect(Either.map(result, (patterns) => patterns.map((pattern) => renderPattern(pattern)))).toEqual(
        Either.right(["src/lib.rs"])
      )
      expect(Either.map(result, (patterns) => selectIncluded(patterns, allPaths))).toEqual(
        Either.right(["src/lib.rs"])
      )
    }))

  it.effect("prefers a broad include plus an exclude on ties", () =>
    Effect.sync(() => {
      expect(rendered(
        ["src/a.rs", "src/b.rs"],
        ["src/a.rs", "src/b.rs", "src/c.bin"]
      )).toEqual(["src/**", "!src/c.bin"])
    }))

  it.effect("re-includes kept files below an excluded subdirectory", () =>
    Effect.sync(() => {
      const keep = ["src/a.rs", "src/b.rs", "src/c.rs", "src/gen/keep.rs"]
      const allPaths = [...keep, "src/gen/x.bin", "src/gen/y.bin", "src/gen/z.bin"]
      expect(rendered(keep, allPaths)).toEqual(["src/**", "!src/gen/**", "src/gen/keep.rs"])
    }))

  it.effect("returns no patterns when nothing is kept", () =>
    Effect.sync(() => {
      expect(rendered([], [])).toEqual([])
      expect(rendered([], ["tests/t1.rs", "README.md"])).toEqual([])
    }))

  it.effect("never emits a broad pattern for the package root", () =>
    Effect.sync(() => {
      expect(rendered(["a.rs", "b.rs"], ["a.rs", "b.rs", "c.md"])).toEqual(["/a.rs", "/b.rs"])
    }))

  it.effect("anchors root-level files so nested namesakes stay out", () =>
    Effect.sync(() => {
      const allPaths = ["build.rs", "examples/build.rs", "README.md", "docs/README.md"]
      const result = synthesize(["build.rs", "docs/README.md"], allPaths)
      expect(Either.map(result, (patterns) => patterns.map((pattern) => renderPattern(pattern)))).toEqual(
        Either.right(["/build.rs", "docs/**"])
      )
      expect(Either.map(result, (patterns) => selectIncluded(patterns, allPaths))).toEqual(
        Either.right(["build.rs", "docs/README.md"])
      )
    }))

  it.effect("escapes bracket expressions in file names", () =>
    Effect.sync(() => {
      expect(rendered(["src/[a].rs"], ["src/[a].rs", "src/a.rs"])).toEqual([String.raw`src/\[a\].rs`])
    }))

  it.effect("escapes glob metacharacters in file names", () =>
    Effect.sync(() => {
      expect(rendered(["src/a*b.rs"], ["src/a*b.rs", "src/axb.rs"])).toEqual([String.raw`src/a\*b.rs`])
    }))

  it.effect("surfaces a file pattern that also covers entries below it", () =>
    Effect.sync(() => {
      const result = synthesize(["a"], ["a", "a/b"])
      expect(Either.isLeft(result) ? result.left.unexpected : undefined).toEqual(["a/b"])
    }))

  it.effect("does not depend on input order", () =>
    Effect.sync(() => {
      const keep = ["src/lib.rs", "src/util/mod.rs", "build.rs"]
      const allPaths = [...keep, "src/util/table.bin", "README.md"]
      expect(planPatterns([...keep].reverse(), [...allPaths].reverse())).toEqual(planPatterns(keep, allPaths))
    }))

  it.effect("reports patterns that fail to reproduce the keep set", () =>
    Effect.sync(() => {
      const patterns: ReadonlyArray<GlobPattern> = [includePattern("src/**")]
      const result = verifyPatterns(patterns, ["src/a.rs"], ["src/a.rs", "src/b.rs"])
      expect(Either.isLeft(result) ? [result.left.missing, result.left.unexpected] : undefined).toEqual([
        [],
        ["src/b.rs"]
      ])
      const missing = synthesize(["src/ghost.rs"], ["src/a.rs"])
      expect(Either.isLeft(missing) ? missing.left.missing : undefined).toEqual(["src/ghost.rs"])
    }))

  it.effect("reproduces any keep set exactly", () =>
    Effect.sync(() => {
      FastCheck.assert(
        FastCheck.property(population, ({ allPaths, keep }) => {
          const result = planPatterns(keep, allPaths)
          expect(sortedCopy(selectIncluded(result, allPaths))).toEqual(sortedCopy(keep))
        })
      )
    }))

  it.effect("keeps a whole subtree with exactly one include", () =>
    Effect.sync(() => {
      const segment = FastCheck.constantFrom("a", "b", "k")
      const scenario = FastCheck.record({
        directory: FastCheck.array(segment, { minLength: 1, maxLength: 2 }).map((parts) => parts.join("/")),
        inside: FastCheck.array(
          FastCheck.tuple(FastCheck.array(segment, { maxLength: 2 }), FastCheck.constantFrom("x.rs", "y.rs")),
          { minLength: 1, maxLength: 6 }
        ),
        outside: FastCheck.array(
          FastCheck.tuple(FastCheck.array(segment, { maxLength: 3 }), FastCheck.constantFrom("w.bin", "v.md")),
          { maxLength: 10 }
        )
      })
      FastCheck.assert(
        FastCheck.property(scenario, ({ directory, inside, outside }) => {
          const keep = [...new Set(inside.map(([parts, name]) => [directory, ...parts, name].join("/")))]
          const parent = directory.includes("/") ? `${directory.slice(0, directory.lastIndexOf("/"))}/` : ""
          const waste = [...new Set([`${parent}w.bin`, ...outside.map(([parts, name]) => [...parts, name].join("/"))])]
            .filter((path) => !path.startsWith(`${directory}/`))
          expect(rendered(keep, [...keep, ...waste])).toEqual([`${directory}/**`])
        })
      )
    }))

  it.effect("never needs more patterns than kept files", () =>
    Effect.sync(() => {
      FastCheck.assert(
        FastCheck.property(population, ({ allPaths, keep }) => {
          expect(planPatterns(keep, allPaths).length).toBeLessThanOrEqual(keep.length)
        })
      )
    }))
})
