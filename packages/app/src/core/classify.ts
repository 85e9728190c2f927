import type { Conventions } from "./conventions.js"
import { matchesAnyGlob } from "./glob.js"
import { baseName, directorySegments, extensionOf, stemOf } from "./package-path.js"
import type { ContentKind, PackagePath, Role } from "./types.js"

// CHANGE: classify package files by role with an ordered rule table
// WHY: every file must be attributed to exactly one reason for being kept or wasted
// REF: req-classify-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: classify(p) = role(first { r ∈ rules | r.matches(p) }) ∨ Other
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the classifier never reads file contents; the hint is caller supplied
// COMPLEXITY: O(r * s) where r = rules, s = path segments

interface FileFacts {
  readonly path: PackagePath
  readonly directories: ReadonlyArray<string>
  readonly name: string
  readonly lowerName: string
  readonly stem: string
  readonly extension: string | undefined
  readonly hint: ContentKind | undefined
}

interface ClassificationRule {
  readonly role: Role
  readonly matches: (facts: FileFacts, conventions: Conventions) => boolean
}

const testDirectories: ReadonlySet<string> = new Set([
  "test",
  "tests",
  "testdata",
  "test-data",
  "test_data",
  "fixtures",
  "bench",
  "benches",
  "proptest-regressions"
])

const fixtureExtensions: ReadonlySet<string> = new Set(["snap", "pending-snap", "stderr", "stdout", "fixed"])

const exampleDirectories: ReadonlySet<string> = new Set(["example", "examples", "demo", "demos"])

const documentationDirectories: ReadonlySet<string> = new Set(["doc", "docs"])

const documentationExtensions: ReadonlySet<string> = new Set(["md", "markdown", "rst", "adoc", "asciidoc"])

const documentationStems: ReadonlyArray<string> = [
  "README",
  "LICENSE",
  "LICENCE",
  "COPYING",
  "COPYRIGHT",
  "CHANGELOG",
  "CHANGES",
  "HISTORY",
  "AUTHORS",
  "CONTRIBUTING",
  "NOTICE",
  "UNLICENSE",
  "RELEASES"
]

const metadataFiles: ReadonlySet<string> = new Set([
  "cargo.toml.orig",
  "cargo.lock",
  ".cargo_vcs_info.json",
  "rust-toolchain",
  "rust-toolchain.toml",
  "rustfmt.toml",
  ".rustfmt.toml",
  "clippy.toml",
  ".clippy.toml",
  "deny.toml",
  "release.toml",
  ".travis.yml",
  "appveyor.yml",
  ".appveyor.yml",
  ".gitlab-ci.yml",
  "azure-pipelines.yml",
  "codecov.yml",
  ".codecov.yml",
  "bors.toml",
  ".gitignore",
  ".gitattributes",
  ".gitmodules",
  ".editorconfig",
  ".dockerignore",
  ".pre-commit-config.yaml"
])

const metadataDirectories: ReadonlySet<string> = new Set([".github", ".circleci", ".vscode", ".idea", ".git", ".cargo"])

const hasDirectory = (facts: FileFacts, names: ReadonlySet<string>): boolean =>
  facts.directories.some((directory) => names.has(directory.toLowerCase()))

const isTestFileName = (facts: FileFacts): boolean => {
  const stem = facts.stem.toLowerCase()
  return stem === "test" ||
    stem === "tests" ||
    stem.startsWith("test_") ||
    stem.endsWith("_test") ||
    stem.endsWith("_tests")
}

const isDocumentationStem = (facts: FileFacts): boolean => {
  const stem = facts.stem.toUpperCase()
  return documentationStems.some((name) =>
    stem === name || stem.startsWith(`${name}-`) || stem.startsWith(`${name}_`)
  )
}

const isUnderSourceRoot = (facts: FileFacts, conventions: Conventions): boolean => {
  const root = conventions.sourceRoot
  if (root === "" || root === ".") {
    return true
  }
  return facts.path.startsWith(`${root}/`)
}

const hasSourceExtension = (facts: FileFacts, conventions: Conventions): boolean =>
  facts.extension !== undefined && conventions.sourceExtensions.has(facts.extension)

// Compiled modules such as src/license.rs or src/docs/mod.rs are never documentation.
const isCompiledSource = (facts: FileFacts, conventions: Conventions): boolean =>
  isUnderSourceRoot(facts, conventions) && hasSourceExtension(facts, conventions)

const isSourceFile = (facts: FileFacts, conventions: Conventions): boolean => {
  if (facts.extension === undefined) {
    return facts.hint !== "binary"
  }
  return hasSourceExtension(facts, conventions)
}

const rules: ReadonlyArray<ClassificationRule> = [
  {
    role: "Essential",
    matches: (facts, conventions) =>
      conventions.essentialPaths.has(facts.path) || matchesAnyGlob(conventions.essentialGlobs, facts.path)
  },
  {
    role: "Test",
    matches: (facts) =>
      hasDirectory(facts, testDirectories) ||
      isTestFileName(facts) ||
      (facts.extension !== undefined && fixtureExtensions.has(facts.extension))
  },
  {
    role: "Example",
    matches: (facts) => hasDirectory(facts, exampleDirectories)
  },
  {
    role: "Documentation",
    matches: (facts, conventions) =>
      (facts.extension !== undefined && documentationExtensions.has(facts.extension)) ||
      (!isCompiledSource(facts, conventions) &&
        (hasDirectory(facts, documentationDirectories) || isDocumentationStem(facts)))
  },
  {
    role: "Metadata",
    matches: (facts, conventions) =>
      facts.name === conventions.manifestName ||
      metadataFiles.has(facts.lowerName) ||
      hasDirectory(facts, metadataDirectories)
  },
  {
    role: "Essential",
    matches: (facts, conventions) => isUnderSourceRoot(facts, conventions) && isSourceFile(facts, conventions)
  }
]

const collectFacts = (path: PackagePath, hint: ContentKind | undefined): FileFacts => {
  const name = baseName(path)
  return {
    path,
    directories: directorySegments(path),
    name,
    lowerName: name.toLowerCase(),
    stem: stemOf(path),
    extension: extensionOf(path),
    hint
  }
}

/**
 * Classify a normalized package path.
 *
 * @param path - Normalized package path.
 * @param hint - Optional content kind supplied by the enumerator.
 * @param conventions - Source root, manifest name and essential paths.
 * @returns The role of the first matching rule, or Other.
 *
 * @pure true
 * @invariant exactly one role per path
 * @complexity O(r * s)
 */
export const classify = (
  path: PackagePath,
  hint: ContentKind | undefined,
  conventions: Conventions
): Role => {
  const facts = collectFacts(path, hint)
  const rule = rules.find((candidate) => candidate.matches(facts, conventions))
  return rule === undefined ? "Other" : rule.role
}
