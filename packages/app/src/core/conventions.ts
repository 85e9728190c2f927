import { compileGlobs } from "./glob.js"
import type { PackageMetadata } from "./types.js"

// CHANGE: describe the naming conventions the classifier relies on
// WHY: source root, manifest name and essential globs vary between packages
// REF: req-conventions-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: buildConventions(c).essentialPaths ⊇ {build} ∪ targets
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: sourceRoot is a normalized relative directory without trailing slash
// COMPLEXITY: O(n)/O(n)

export interface ConventionSettings {
  readonly sourceRoot: string
  readonly sourceExtensions: ReadonlyArray<string>
  readonly manifestName: string
  readonly essentialGlobs: ReadonlyArray<string>
}

export interface Conventions {
  readonly sourceRoot: string
  readonly sourceExtensions: ReadonlySet<string>
  readonly manifestName: string
  readonly essentialPaths: ReadonlySet<string>
  readonly essentialGlobs: ReadonlyArray<RegExp>
}

export const defaultSourceRoot = "src"

export const defaultManifestName = "Cargo.toml"

export const defaultBuildScript = "build.rs"

export const defaultSourceExtensions: ReadonlyArray<string> = ["rs", "c", "h", "cc", "cpp", "hpp", "s", "proto"]

export const defaultConventionSettings: ConventionSettings = {
  sourceRoot: defaultSourceRoot,
  sourceExtensions: defaultSourceExtensions,
  manifestName: defaultManifestName,
  essentialGlobs: []
}

const trimSlashes = (value: string): string => {
  let result = value.replaceAll("\\", "/")
  while (result.startsWith("./")) {
    result = result.slice(2)
  }
  while (result.startsWith("/")) {
    result = result.slice(1)
  }
  while (result.endsWith("/")) {
    result = result.slice(0, -1)
  }
  return result
}

const stripLeadingDot = (extension: string): string =>
  (extension.startsWith(".") ? extension.slice(1) : extension).toLowerCase()

/**
 * Build classifier conventions from settings and the package metadata.
 *
 * @param settings - Resolved convention settings.
 * @param metadata - Package metadata (build script and explicit targets become essential).
 * @returns Conventions ready for classification.
 *
 * @pure true
 * @invariant build script and targets are always essential paths
 * @complexity O(n)
 */
export const buildConventions = (
  settings: ConventionSettings,
  metadata: PackageMetadata
): Conventions => {
  const essentialPaths = new Set<string>([trimSlashes(metadata.build ?? defaultBuildScript)])
  for (const target of metadata.targets ?? []) {
    essentialPaths.add(trimSlashes(target))
  }
  return {
    sourceRoot: trimSlashes(settings.sourceRoot),
    sourceExtensions: new Set(settings.sourceExtensions.map((extension) => stripLeadingDot(extension))),
    manifestName: settings.manifestName,
    essentialPaths,
    essentialGlobs: compileGlobs(settings.essentialGlobs)
  }
}

export const defaultConventions: Conventions = buildConventions(defaultConventionSettings, {})
