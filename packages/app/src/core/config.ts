import type { CliArgs } from "./cli.js"
import type { ConventionSettings } from "./conventions.js"
import { defaultConventionSettings } from "./conventions.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: essential globs from file and CLI are merged, unique, file entries first
// COMPLEXITY: O(n)/O(1)

export interface FileConfig {
  readonly sourceRoot?: string
  readonly sourceExtensions?: ReadonlyArray<string>
  readonly manifestName?: string
  readonly essential?: ReadonlyArray<string>
}

export type CliOverrides = Pick<CliArgs, "sourceRoot" | "essential">

const unique = (values: ReadonlyArray<string>): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const result: Array<string> = []
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value)
      result.push(value)
    }
  }
  return result
}

/**
 * Resolve the effective convention settings from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI overrides.
 * @param fileConfig - Optional config loaded from .crate-waste.json.
 * @returns Resolved convention settings.
 *
 * @pure true
 * @invariant essentialGlobs has no duplicates
 * @complexity O(n)
 */
export const resolveConfig = (
  cli: CliOverrides,
  fileConfig: FileConfig | undefined
): ConventionSettings => ({
  sourceRoot: cli.sourceRoot ?? fileConfig?.sourceRoot ?? defaultConventionSettings.sourceRoot,
  sourceExtensions: fileConfig?.sourceExtensions ?? defaultConventionSettings.sourceExtensions,
  manifestName: fileConfig?.manifestName ?? defaultConventionSettings.manifestName,
  essentialGlobs: unique([...(fileConfig?.essential ?? []), ...cli.essential])
})
