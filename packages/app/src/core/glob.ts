import type { GlobPattern, PackagePath } from "./types.js"

// CHANGE: implement signed glob matching with last-match-wins evaluation
// WHY: include/exclude sequences recommended for a manifest must be checkable in-process
// REF: req-glob-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ps,p: included(ps, p) = sign(last { q ∈ ps | match(q, p) }) = include
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: gitignore dialect; '*', '?' and '[...]' never match '/'; '\' escapes the next character
// COMPLEXITY: O(n) per match

export interface CompiledPattern {
  readonly sign: GlobPattern["sign"]
  readonly regex: RegExp
}

const escapeRegex = (value: string): string => value.replaceAll(/[.*+?^${}()|[\]\\]/gu, String.raw`\$&`)

const escapeClassChar = (value: string): string => /[\\\]^[-]/u.test(value) ? `\\${value}` : value

// Unescaped trailing spaces are not part of a gitignore pattern.
const trimTrailingSpaces = (glob: string): string => {
  let end = glob.length
  while (end > 0 && glob.charAt(end - 1) === " " && glob.charAt(end - 2) !== "\\") {
    end -= 1
  }
  return glob.slice(0, end)
}

interface ClassToken {
  readonly source: string
  readonly end: number
}

const readClass = (glob: string, start: number): ClassToken | undefined => {
  let index = start + 1
  let source = "(?!/)["
  const negation = glob.charAt(index)
  if (negation === "!" || negation === "^") {
    source += "^"
    index += 1
  }
  const first = index
  while (index < glob.length) {
    const char = glob.charAt(index)
    if (char === "]" && index > first) {
      return { source: `${source}]`, end: index + 1 }
    }
    if (char === "/") {
      return undefined
    }
    if (char === "\\" && index + 1 < glob.length) {
      source += escapeClassChar(glob.charAt(index + 1))
      index += 2
      continue
    }
    source += char === "-" ? char : escapeClassChar(char)
    index += 1
  }
  return undefined
}

const translateBody = (body: string): string => {
  let regex = ""
  let index = 0
  while (index < body.length) {
    const char = body.charAt(index)
    const next = body.charAt(index + 1)
    if (char === "\\" && index + 1 < body.length) {
      regex += escapeRegex(next)
      index += 2
      continue
    }
    if (char === "*" && next === "*") {
      const after = body.charAt(index + 2)
      if (after === "/") {
        regex += "(?:.*/)?"
        index += 3
        continue
      }
      regex += ".*"
      index += 2
      continue
    }
    if (char === "*") {
      regex += "[^/]*"
      index += 1
      continue
    }
    if (char === "?") {
      regex += "[^/]"
      index += 1
      continue
    }
    if (char === "[") {
      const token = readClass(body, index)
      if (token !== undefined) {
        regex += token.source
        index = token.end
        continue
      }
    }
    regex += escapeRegex(char)
    index += 1
  }
  return regex
}

// gitignore dialect: a slash at the start or in the middle anchors the pattern to the
// package root, otherwise it matches at any depth; a trailing slash matches directories
// only, and a matched directory covers everything below it.
const globToRegex = (glob: string): RegExp => {
  const trimmed = trimTrailingSpaces(glob)
  const directoryOnly = trimmed.endsWith("/")
  const body = directoryOnly ? trimmed.slice(0, -1) : trimmed
  const anchored = body.includes("/")
  const relative = body.startsWith("/") ? body.slice(1) : body
  const prefix = anchored ? "^" : "^(?:.*/)?"
  const suffix = directoryOnly ? "/.*$" : "(?:/.*)?$"
  return new RegExp(`${prefix}${translateBody(relative)}${suffix}`, "u")
}

/**
 * Escape a literal path so that it can be used as an exact glob.
 *
 * @param path - Normalized package path.
 * @returns Glob body matching this path; see literalPattern for root anchoring.
 *
 * @pure true
 * @invariant metacharacters, a leading '!' or '#' and trailing spaces are escaped
 * @complexity O(n)
 */
export const escapeGlobLiteral = (path: PackagePath): string => {
  const escaped = path
    .replaceAll(/[*?[\]\\]/gu, String.raw`\$&`)
    .replace(/ +$/u, (spaces) => spaces.replaceAll(" ", String.raw`\ `))
  return /^[!#]/u.test(escaped) ? `\\${escaped}` : escaped
}

/**
 * Glob matching exactly one file: root-level names are anchored with a leading '/'.
 *
 * @pure true
 * @invariant compileGlob(literalPattern(p)) matches p and nothing else among files
 * @complexity O(n)
 */
export const literalPattern = (path: PackagePath): string =>
  path.includes("/") ? escapeGlobLiteral(path) : `/${escapeGlobLiteral(path)}`

export const includePattern = (glob: string): GlobPattern => ({ sign: "include", glob })

export const excludePattern = (glob: string): GlobPattern => ({ sign: "exclude", glob })

/**
 * Parse a manifest-style pattern string; a leading '!' marks an exclude.
 *
 * @pure true
 * @complexity O(1)
 */
export const parsePattern = (raw: string): GlobPattern =>
  raw.startsWith("!") ? excludePattern(raw.slice(1)) : includePattern(raw)

export const renderPattern = (pattern: GlobPattern): string =>
  pattern.sign === "include" ? pattern.glob : `!${pattern.glob}`

export const compileGlob = (glob: string): RegExp => globToRegex(glob)

/**
 * Compile glob patterns into regexes.
 *
 * @param globs - Raw glob patterns.
 * @returns Compiled regular expressions.
 *
 * @pure true
 * @invariant compiled regexes match only whole paths
 * @complexity O(n) where n = total pattern length
 */
export const compileGlobs = (globs: ReadonlyArray<string>): ReadonlyArray<RegExp> =>
  globs.map((glob) => globToRegex(glob))

export const compilePatterns = (patterns: ReadonlyArray<GlobPattern>): ReadonlyArray<CompiledPattern> =>
  patterns.map((pattern) => ({ sign: pattern.sign, regex: globToRegex(pattern.glob) }))

/**
 * Check if any compiled glob matches the path.
 *
 * @pure true
 * @complexity O(k) where k = number of globs
 */
export const matchesAnyGlob = (
  globs: ReadonlyArray<RegExp>,
  candidate: PackagePath
): boolean => {
  for (const glob of globs) {
    if (glob.test(candidate)) {
      return true
    }
  }
  return false
}

/**
 * Evaluate a pattern sequence for one path: the last matching pattern decides.
 *
 * @param patterns - Compiled signed patterns in application order.
 * @param candidate - Normalized package path.
 * @returns true when the path is included; false when excluded or unmatched.
 *
 * @pure true
 * @invariant unmatched paths are excluded
 * @complexity O(k)
 */
export const isIncluded = (
  patterns: ReadonlyArray<CompiledPattern>,
  candidate: PackagePath
): boolean => {
  for (let index = patterns.length - 1; index >= 0; index -= 1) {
    const pattern = patterns[index]
    if (pattern !== undefined && pattern.regex.test(candidate)) {
      return pattern.sign === "include"
    }
  }
  return false
}

/**
 * Apply a pattern sequence to a path population, preserving population order.
 *
 * @pure true
 * @complexity O(n * k)
 */
export const selectIncluded = (
  patterns: ReadonlyArray<GlobPattern>,
  paths: ReadonlyArray<PackagePath>
): ReadonlyArray<PackagePath> => {
  const compiled = compilePatterns(patterns)
  return paths.filter((path) => isIncluded(compiled, path))
}
