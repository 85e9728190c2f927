import * as Either from "effect/Either"

import type { PatternSynthesisInvariantViolation } from "./errors.js"
import { patternSynthesisInvariantViolation } from "./errors.js"
import { escapeGlobLiteral, excludePattern, includePattern, literalPattern, selectIncluded } from "./glob.js"
import { compareCodeUnits } from "./package-path.js"
import type { GlobPattern, PackagePath } from "./types.js"

// CHANGE: synthesize a minimal include/exclude sequence reproducing the keep set
// WHY: the report recommends manifest patterns that shrink the archive to essential files
// REF: req-synthesize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀K ⊆ A: selectIncluded(synthesize(K, A), A) = K
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ancestors' patterns precede descendants'; siblings are emitted in code-unit order;
//            root-level file patterns are anchored with '/'
// COMPLEXITY: O(n * d) to plan, O(n * k) to verify (d = depth, k = pattern count)

/** Inherited state: whether the patterns emitted so far include the files below a node. */
type Inherited = 0 | 1

interface TrieNode {
  readonly path: PackagePath
  keep: boolean | undefined
  readonly children: Map<string, TrieNode>
}

interface PlannedNode {
  readonly path: PackagePath
  readonly keep: boolean | undefined
  readonly children: ReadonlyArray<PlannedNode>
  readonly cost: readonly [number, number]
  readonly broad: readonly [boolean, boolean]
}

const makeNode = (path: PackagePath): TrieNode => ({ path, keep: undefined, children: new Map() })

const insertPath = (root: TrieNode, path: PackagePath, keep: boolean): void => {
  let node = root
  for (const segment of path.split("/")) {
    const childPath = node.path === "" ? segment : `${node.path}/${segment}`
    const existing = node.children.get(segment)
    if (existing === undefined) {
      const created = makeNode(childPath)
      node.children.set(segment, created)
      node = created
    } else {
      node = existing
    }
  }
  node.keep = keep
}

const buildTrie = (
  keep: ReadonlySet<PackagePath>,
  allPaths: ReadonlyArray<PackagePath>
): TrieNode => {
  const root = makeNode("")
  for (const path of allPaths) {
    insertPath(root, path, keep.has(path))
  }
  return root
}

const sortedChildren = (node: TrieNode): ReadonlyArray<TrieNode> =>
  [...node.children.entries()]
    .toSorted(([left], [right]) => compareCodeUnits(left, right))
    .map(([, child]) => child)

const fileCost = (keep: boolean | undefined, inherited: Inherited): number =>
  keep === undefined || keep === (inherited === 1) ? 0 : 1

const sumCosts = (children: ReadonlyArray<PlannedNode>, inherited: Inherited): number => {
  let total = 0
  for (const child of children) {
    total += child.cost[inherited]
  }
  return total
}

const flip = (inherited: Inherited): Inherited => inherited === 1 ? 0 : 1

// A broad `dir/**` pattern wins ties against per-file patterns.
const chooseBroad = (
  children: ReadonlyArray<PlannedNode>,
  inherited: Inherited
): { readonly broad: boolean; readonly cost: number } => {
  const stay = sumCosts(children, inherited)
  if (children.length === 0) {
    return { broad: false, cost: stay }
  }
  const flipped = 1 + sumCosts(children, flip(inherited))
  return flipped <= stay ? { broad: true, cost: flipped } : { broad: false, cost: stay }
}

const planNode = (node: TrieNode): PlannedNode => {
  const children = sortedChildren(node).map((child) => planNode(child))
  const excluded = chooseBroad(children, 0)
  const included = chooseBroad(children, 1)
  return {
    path: node.path,
    keep: node.keep,
    children,
    cost: [fileCost(node.keep, 0) + excluded.cost, fileCost(node.keep, 1) + included.cost],
    broad: [excluded.broad, included.broad]
  }
}

const emitNode = (node: PlannedNode, inherited: Inherited, out: Array<GlobPattern>): void => {
  if (fileCost(node.keep, inherited) === 1) {
    const literal = literalPattern(node.path)
    out.push(node.keep === true ? includePattern(literal) : excludePattern(literal))
  }
  let next = inherited
  if (node.broad[inherited]) {
    const glob = `${escapeGlobLiteral(node.path)}/**`
    out.push(inherited === 1 ? excludePattern(glob) : includePattern(glob))
    next = flip(inherited)
  }
  for (const child of node.children) {
    emitNode(child, next, out)
  }
}

/**
 * Compute the pattern sequence without the round-trip check.
 *
 * @param keep - Paths that must end up included.
 * @param allPaths - Whole path population.
 * @returns Ordered patterns; the package root itself never receives a broad pattern.
 *
 * @pure true
 * @invariant output is independent of input order
 * @complexity O(n * d)
 */
export const planPatterns = (
  keep: ReadonlyArray<PackagePath>,
  allPaths: ReadonlyArray<PackagePath>
): ReadonlyArray<GlobPattern> => {
  const root = buildTrie(new Set(keep), allPaths)
  const out: Array<GlobPattern> = []
  for (const child of sortedChildren(root)) {
    emitNode(planNode(child), 0, out)
  }
  return out
}

/**
 * Check that a pattern sequence selects exactly the keep set from the population.
 *
 * @param patterns - Signed patterns in application order.
 * @param keep - Expected included paths.
 * @param allPaths - Whole path population.
 * @returns The patterns or a violation listing missing and unexpected paths.
 *
 * @pure true
 * @invariant Right(ps) → selectIncluded(ps, allPaths) = keep as sets
 * @complexity O(n * k)
 */
export const verifyPatterns = (
  patterns: ReadonlyArray<GlobPattern>,
  keep: ReadonlyArray<PackagePath>,
  allPaths: ReadonlyArray<PackagePath>
): Either.Either<ReadonlyArray<GlobPattern>, PatternSynthesisInvariantViolation> => {
  const expected = new Set(keep)
  const selected = new Set(selectIncluded(patterns, allPaths))
  const missing = [...expected].filter((path) => !selected.has(path))
  const unexpected = [...selected].filter((path) => !expected.has(path))
  if (missing.length > 0 || unexpected.length > 0) {
    return Either.left(patternSynthesisInvariantViolation(missing, unexpected))
  }
  return Either.right(patterns)
}

/**
 * Synthesize the shortest pattern sequence reproducing the keep set.
 *
 * @param keep - KeepSet paths.
 * @param allPaths - KeepSet ∪ WasteSet paths.
 * @returns Verified patterns, or PatternSynthesisInvariantViolation.
 *
 * @pure true
 * @invariant a fully kept directory yields a single `dir/**` include
 * @complexity O(n * d + n * k)
 */
export const synthesize = (
  keep: ReadonlyArray<PackagePath>,
  allPaths: ReadonlyArray<PackagePath>
): Either.Either<ReadonlyArray<GlobPattern>, PatternSynthesisInvariantViolation> =>
  verifyPatterns(planPatterns(keep, allPaths), keep, allPaths)
