export { aggregate, mergeAggregations, validateEntries } from "./core/aggregate.js"
export type { Aggregation } from "./core/aggregate.js"
export { classify } from "./core/classify.js"
export { buildConventions, defaultConventions, defaultConventionSettings } from "./core/conventions.js"
export type { ConventionSettings, Conventions } from "./core/conventions.js"
export { formatAppError } from "./core/errors.js"
export type { AppError, MalformedInput, PatternSynthesisInvariantViolation } from "./core/errors.js"
export { isIncluded, literalPattern, parsePattern, renderPattern, selectIncluded } from "./core/glob.js"
export { normalizePackagePath } from "./core/package-path.js"
export { buildReport, renderJsonReport, renderJsonSummary, summarizeReports } from "./core/report.js"
export { synthesize, verifyPatterns } from "./core/synthesize.js"
export type * from "./core/types.js"
export { roles, wasteRoles } from "./core/types.js"
export { computeWasteReport } from "./core/waste.js"
