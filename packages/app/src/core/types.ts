// CHANGE: define core domain types for file entries, roles, patterns and reports
// WHY: keep IO-free data structures shared by classifier, aggregator, synthesizer and shell
// REF: req-report-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ FileEntry: role(e) ∈ Role ∧ e.size ∈ ℕ
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Role is a closed union; every entry carries exactly one Role
// COMPLEXITY: O(1)/O(1)

export type Role = "Essential" | "Test" | "Example" | "Documentation" | "Metadata" | "Other"

export type WasteRole = Exclude<Role, "Essential">

export const roles: ReadonlyArray<Role> = ["Essential", "Test", "Example", "Documentation", "Metadata", "Other"]

export const wasteRoles: ReadonlyArray<WasteRole> = ["Test", "Example", "Documentation", "Metadata", "Other"]

export type ContentKind = "source" | "text" | "binary"

/** Relative, slash-normalized path inside the package root. */
export type PackagePath = string

export interface RawFileEntry {
  readonly path: string
  readonly size: number
  readonly hint?: ContentKind | undefined
}

export interface FileEntry {
  readonly path: PackagePath
  readonly size: number
  readonly hint: ContentKind | undefined
}

export interface ClassifiedEntry extends FileEntry {
  readonly role: Role
}

export interface PackageMetadata {
  readonly name?: string | undefined
  readonly version?: string | undefined
  readonly include?: ReadonlyArray<string> | undefined
  readonly exclude?: ReadonlyArray<string> | undefined
  readonly build?: string | undefined
  readonly targets?: ReadonlyArray<string> | undefined
}

export interface Listing {
  readonly package: PackageMetadata
  readonly entries: ReadonlyArray<RawFileEntry>
}

export type PatternSign = "include" | "exclude"

export interface GlobPattern {
  readonly sign: PatternSign
  readonly glob: string
}

export interface ByteCount {
  readonly bytes: number
  readonly files: number
}

export type RoleTotals = Readonly<Record<Role, ByteCount>>

export interface ExtensionInfo {
  readonly totalBytes: number
  readonly totalFiles: number
}

export type FixKind = "NewInclude" | "ImprovedInclude" | "RemoveExcludeAndUseInclude"

export interface SuggestedFix {
  readonly kind: FixKind
  readonly include: ReadonlyArray<string>
  readonly previousInclude: ReadonlyArray<string>
  readonly previousExclude: ReadonlyArray<string>
}

export interface WastedFile {
  readonly path: PackagePath
  readonly size: number
  readonly role: WasteRole
}

export interface Report {
  readonly packageName: string | undefined
  readonly packageVersion: string | undefined
  readonly totalBytes: number
  readonly keepBytes: number
  readonly wasteBytes: number
  readonly totalFiles: number
  readonly keepFiles: number
  readonly wasteFiles: number
  readonly wasteByRole: ReadonlyArray<readonly [WasteRole, number]>
  readonly infoByExtension: ReadonlyArray<readonly [string, ExtensionInfo]>
  readonly wastedFiles: ReadonlyArray<WastedFile>
  readonly patterns: ReadonlyArray<GlobPattern>
  readonly suggestedFix: SuggestedFix | null
}

export interface CollectionSummary {
  readonly packages: number
  readonly totalBytes: number
  readonly keepBytes: number
  readonly wasteBytes: number
  readonly totalFiles: number
  readonly wasteFiles: number
  readonly wasteByRole: ReadonlyArray<readonly [WasteRole, number]>
  readonly infoByExtension: ReadonlyArray<readonly [string, ExtensionInfo]>
}
