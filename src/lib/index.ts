/**
 * Package metadata utilities
 *
 * Pure helpers shared by the installer and the CLI: the descriptor data
 * model, s-expressions, version lists, source headers and scans.
 */

// Descriptor data model
export {
	checkoutTarget,
	createUpstream,
	createVcDescriptor,
	DEFAULT_SUMMARY,
	type DependencyRequirement,
	type PackageDescriptor,
	type PackageExtras,
	type PackageKind,
	type RawRequirement,
	type Upstream,
} from "./descriptor";
// Source headers
export {
	headerRegion,
	readHeader,
	readMultilineHeader,
	readSummary,
} from "./headers";
// Ignore file utilities
export {
	ALWAYS_IGNORED,
	ELPAIGNORE_FILE,
	type IgnoreLoadResult,
	loadIgnorePatterns,
	parseIgnorePatterns,
} from "./ignore";
// Version and commit lookup
export {
	FALLBACK_COMMIT,
	FALLBACK_VERSION,
	packageCommit,
	packageVersion,
	VERSION_HEADERS,
	versionFromContent,
	type WorkingRevisionSource,
} from "./package-version";
// Package-Requires
export {
	extractRequirements,
	mergeRequirements,
	parseRequirements,
	REQUIRES_HEADER,
	requirementsFromContent,
} from "./requirements";
// S-expressions
export {
	cons,
	isCons,
	isNil,
	isSymbol,
	printSexp,
	quote,
	readSexp,
	type SexpCons,
	SexpParseError,
	type SexpSymbol,
	type SexpValue,
	sym,
	unquote,
} from "./sexp";
// Source file scans
export {
	byNameLength,
	directoryOrder,
	type FileOrder,
	listSourceFiles,
	mainFilePath,
	SOURCE_EXTENSION,
	type SourceScanOptions,
} from "./source-files";
// Repository specifiers
export {
	formatVcSpec,
	guessBackend,
	isUrlSpecifier,
	packageNameFromUrl,
	parseVcSpec,
} from "./specifier";
// Version lists
export {
	compareVersionLists,
	InvalidVersionError,
	joinVersion,
	stripRcsId,
	tryVersionToList,
	type VersionList,
	versionAtLeast,
	versionToList,
} from "./version";
