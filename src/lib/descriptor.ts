import type { SexpValue } from "./sexp";
import type { VersionList } from "./version";

/**
 * Where a package comes from.
 * "vc" packages are checkouts of a repository, "archive" packages were
 * unpacked from a tarball by some other tool.
 */
export type PackageKind = "vc" | "archive";

/**
 * Location of a version-control-sourced package.
 *
 * Immutable once created; see {@link createUpstream}.
 */
export interface Upstream {
	/** Backend token (e.g. "git"). Absent when not yet known. */
	readonly backend?: string;
	/** Repository location (URL or path) */
	readonly url: string;
	/** Subdirectory holding the package sources */
	readonly lispDir?: string;
	/** Branch (or other revision) to check out by default */
	readonly branch?: string;
}

/**
 * A dependency as read from a header: version still a string.
 */
export interface RawRequirement {
	name: string;
	version: string;
}

/**
 * A dependency with a comparable minimum version.
 * Identity is by name.
 */
export interface DependencyRequirement {
	name: string;
	version: VersionList;
}

/**
 * Package metadata beyond name/version/summary/requirements.
 */
export interface PackageExtras {
	/** Required for vc packages */
	upstream?: Upstream;
	/** Explicit revision, overrides `upstream.branch` */
	rev?: string;
	/** Raw vc spec string from the package index, used during resolution only */
	vcSpec?: string;
	/** Commit recorded when the descriptor was generated */
	commit?: string;
	/** Any other key/value pairs, keyed without the leading colon */
	other: Record<string, SexpValue>;
}

/**
 * Identity and metadata for one package instance.
 */
export interface PackageDescriptor {
	name: string;
	kind: PackageKind;
	version: VersionList;
	/** Install directory, set once a target directory is chosen */
	dir?: string;
	summary: string;
	requirements: DependencyRequirement[];
	extras: PackageExtras;
}

export const DEFAULT_SUMMARY = "No description available.";

export function createUpstream(upstream: Upstream): Upstream {
	return Object.freeze({ ...upstream });
}

/**
 * Build a fresh, not-yet-installed vc descriptor.
 */
export function createVcDescriptor(options: {
	name: string;
	upstream: Upstream;
	summary?: string;
	rev?: string;
	vcSpec?: string;
}): PackageDescriptor {
	return {
		name: options.name,
		kind: "vc",
		version: [0],
		summary: options.summary ?? DEFAULT_SUMMARY,
		requirements: [],
		extras: {
			upstream: createUpstream(options.upstream),
			rev: options.rev,
			vcSpec: options.vcSpec,
			other: {},
		},
	};
}

/**
 * The revision to check out: an explicit rev wins over the upstream branch.
 */
export function checkoutTarget(
	descriptor: PackageDescriptor,
): string | undefined {
	return descriptor.extras.rev ?? descriptor.extras.upstream?.branch;
}
