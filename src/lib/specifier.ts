import { createUpstream, type Upstream } from "./descriptor";

// =============================================================================
// URL Specifier Support
// =============================================================================

/**
 * URL specifier regex pattern
 * Matches: {scheme}://... for the schemes a repository can be cloned from
 */
const URL_SPECIFIER_PATTERN = /^(https?|git|ssh|file):\/\/\S+$/i;

/**
 * Check if a string is a repository URL
 */
export function isUrlSpecifier(specifier: string): boolean {
	return URL_SPECIFIER_PATTERN.test(specifier);
}

/**
 * Derive a package name from a repository URL.
 * Uses the last path segment with any extension removed.
 *
 * @param url - Repository URL
 * @returns Package name, or null if the URL has no usable path
 *
 * @example
 * ```typescript
 * packageNameFromUrl("https://example.com/pkg.git")
 * // => "pkg"
 *
 * packageNameFromUrl("https://example.com/group/my-mode/")
 * // => "my-mode"
 * ```
 */
export function packageNameFromUrl(url: string): string | null {
	let pathname: string;
	try {
		pathname = new URL(url).pathname;
	} catch {
		return null;
	}

	const segments = pathname.split("/").filter(Boolean);
	const last = segments[segments.length - 1];
	if (!last) {
		return null;
	}

	const name = last.replace(/\.[^.]+$/, "");
	return name || null;
}

// =============================================================================
// VC Spec Support
// =============================================================================

/**
 * VC spec regex pattern
 * Matches: {backend} {location} [{subdir} [{branch}]]
 *
 * Group 1: backend
 * Group 2: location
 * Group 3: optional subdirectory
 * Group 4: optional branch
 */
const VC_SPEC_PATTERN = /^\s*(\S+)\s+(\S+)(?:\s+(\S+)(?:\s+(\S+))?)?\s*$/;

/**
 * Parse a vc spec string from a package index entry.
 *
 * @param spec - The spec string (e.g., "git https://example.com/pkg.git lisp main")
 * @returns Parsed upstream or null if the string does not match the grammar
 *
 * @example
 * ```typescript
 * parseVcSpec("git https://example.com/pkg.git")
 * // => { backend: "git", url: "https://example.com/pkg.git", lispDir: undefined, branch: undefined }
 * ```
 */
export function parseVcSpec(spec: string): Upstream | null {
	const match = spec.match(VC_SPEC_PATTERN);

	if (!match) {
		return null;
	}

	const [, backend, url, lispDir, branch] = match;
	if (!backend || !url) {
		return null;
	}

	return createUpstream({ backend, url, lispDir, branch });
}

/**
 * Format an upstream back to vc spec string format.
 * A branch without a subdirectory is written with "." as the subdirectory.
 */
export function formatVcSpec(upstream: Upstream): string {
	const parts = [upstream.backend ?? "?", upstream.url];
	if (upstream.lispDir || upstream.branch) {
		parts.push(upstream.lispDir ?? ".");
	}
	if (upstream.branch) {
		parts.push(upstream.branch);
	}
	return parts.join(" ");
}

// =============================================================================
// Backend Detection
// =============================================================================

/**
 * Hosts that only serve git repositories
 */
const GIT_HOSTS = ["github.com", "gitlab.com", "codeberg.org", "git.sr.ht"];

/**
 * Guess the backend for a repository URL.
 *
 * @param url - Repository URL
 * @param fallback - Backend used when nothing in the URL gives it away
 */
export function guessBackend(url: string, fallback: string): string {
	if (/\.git\/?$/i.test(url) || /^git:\/\//i.test(url)) {
		return "git";
	}

	try {
		const host = new URL(url).hostname.toLowerCase();
		if (GIT_HOSTS.includes(host)) {
			return "git";
		}
		if (host === "hg.sr.ht") {
			return "hg";
		}
	} catch {
		return fallback;
	}

	return fallback;
}
