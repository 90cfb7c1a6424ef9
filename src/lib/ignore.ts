/**
 * Ignore file handling for package source scans
 *
 * Similar to ELPA's .elpaignore behavior:
 * - If .elpaignore exists in the package directory, its patterns apply
 * - Patterns use gitignore syntax
 * - Generated descriptor files and directory-local settings are always ignored
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import ignore, { type Ignore } from "ignore";

export const ELPAIGNORE_FILE = ".elpaignore";

/**
 * Files that are never treated as package sources
 */
const ALWAYS_IGNORED = ["*-pkg.el", "*-autoloads.el", ".dir-locals.el"];

/**
 * Result of loading ignore patterns
 */
export interface IgnoreLoadResult {
	/** The ignore instance with loaded patterns */
	ig: Ignore;
	/** Which file the patterns came from (null if using defaults only) */
	source: typeof ELPAIGNORE_FILE | null;
	/** Raw patterns loaded from the file (excluding defaults) */
	patterns: string[];
}

/**
 * Load ignore patterns for a package directory.
 *
 * @param dir - The package directory
 * @returns An ignore instance and the source file used
 */
export async function loadIgnorePatterns(
	dir: string,
): Promise<IgnoreLoadResult> {
	const ig = ignore();
	ig.add(ALWAYS_IGNORED);

	try {
		const content = await readFile(join(dir, ELPAIGNORE_FILE), "utf-8");
		const patterns = parseIgnorePatterns(content);
		ig.add(patterns);
		return { ig, source: ELPAIGNORE_FILE, patterns };
	} catch {
		// No .elpaignore, use defaults only
	}

	return { ig, source: null, patterns: [] };
}

/**
 * Parse an ignore file content into an array of patterns
 * Filters out comments and empty lines
 *
 * @param content - The content of an ignore file
 * @returns Array of patterns
 */
export function parseIgnorePatterns(content: string): string[] {
	return content
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line && !line.startsWith("#"));
}

export { ALWAYS_IGNORED };
