/**
 * Listing the source files of a package directory.
 *
 * Scans are non-recursive: only `*.el` files directly inside the
 * directory count. The order in which files are visited is a
 * replaceable policy because "first file wins" lookups depend on it.
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { loadIgnorePatterns } from "./ignore";

export const SOURCE_EXTENSION = ".el";

/**
 * Reorders a list of absolute file paths.
 */
export type FileOrder = (files: string[]) => string[];

/**
 * Alphabetical by file name.
 */
export const directoryOrder: FileOrder = (files) =>
	[...files].sort((a, b) => basename(a).localeCompare(basename(b)));

/**
 * Shortest file name first. Ties keep their incoming order, so this is
 * usually composed after {@link directoryOrder}.
 */
export const byNameLength: FileOrder = (files) =>
	[...files].sort((a, b) => basename(a).length - basename(b).length);

export interface SourceScanOptions {
	/** Visit order for the source files */
	order?: FileOrder;
}

/**
 * List the package source files in `dir`.
 *
 * Missing directories yield an empty list.
 *
 * @returns Absolute paths in directory order
 */
export async function listSourceFiles(dir: string): Promise<string[]> {
	let entries: Dirent[];
	try {
		entries = await readdir(dir, { withFileTypes: true });
	} catch {
		return [];
	}

	const { ig } = await loadIgnorePatterns(dir);

	const files = entries
		.filter((entry) => entry.isFile() && entry.name.endsWith(SOURCE_EXTENSION))
		.filter((entry) => !ig.ignores(entry.name))
		.map((entry) => join(dir, entry.name));

	return directoryOrder(files);
}

/**
 * The primary source file for a package: `<name>.el` inside `dir`.
 */
export function mainFilePath(dir: string, name: string): string {
	return join(dir, `${name}${SOURCE_EXTENSION}`);
}
