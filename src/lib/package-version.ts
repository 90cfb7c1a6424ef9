/**
 * Version and commit lookup for a checked-out package directory.
 *
 * Both are heuristics over the package's source files, with literal
 * fallbacks when nothing is found.
 */

import { readFile } from "node:fs/promises";
import { readHeader } from "./headers";
import {
	byNameLength,
	type FileOrder,
	listSourceFiles,
	type SourceScanOptions,
} from "./source-files";
import { stripRcsId } from "./version";

export const FALLBACK_VERSION = "0";
export const FALLBACK_COMMIT = "unknown";

/**
 * Header names checked for a version, in priority order.
 */
export const VERSION_HEADERS = ["Package-Version", "Version"];

/**
 * Minimal view of the VC layer needed for commit lookup.
 */
export interface WorkingRevisionSource {
	workingRevision(file: string): Promise<string | undefined>;
}

/**
 * Read the version declared by one file, or null.
 */
export function versionFromContent(content: string): string | null {
	for (const header of VERSION_HEADERS) {
		const value = readHeader(content, header);
		if (value) {
			return stripRcsId(value);
		}
	}
	return null;
}

/**
 * Determine the version of the package in `dir`.
 *
 * Files are visited shortest name first (the main file is usually the
 * shortest), and the first valid version header wins.
 *
 * @returns The version string, or "0" if no file declares one
 */
export async function packageVersion(
	dir: string,
	options: SourceScanOptions = {},
): Promise<string> {
	const order: FileOrder = options.order ?? byNameLength;
	const files = order(await listSourceFiles(dir));

	for (const file of files) {
		const content = await readFile(file, "utf-8");
		const version = versionFromContent(content);
		if (version) {
			return version;
		}
	}

	return FALLBACK_VERSION;
}

/**
 * Determine the commit of the package in `dir` by asking the VC layer
 * for the working revision of each source file in turn.
 *
 * This is a per-file stand-in for a per-directory query and can
 * report an older commit than the checkout's HEAD.
 *
 * @returns The first non-blank revision, or "unknown"
 */
export async function packageCommit(
	dir: string,
	vc: WorkingRevisionSource,
	options: SourceScanOptions = {},
): Promise<string> {
	const files = await listSourceFiles(dir);
	const ordered = options.order ? options.order(files) : files;

	for (const file of ordered) {
		const revision = await vc.workingRevision(file);
		if (revision?.trim()) {
			return revision.trim();
		}
	}

	return FALLBACK_COMMIT;
}
