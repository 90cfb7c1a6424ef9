/**
 * Dependency extraction from `Package-Requires` headers.
 *
 * ```
 * ;; Package-Requires: ((emacs "26.1") (dash "2.19") seq)
 * ```
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { MalformedRequirementsError } from "../errors";
import type { DependencyRequirement, RawRequirement } from "./descriptor";
import { readMultilineHeader } from "./headers";
import { isNil, isSymbol, readSexp, type SexpValue } from "./sexp";
import { listSourceFiles, type SourceScanOptions } from "./source-files";
import {
	compareVersionLists,
	tryVersionToList,
	versionToList,
} from "./version";

export const REQUIRES_HEADER = "Package-Requires";

/** Version assumed when an entry names a package without one */
const ANY_VERSION = "0";

function parseEntry(entry: SexpValue): RawRequirement | null {
	if (isSymbol(entry)) {
		return { name: entry.name, version: ANY_VERSION };
	}
	if (!Array.isArray(entry) || entry.length === 0 || entry.length > 2) {
		return null;
	}

	const [name, version] = entry;
	if (name === undefined || !isSymbol(name)) {
		return null;
	}
	if (version === undefined) {
		return { name: name.name, version: ANY_VERSION };
	}
	if (typeof version !== "string" || !tryVersionToList(version)) {
		return null;
	}
	return { name: name.name, version };
}

/**
 * Parse the text of a `Package-Requires` header.
 *
 * @param text - Header value, continuation lines already joined
 * @param source - File name used in error messages
 * @throws MalformedRequirementsError if the text is not a list of
 *   `(name "version")`, `(name)` or `name` entries
 */
export function parseRequirements(
	text: string,
	source: string,
): RawRequirement[] {
	let form: SexpValue;
	try {
		form = readSexp(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new MalformedRequirementsError(source, message);
	}

	if (isNil(form)) {
		return [];
	}
	if (!Array.isArray(form)) {
		throw new MalformedRequirementsError(source, "expected a list");
	}

	return form.map((entry) => {
		const parsed = parseEntry(entry);
		if (!parsed) {
			throw new MalformedRequirementsError(
				source,
				"each entry must be (name \"version\"), (name) or name",
			);
		}
		return parsed;
	});
}

/**
 * Requirements declared by one file's content, or [] if it has no header.
 */
export function requirementsFromContent(
	content: string,
	source: string,
): RawRequirement[] {
	const lines = readMultilineHeader(content, REQUIRES_HEADER);
	if (!lines) {
		return [];
	}
	return parseRequirements(lines.join(" "), source);
}

/**
 * Collect the raw requirements of every source file directly inside `dir`.
 *
 * Not deduplicated: the same name may appear once per declaring file.
 * See {@link mergeRequirements}.
 */
export async function extractRequirements(
	dir: string,
	options: SourceScanOptions = {},
): Promise<RawRequirement[]> {
	const files = await listSourceFiles(dir);
	const ordered = options.order ? options.order(files) : files;
	const requirements: RawRequirement[] = [];

	for (const file of ordered) {
		const content = await readFile(file, "utf-8");
		requirements.push(...requirementsFromContent(content, basename(file)));
	}

	return requirements;
}

/**
 * Deduplicate raw requirements by name and convert their versions.
 *
 * When several entries name the same package, the highest minimum version
 * wins; the package keeps the position of its first appearance.
 */
export function mergeRequirements(
	raw: RawRequirement[],
): DependencyRequirement[] {
	const merged = new Map<string, DependencyRequirement>();

	for (const { name, version } of raw) {
		const list = versionToList(version);
		const existing = merged.get(name);
		if (!existing) {
			merged.set(name, { name, version: list });
		} else if (compareVersionLists(list, existing.version) > 0) {
			existing.version = list;
		}
	}

	return [...merged.values()];
}
