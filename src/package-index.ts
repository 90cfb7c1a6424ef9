/**
 * Package index client
 *
 * The index is a JSON document (`archive-contents.json`) mapping package
 * names to their metadata. Packages installable from version control
 * carry a `vc` spec string:
 *
 * ```json
 * {
 *   "foo": {
 *     "version": "1.2",
 *     "summary": "Frobnicate things",
 *     "vc": "git https://example.com/foo.git lisp main"
 *   }
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { IndexFetchError } from "./errors";

export const INDEX_FILE = "archive-contents.json";

/**
 * One package entry in the index
 */
export interface IndexEntry {
	name: string;
	/** Latest archived version */
	version?: string;
	summary?: string;
	/** Free-form vc spec: backend location [subdir [branch]] */
	vc?: string;
}

/**
 * Package lookup by name.
 */
export interface PackageIndex {
	lookup(name: string): Promise<IndexEntry | undefined>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
	return typeof value === "string" ? value : undefined;
}

/**
 * Parse index JSON into entries. Malformed entries are skipped.
 */
export function parseIndex(data: unknown): Map<string, IndexEntry> {
	const entries = new Map<string, IndexEntry>();
	if (!isRecord(data)) {
		return entries;
	}

	for (const [name, value] of Object.entries(data)) {
		if (!isRecord(value)) continue;
		entries.set(name, {
			name,
			version: optionalString(value.version),
			summary: optionalString(value.summary),
			vc: optionalString(value.vc),
		});
	}

	return entries;
}

/**
 * Resolve the index document location from a registry setting.
 * A location that does not already name a .json file gets
 * `archive-contents.json` appended.
 */
export function getIndexLocation(registry: string): string {
	if (registry.endsWith(".json")) {
		return registry;
	}
	return `${registry.replace(/\/+$/, "")}/${INDEX_FILE}`;
}

/**
 * Index loaded once from an HTTP(S) URL, a file: URL or a local path.
 */
export class ArchiveIndex implements PackageIndex {
	private entries: Promise<Map<string, IndexEntry>> | null = null;
	readonly location: string;

	constructor(registry: string) {
		this.location = getIndexLocation(registry);
	}

	async lookup(name: string): Promise<IndexEntry | undefined> {
		if (!this.entries) {
			this.entries = this.load().catch((error: unknown) => {
				this.entries = null;
				throw error;
			});
		}
		const entries = await this.entries;
		return entries.get(name);
	}

	private async load(): Promise<Map<string, IndexEntry>> {
		if (process.env.VCPM_DEBUG) {
			console.log(`[index] Loading package index from: ${this.location}`);
		}

		const text = /^https?:\/\//i.test(this.location)
			? await this.fetchRemote()
			: await this.readLocal();

		let data: unknown;
		try {
			data = JSON.parse(text);
		} catch {
			throw new IndexFetchError(this.location);
		}

		const entries = parseIndex(data);
		if (process.env.VCPM_DEBUG) {
			console.log(`[index] Loaded ${entries.size} packages`);
		}
		return entries;
	}

	private async fetchRemote(): Promise<string> {
		const response = await fetch(this.location, {
			headers: { Accept: "application/json", "User-Agent": "vcpm" },
		});
		if (!response.ok) {
			throw new IndexFetchError(this.location, response.status);
		}
		return response.text();
	}

	private async readLocal(): Promise<string> {
		const path = this.location.startsWith("file:")
			? fileURLToPath(this.location)
			: this.location;
		try {
			return await readFile(path, "utf-8");
		} catch {
			throw new IndexFetchError(this.location);
		}
	}
}
