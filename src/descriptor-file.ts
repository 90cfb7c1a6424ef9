/**
 * Package descriptor files (`<name>-pkg.el`).
 *
 * A descriptor is a single `define-package` form:
 *
 * ```
 * ;;; Generated package description from foo.el  -*- no-byte-compile: t -*-
 * (define-package "foo" (vc . "1.2") "Frobnicate things" '((dash "2.19")) :upstream '(git "https://example.com/foo.git" nil nil) :commit "4f1c2e9")
 * ```
 *
 * Field order is fixed: name, version, summary, requirements, then
 * keyword/value extras.
 */

import { randomBytes } from "node:crypto";
import {
	open,
	readdir,
	readFile,
	rename,
	rm,
	writeFile,
} from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import {
	DescriptorWriteFailedError,
	errorMessage,
	InvalidDescriptorError,
} from "./errors";
import {
	createUpstream,
	DEFAULT_SUMMARY,
	type DependencyRequirement,
	type PackageDescriptor,
	type PackageExtras,
	type Upstream,
} from "./lib/descriptor";
import { readSummary } from "./lib/headers";
import {
	packageCommit,
	packageVersion,
	type WorkingRevisionSource,
} from "./lib/package-version";
import {
	cons,
	isCons,
	isNil,
	isSymbol,
	printSexp,
	quote,
	readSexp,
	type SexpValue,
	sym,
	unquote,
} from "./lib/sexp";
import { mainFilePath, type SourceScanOptions } from "./lib/source-files";
import { joinVersion, tryVersionToList } from "./lib/version";

export const DESCRIPTOR_SUFFIX = "-pkg.el";

/**
 * Get the descriptor file path for a package directory
 */
export function getDescriptorPath(dir: string, name: string): string {
	return join(dir, `${name}${DESCRIPTOR_SUFFIX}`);
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Quote a value unless it evaluates to itself.
 */
function quoteValue(value: SexpValue): SexpValue {
	if (typeof value === "string" || typeof value === "number") {
		return value;
	}
	if (isSymbol(value) && value.name.startsWith(":")) {
		return value;
	}
	return quote(value);
}

function optional(value: string | undefined): SexpValue {
	return value === undefined ? [] : value;
}

function upstreamToSexp(upstream: Upstream): SexpValue {
	return [
		upstream.backend ? sym(upstream.backend) : [],
		upstream.url,
		optional(upstream.lispDir),
		optional(upstream.branch),
	];
}

function extrasToPlist(extras: PackageExtras): SexpValue[] {
	const plist: SexpValue[] = [];

	if (extras.upstream) {
		plist.push(sym(":upstream"), quote(upstreamToSexp(extras.upstream)));
	}
	if (extras.commit) {
		plist.push(sym(":commit"), extras.commit);
	}
	for (const [key, value] of Object.entries(extras.other)) {
		plist.push(sym(`:${key}`), quoteValue(value));
	}

	return plist;
}

function requirementsToSexp(requirements: DependencyRequirement[]): SexpValue {
	if (requirements.length === 0) {
		return [];
	}
	return quote(
		requirements.map((req) => [sym(req.name), joinVersion(req.version)]),
	);
}

/**
 * Render the descriptor file content for a vc package.
 *
 * @param descriptor - The package being described
 * @param version - Version string to record (from the version lookup)
 */
export function formatDescriptor(
	descriptor: PackageDescriptor,
	version: string,
): string {
	const form: SexpValue[] = [
		sym("define-package"),
		descriptor.name,
		cons(sym("vc"), version),
		descriptor.summary,
		requirementsToSexp(descriptor.requirements),
		...extrasToPlist(descriptor.extras),
	];

	return [
		`;;; Generated package description from ${descriptor.name}.el  -*- no-byte-compile: t -*-`,
		printSexp(form),
		"",
	].join("\n");
}

// =============================================================================
// Writing
// =============================================================================

/**
 * Write content to a file atomically: temp file in the same directory,
 * fsync, then rename over the target.
 */
async function atomicWrite(filePath: string, content: string): Promise<void> {
	const tmpPath = join(
		dirname(filePath),
		`.${basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`,
	);

	try {
		await writeFile(tmpPath, content);
		const fd = await open(tmpPath, "r");
		try {
			await fd.sync();
		} finally {
			await fd.close();
		}
		await rename(tmpPath, filePath);
	} catch (error) {
		await rm(tmpPath, { force: true });
		throw error;
	}
}

/**
 * Summary from the main file's first line, or the default summary.
 */
async function summaryFromMainFile(dir: string, name: string): Promise<string> {
	try {
		const content = await readFile(mainFilePath(dir, name), "utf-8");
		return readSummary(content) ?? DEFAULT_SUMMARY;
	} catch {
		return DEFAULT_SUMMARY;
	}
}

export interface WriteDescriptorOptions extends SourceScanOptions {
	/** Used to record the commit of the checkout */
	vc: WorkingRevisionSource;
}

/**
 * Generate the descriptor file for an installed vc package.
 *
 * The version is looked up from the source files in the descriptor's
 * directory. A descriptor carrying the default summary picks up the
 * main file's summary line instead.
 *
 * @param descriptor - Package with `dir` set
 * @param pkgFile - Target path (usually {@link getDescriptorPath})
 * @returns The descriptor as written
 * @throws DescriptorWriteFailedError if the file cannot be written
 */
export async function writeDescriptorFile(
	descriptor: PackageDescriptor,
	pkgFile: string,
	options: WriteDescriptorOptions,
): Promise<PackageDescriptor> {
	const dir = descriptor.dir ?? dirname(pkgFile);
	const version = await packageVersion(dir, options);
	const commit = await packageCommit(dir, options.vc);
	const summary =
		descriptor.summary === DEFAULT_SUMMARY
			? await summaryFromMainFile(dir, descriptor.name)
			: descriptor.summary;

	const written: PackageDescriptor = {
		...descriptor,
		summary,
		extras: { ...descriptor.extras, commit },
	};

	try {
		await atomicWrite(pkgFile, formatDescriptor(written, version));
	} catch (error) {
		throw new DescriptorWriteFailedError(pkgFile, errorMessage(error), {
			cause: error,
		});
	}

	if (process.env.VCPM_DEBUG) {
		console.log(`[descriptor] Wrote ${pkgFile} (version ${version})`);
	}

	return written;
}

// =============================================================================
// Reading
// =============================================================================

function asOptionalString(value: SexpValue | undefined): string | undefined {
	return typeof value === "string" ? value : undefined;
}

function parseUpstream(value: SexpValue, path: string): Upstream {
	const list = unquote(value);
	if (!Array.isArray(list) || list.length < 2) {
		throw new InvalidDescriptorError(path, ":upstream must be a list");
	}

	const [backend, url, lispDir, branch] = list;
	if (typeof url !== "string") {
		throw new InvalidDescriptorError(
			path,
			":upstream location must be a string",
		);
	}

	return createUpstream({
		backend:
			backend !== undefined && isSymbol(backend) && !isNil(backend)
				? backend.name
				: undefined,
		url,
		lispDir: asOptionalString(lispDir),
		branch: asOptionalString(branch),
	});
}

function parseRequirementList(
	value: SexpValue | undefined,
	path: string,
): DependencyRequirement[] {
	if (value === undefined) {
		return [];
	}
	const list = unquote(value);
	if (isNil(list)) {
		return [];
	}
	if (!Array.isArray(list)) {
		throw new InvalidDescriptorError(path, "requirements must be a list");
	}

	return list.map((entry) => {
		const [name, version] = Array.isArray(entry) ? entry : [];
		const parsed =
			typeof version === "string" ? tryVersionToList(version) : null;
		if (name === undefined || !isSymbol(name) || !parsed) {
			throw new InvalidDescriptorError(
				path,
				`invalid requirement ${printSexp(entry)}`,
			);
		}
		return { name: name.name, version: parsed };
	});
}

/**
 * Parse descriptor file content.
 *
 * Accepts both the vc shape (`(vc . "1.2")`) and the archive shape
 * (a plain version string).
 */
export function parseDescriptor(
	content: string,
	path: string,
): PackageDescriptor {
	let form: SexpValue;
	try {
		form = readSexp(content);
	} catch (error) {
		throw new InvalidDescriptorError(path, errorMessage(error));
	}

	const head = Array.isArray(form) ? form[0] : undefined;
	if (!Array.isArray(form) || !head || !isSymbol(head, "define-package")) {
		throw new InvalidDescriptorError(path, "expected a define-package form");
	}

	const [, nameValue, versionValue, summaryValue, requiresValue, ...plist] =
		form;

	const name =
		typeof nameValue === "string"
			? nameValue
			: nameValue !== undefined && isSymbol(nameValue)
				? nameValue.name
				: null;
	if (!name) {
		throw new InvalidDescriptorError(path, "missing package name");
	}

	let kind: PackageDescriptor["kind"] = "archive";
	let versionString: string | undefined;
	if (typeof versionValue === "string") {
		versionString = versionValue;
	} else if (
		versionValue !== undefined &&
		isCons(versionValue) &&
		isSymbol(versionValue.car, "vc") &&
		typeof versionValue.cdr === "string"
	) {
		kind = "vc";
		versionString = versionValue.cdr;
	}
	const version = versionString ? tryVersionToList(versionString) : null;
	if (!version) {
		throw new InvalidDescriptorError(path, "missing or invalid version");
	}

	if (plist.length % 2 !== 0) {
		throw new InvalidDescriptorError(
			path,
			"extras must be keyword/value pairs",
		);
	}

	const extras: PackageExtras = { other: {} };
	for (let i = 0; i < plist.length; i += 2) {
		const key = plist[i];
		const value = plist[i + 1];
		if (
			key === undefined ||
			value === undefined ||
			!isSymbol(key) ||
			!key.name.startsWith(":")
		) {
			throw new InvalidDescriptorError(
				path,
				"extras must be keyword/value pairs",
			);
		}

		const field = key.name.slice(1);
		if (field === "upstream") {
			extras.upstream = parseUpstream(value, path);
		} else if (field === "commit" && typeof value === "string") {
			extras.commit = value;
		} else {
			extras.other[field] = unquote(value);
		}
	}

	return {
		name,
		kind,
		version,
		summary: typeof summaryValue === "string" ? summaryValue : DEFAULT_SUMMARY,
		requirements: parseRequirementList(requiresValue, path),
		extras,
	};
}

/**
 * Read and parse a descriptor file.
 */
export async function readDescriptorFile(
	path: string,
): Promise<PackageDescriptor> {
	const content = await readFile(path, "utf-8");
	return parseDescriptor(content, path);
}

/**
 * Find the descriptor file in a package directory.
 *
 * With `name`, only `<name>-pkg.el` counts; otherwise the first
 * descriptor file in name order.
 *
 * @returns The path, or null if the directory holds none
 */
export async function findDescriptorFile(
	dir: string,
	name?: string,
): Promise<string | null> {
	let entries: string[];
	try {
		entries = await readdir(dir);
	} catch {
		return null;
	}

	const candidates = entries.filter((e) => e.endsWith(DESCRIPTOR_SUFFIX));
	const file =
		name !== undefined
			? candidates.find((e) => e === `${name}${DESCRIPTOR_SUFFIX}`)
			: candidates.sort()[0];
	return file ? join(dir, file) : null;
}
