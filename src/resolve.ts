/**
 * Turning user input into a vc package descriptor.
 *
 * Input is either a repository URL or the name of a package in the
 * package index whose entry declares a vc spec.
 */

import {
	InvalidSpecError,
	NoVcHeaderError,
	UnknownPackageError,
} from "./errors";
import {
	createUpstream,
	createVcDescriptor,
	type PackageDescriptor,
} from "./lib/descriptor";
import {
	isUrlSpecifier,
	packageNameFromUrl,
	parseVcSpec,
} from "./lib/specifier";
import type { PackageIndex } from "./package-index";

export interface ResolveInput {
	/** Repository URL or package name */
	nameOrUrl: string;
	/** Package name to use instead of the derived one */
	name?: string;
	/** Revision to check out */
	rev?: string;
}

/**
 * Resolve input to a descriptor that is ready to install.
 *
 * @throws UnknownPackageError if the input is empty, or a name the index does not know
 * @throws NoVcHeaderError if the index entry has no vc spec
 * @throws InvalidSpecError if the vc spec does not match the grammar
 */
export async function resolveRepositorySpec(
	input: ResolveInput,
	index: PackageIndex,
): Promise<PackageDescriptor> {
	const nameOrUrl = input.nameOrUrl.trim();
	if (!nameOrUrl) {
		throw new UnknownPackageError(nameOrUrl);
	}

	if (isUrlSpecifier(nameOrUrl)) {
		const name = input.name ?? packageNameFromUrl(nameOrUrl);
		if (!name) {
			throw new UnknownPackageError(nameOrUrl);
		}
		return createVcDescriptor({
			name,
			upstream: createUpstream({ url: nameOrUrl }),
			rev: input.rev,
		});
	}

	const entry = await index.lookup(nameOrUrl);
	if (!entry) {
		throw new UnknownPackageError(nameOrUrl);
	}
	if (!entry.vc) {
		throw new NoVcHeaderError(entry.name);
	}

	const upstream = parseVcSpec(entry.vc);
	if (!upstream) {
		throw new InvalidSpecError(entry.name, entry.vc);
	}

	if (process.env.VCPM_DEBUG) {
		console.log(`[resolve] ${entry.name}: ${entry.vc}`);
	}

	return createVcDescriptor({
		name: input.name ?? entry.name,
		upstream,
		summary: entry.summary,
		rev: input.rev,
		vcSpec: entry.vc,
	});
}
