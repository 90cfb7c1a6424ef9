/**
 * Checkout command - Clone a package's repository into a directory of
 * your choice without installing it.
 */

import { resolve } from "node:path";
import { loadContext } from "../context";
import { errorMessage } from "../errors";
import { resolveRepositorySpec } from "../resolve";

export interface CheckoutOptions {
	rev?: string;
}

export async function checkout(
	nameOrUrl: string,
	directory: string,
	options: CheckoutOptions,
): Promise<void> {
	try {
		const { index, installer } = await loadContext();
		const descriptor = await resolveRepositorySpec(
			{ nameOrUrl, rev: options.rev },
			index,
		);

		const copy = await installer.checkout(descriptor, resolve(directory));
		console.log(`Checked out ${descriptor.name} into ${copy.dir}`);
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		process.exit(1);
	}
}
