/**
 * Install command - Install a package from its version-control repository.
 *
 * Accepts a package name from the index (whose entry declares a vc spec)
 * or a repository URL.
 */

import { confirm } from "@inquirer/prompts";
import { loadContext } from "../context";
import { errorMessage } from "../errors";
import { joinVersion } from "../lib/index";
import { resolveRepositorySpec } from "../resolve";

export interface InstallOptions {
	/** Package name to use instead of the one derived from the input */
	name?: string;
	/** Revision to check out instead of the upstream branch */
	rev?: string;
	/** Overwrite an existing installation without asking */
	yes?: boolean;
}

/**
 * Ask before replacing an installed package.
 */
export function overwritePrompt(
	yes: boolean | undefined,
): (name: string, dir: string) => Promise<boolean> {
	return async (name, dir) => {
		if (yes) {
			return true;
		}
		return confirm({
			message: `${name} is already installed in ${dir}. Overwrite?`,
			default: false,
		});
	};
}

export async function install(
	nameOrUrl: string,
	options: InstallOptions,
): Promise<void> {
	try {
		const { index, installer } = await loadContext({
			confirmOverwrite: overwritePrompt(options.yes),
		});

		const descriptor = await resolveRepositorySpec(
			{ nameOrUrl, name: options.name, rev: options.rev },
			index,
		);
		const result = await installer.install(descriptor);

		console.log("");
		console.log(
			`${result.descriptor.name}@${joinVersion(result.descriptor.version)}`,
		);
		if (result.descriptor.extras.commit) {
			console.log(`  commit: ${result.descriptor.extras.commit}`);
		}
		for (const requirement of result.descriptor.requirements) {
			console.log(
				`  requires: ${requirement.name} ${joinVersion(requirement.version)}`,
			);
		}
		if (!result.activated) {
			console.log("  (not activated: missing dependencies)");
		}
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		process.exit(1);
	}
}
