/**
 * Dependency transactions.
 *
 * Given the requirements of a freshly cloned package, make sure every one
 * of them is installed before the package is activated.
 */

import { DependencyTransactionFailedError, errorMessage } from "./errors";
import type { DependencyRequirement } from "./lib/descriptor";
import { joinVersion } from "./lib/version";
import type { PackageIndex } from "./package-index";
import type { PackageRegistry } from "./package-registry";

/**
 * Installs whatever part of a requirement list is not yet satisfied.
 */
export interface TransactionInstaller {
	install(requirements: DependencyRequirement[]): Promise<void>;
}

/**
 * Installs one dependency by name (from version control).
 */
export interface DependencyFetcher {
	/** Whether an install of `name` is already in progress */
	isInstalling(name: string): boolean;
	installDependency(name: string): Promise<void>;
}

function describe(requirement: DependencyRequirement): string {
	return `${requirement.name} ${joinVersion(requirement.version)}`;
}

/**
 * Satisfies requirements from the local registry, installing missing
 * packages whose index entry declares a vc spec.
 *
 * Requirements that are neither installed nor installable from version
 * control fail the whole transaction before anything is installed.
 */
export class VcTransactionInstaller implements TransactionInstaller {
	private fetcher: DependencyFetcher | null = null;

	constructor(
		private readonly registry: PackageRegistry,
		private readonly index: PackageIndex,
	) {}

	/**
	 * Set who installs missing dependencies. Must be called before
	 * {@link install} is given an unsatisfied requirement.
	 */
	setFetcher(fetcher: DependencyFetcher): void {
		this.fetcher = fetcher;
	}

	async install(requirements: DependencyRequirement[]): Promise<void> {
		const missing: DependencyRequirement[] = [];
		for (const requirement of requirements) {
			if (this.fetcher?.isInstalling(requirement.name)) continue;
			if (await this.registry.isSatisfied(requirement)) continue;
			missing.push(requirement);
		}

		if (missing.length === 0) {
			return;
		}

		const unavailable: string[] = [];
		for (const requirement of missing) {
			const entry = await this.index.lookup(requirement.name);
			if (!entry?.vc) {
				unavailable.push(describe(requirement));
			}
		}
		if (unavailable.length > 0) {
			throw new DependencyTransactionFailedError(
				`Unsatisfied dependencies: ${unavailable.join(", ")}`,
			);
		}

		const fetcher = this.fetcher;
		if (!fetcher) {
			throw new DependencyTransactionFailedError(
				`Cannot install ${missing.map(describe).join(", ")}: no installer configured`,
			);
		}

		for (const requirement of missing) {
			console.log(`Installing dependency ${describe(requirement)}...`);
			try {
				await fetcher.installDependency(requirement.name);
			} catch (error) {
				throw new DependencyTransactionFailedError(
					`Failed to install dependency ${requirement.name}: ${errorMessage(error)}`,
					{ cause: error },
				);
			}

			if (!(await this.registry.isSatisfied(requirement))) {
				throw new DependencyTransactionFailedError(
					`Installed ${requirement.name} does not satisfy ${describe(requirement)}`,
				);
			}
		}
	}
}
