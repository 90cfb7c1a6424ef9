/**
 * Installing packages from version control.
 *
 * A vc install clones the upstream repository into
 * `<packageDir>/<name>-vc`, checks out the requested revision, installs
 * missing dependencies, generates the descriptor file and activates the
 * result. A failure after the clone leaves the checkout on disk; the
 * error names its path.
 */

import { mkdir, rm, stat } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, sep } from "node:path";
import type { Compiler } from "./compile";
import { getDescriptorPath, writeDescriptorFile } from "./descriptor-file";
import {
	AlreadyInstalledError,
	DependencyTransactionFailedError,
	errorMessage,
	InvalidSpecError,
	NoRepositoryError,
	UnknownPackageError,
} from "./errors";
import {
	checkoutTarget,
	type PackageDescriptor,
	type Upstream,
} from "./lib/descriptor";
import {
	extractRequirements,
	mergeRequirements,
} from "./lib/requirements";
import { formatVcSpec, guessBackend } from "./lib/specifier";
import type { PackageIndex } from "./package-index";
import type { PackageRegistry } from "./package-registry";
import { resolveRepositorySpec } from "./resolve";
import type { DependencyFetcher, TransactionInstaller } from "./transaction";
import type { VcCapability, WorkingCopy } from "./vc";

/** Suffix of the directory a vc package is cloned into */
export const VC_DIR_SUFFIX = "-vc";

export interface InstallerDependencies {
	/** Root directory holding installed packages */
	packageDir: string;
	vc: VcCapability;
	index: PackageIndex;
	transactions: TransactionInstaller;
	registry: PackageRegistry;
	compiler: Compiler;
	/** Asked before an existing target directory is deleted */
	confirmOverwrite: (name: string, dir: string) => Promise<boolean>;
	/** Backend for URLs that do not reveal theirs */
	defaultBackend: string;
}

export interface InstallResult {
	/** Descriptor as loaded back from the generated file */
	descriptor: PackageDescriptor;
	/** Package directory (clone root, or its lisp subdirectory) */
	dir: string;
	/** Whether activation succeeded */
	activated: boolean;
	/** Units whose previously loaded definitions were replaced */
	reloaded: string[];
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * Get the clone directory for a vc package
 */
export function getTargetDir(packageDir: string, name: string): string {
	return join(packageDir, `${name}${VC_DIR_SUFFIX}`);
}

export class PackageInstaller implements DependencyFetcher {
	private readonly locks = new Map<string, Promise<void>>();
	private readonly running = new Map<string, number>();

	constructor(private readonly deps: InstallerDependencies) {}

	/**
	 * Whether an install of `name` is queued or running in this process.
	 */
	isInstalling(name: string): boolean {
		return (this.running.get(name) ?? 0) > 0;
	}

	/**
	 * Install a resolved vc descriptor.
	 *
	 * Concurrent calls for the same name run one after the other.
	 *
	 * @throws AlreadyInstalledError if the target exists and overwrite was declined
	 * @throws NoRepositoryError if the descriptor has no upstream
	 * @throws InvalidSpecError if the subdirectory lies outside the checkout
	 * @throws CloneFailedError, CheckoutFailedError from the vc layer
	 * @throws MalformedRequirementsError if a Package-Requires header is invalid
	 * @throws DependencyTransactionFailedError if dependencies cannot be installed
	 * @throws DescriptorWriteFailedError if the descriptor cannot be written
	 */
	async install(descriptor: PackageDescriptor): Promise<InstallResult> {
		return this.withLock(descriptor.name, () => this.runInstall(descriptor));
	}

	/**
	 * Resolve `name` in the package index and install it.
	 */
	async installDependency(name: string): Promise<void> {
		const descriptor = await resolveRepositorySpec(
			{ nameOrUrl: name },
			this.deps.index,
		);
		await this.install(descriptor);
	}

	/**
	 * Clone and check out a package into `directory` without installing it.
	 *
	 * @throws AlreadyInstalledError if `directory` exists
	 */
	async checkout(
		descriptor: PackageDescriptor,
		directory: string,
	): Promise<WorkingCopy> {
		if (await exists(directory)) {
			throw new AlreadyInstalledError(descriptor.name, directory);
		}
		const upstream = descriptor.extras.upstream;
		if (!upstream) {
			throw new NoRepositoryError(descriptor.name);
		}

		await mkdir(dirname(directory), { recursive: true });
		return this.cloneAndCheckout(descriptor, upstream, directory);
	}

	/**
	 * Regenerate the descriptor of an installed vc package, reinstall its
	 * dependencies and activate it again.
	 *
	 * @throws UnknownPackageError if no vc package of that name is installed
	 */
	async rebuild(name: string): Promise<InstallResult> {
		return this.withLock(name, async () => {
			const installed = await this.findInstalled(name);
			const dir = installed.dir ?? getTargetDir(this.deps.packageDir, name);
			console.log(`Rebuilding ${name} in ${dir}...`);
			return this.finish(installed, dir, this.cloneRoot(dir));
		});
	}

	/**
	 * Delete an installed vc package and deactivate it.
	 *
	 * @returns The directory that was removed
	 * @throws UnknownPackageError if no vc package of that name is installed
	 */
	async remove(name: string): Promise<string> {
		return this.withLock(name, async () => {
			const installed = await this.findInstalled(name);
			const root = this.cloneRoot(
				installed.dir ?? getTargetDir(this.deps.packageDir, name),
			);
			this.deps.registry.deactivate(name);
			await rm(root, { recursive: true, force: true });
			console.log(`Removed ${name} (${root})`);
			return root;
		});
	}

	// ===========================================================================
	// Pipeline
	// ===========================================================================

	private async runInstall(
		descriptor: PackageDescriptor,
	): Promise<InstallResult> {
		const { name } = descriptor;
		const target = getTargetDir(this.deps.packageDir, name);

		if (await exists(target)) {
			if (!(await this.deps.confirmOverwrite(name, target))) {
				throw new AlreadyInstalledError(name, target);
			}
			console.log(`Removing existing ${target}...`);
			await rm(target, { recursive: true, force: true });
		}

		const upstream = descriptor.extras.upstream;
		if (!upstream) {
			throw new NoRepositoryError(name);
		}

		const pkgDir = upstream.lispDir ? join(target, upstream.lispDir) : target;
		const rel = relative(target, pkgDir);
		if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
			throw new InvalidSpecError(
				name,
				descriptor.extras.vcSpec ?? formatVcSpec(upstream),
				"The subdirectory must lie inside the checkout",
			);
		}

		await mkdir(dirname(target), { recursive: true });
		await this.cloneAndCheckout(descriptor, upstream, target);
		return this.finish(descriptor, pkgDir, target);
	}

	private async cloneAndCheckout(
		descriptor: PackageDescriptor,
		upstream: Upstream,
		dest: string,
	): Promise<WorkingCopy> {
		const backend =
			upstream.backend ?? guessBackend(upstream.url, this.deps.defaultBackend);

		console.log(
			`Cloning ${descriptor.name} from ${upstream.url} (${backend})...`,
		);
		const copy = await this.deps.vc.clone(backend, upstream.url, dest);

		const rev = checkoutTarget(descriptor);
		if (rev) {
			console.log(`Checking out ${rev}...`);
			await this.deps.vc.checkoutRevision(copy, rev);
		}
		return copy;
	}

	/**
	 * Dependencies, descriptor, activation and compilation for a package
	 * whose sources are in `pkgDir`.
	 */
	private async finish(
		descriptor: PackageDescriptor,
		pkgDir: string,
		cloneDir: string,
	): Promise<InstallResult> {
		const { name } = descriptor;
		const requirements = mergeRequirements(await extractRequirements(pkgDir));

		try {
			await this.deps.transactions.install(requirements);
		} catch (error) {
			throw new DependencyTransactionFailedError(
				`${errorMessage(error)} (checkout left in ${cloneDir})`,
				{ cause: error },
			);
		}

		await writeDescriptorFile(
			{ ...descriptor, dir: pkgDir, requirements },
			getDescriptorPath(pkgDir, name),
			{ vc: this.deps.vc },
		);

		const { registry, compiler } = this.deps;
		const loaded = await registry.loadDescriptor(pkgDir, name);
		const activated = await registry.activate(loaded, {
			reload: true,
			deps: true,
		});

		let reloaded: string[] = [];
		if (activated) {
			try {
				await compiler.compile(pkgDir);
			} catch (error) {
				console.error(
					`Warning: compiling ${name} failed: ${errorMessage(error)}`,
				);
			}
			compiler.compileNative(pkgDir).catch((error: unknown) => {
				console.error(
					`Warning: native compilation of ${name} failed: ${errorMessage(error)}`,
				);
			});
			reloaded = await registry.reloadPreviouslyLoaded(loaded);
		} else {
			console.error(`Warning: ${name} was installed but not activated`);
		}

		console.log(`Installed ${name} in ${pkgDir}`);
		return { descriptor: loaded, dir: pkgDir, activated, reloaded };
	}

	// ===========================================================================
	// Helpers
	// ===========================================================================

	private async findInstalled(name: string): Promise<PackageDescriptor> {
		const installed = (await this.deps.registry.list()).find(
			(descriptor) => descriptor.name === name && descriptor.kind === "vc",
		);
		if (!installed) {
			throw new UnknownPackageError(name);
		}
		return installed;
	}

	/**
	 * The top-level directory under the package root that holds `dir`.
	 */
	private cloneRoot(dir: string): string {
		const rel = relative(this.deps.packageDir, dir);
		if (!rel || rel.startsWith("..") || isAbsolute(rel)) {
			return dir;
		}
		const [first] = rel.split(sep);
		return first ? join(this.deps.packageDir, first) : dir;
	}

	private async withLock<T>(name: string, task: () => Promise<T>): Promise<T> {
		this.running.set(name, (this.running.get(name) ?? 0) + 1);

		const previous = this.locks.get(name) ?? Promise.resolve();
		const run = previous.then(task);
		const tail = run.then(
			() => undefined,
			() => undefined,
		);
		this.locks.set(name, tail);

		try {
			return await run;
		} finally {
			const count = (this.running.get(name) ?? 1) - 1;
			if (count > 0) {
				this.running.set(name, count);
			} else {
				this.running.delete(name);
			}
			if (this.locks.get(name) === tail) {
				this.locks.delete(name);
			}
		}
	}
}
