/**
 * Installed package registry and activation.
 *
 * Installed packages are the directories under the package root that
 * contain a descriptor file. Activation is process-wide state: an
 * activated package's directory is on the load path and its source units
 * resolve to that directory.
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { findDescriptorFile, readDescriptorFile } from "./descriptor-file";
import { errorMessage, InvalidDescriptorError } from "./errors";
import type {
	DependencyRequirement,
	PackageDescriptor,
} from "./lib/descriptor";
import { listSourceFiles, SOURCE_EXTENSION } from "./lib/source-files";
import {
	compareVersionLists,
	joinVersion,
	versionAtLeast,
	type VersionList,
} from "./lib/version";

/** How deep below a package directory a descriptor may sit (lisp subdirectories) */
const MAX_DESCRIPTOR_DEPTH = 2;

/** Suffix of vc clone directories, stripped to get the package name */
const VC_DIR_PATTERN = /-vc$/;

export interface ActivateOptions {
	/** Re-activate if a package of that name is already active */
	reload: boolean;
	/** Activate dependencies first; fail if one is missing */
	deps: boolean;
}

/**
 * What the installer needs from the registry.
 */
export interface PackageRegistry {
	/** Read the descriptor in `dir`, `<name>-pkg.el` when `name` is given */
	loadDescriptor(dir: string, name?: string): Promise<PackageDescriptor>;
	activate(
		descriptor: PackageDescriptor,
		options: ActivateOptions,
	): Promise<boolean>;
	/** Units whose stale definitions were replaced by `descriptor` */
	reloadPreviouslyLoaded(descriptor: PackageDescriptor): Promise<string[]>;
	/** Whether an installed or builtin package satisfies `requirement` */
	isSatisfied(requirement: DependencyRequirement): Promise<boolean>;
	/** All installed packages */
	list(): Promise<PackageDescriptor[]>;
	deactivate(name: string): void;
}

export interface LocalRegistryOptions {
	/** Root directory holding one directory per installed package */
	packageDir: string;
	/** Packages provided by the host, by name */
	builtins?: Record<string, VersionList>;
}

function unitName(file: string): string {
	return basename(file, SOURCE_EXTENSION);
}

/**
 * Registry backed by the package root directory.
 */
export class LocalRegistry implements PackageRegistry {
	private readonly packageDir: string;
	private readonly builtins: Record<string, VersionList>;
	private readonly activated = new Map<string, PackageDescriptor>();
	/** unit name -> directory its definitions were loaded from */
	private readonly units = new Map<string, string>();
	/** package name -> units replaced by its latest activation */
	private readonly stale = new Map<string, string[]>();
	readonly loadPath: string[] = [];

	constructor(options: LocalRegistryOptions) {
		this.packageDir = options.packageDir;
		this.builtins = options.builtins ?? {};
	}

	/**
	 * Read the descriptor in `dir`. With `name`, only that package's
	 * descriptor file is read.
	 *
	 * @throws InvalidDescriptorError if there is none or it cannot be parsed
	 */
	async loadDescriptor(
		dir: string,
		name?: string,
	): Promise<PackageDescriptor> {
		const file = await findDescriptorFile(dir, name);
		if (!file) {
			throw new InvalidDescriptorError(dir, "no descriptor file found");
		}
		const descriptor = await readDescriptorFile(file);
		return { ...descriptor, dir };
	}

	async list(): Promise<PackageDescriptor[]> {
		let entries: string[];
		try {
			entries = await readdir(this.packageDir);
		} catch {
			return [];
		}

		const descriptors: PackageDescriptor[] = [];
		for (const entry of entries.sort()) {
			if (entry.startsWith(".")) continue;
			const descriptor = await this.findIn(
				join(this.packageDir, entry),
				entry.replace(VC_DIR_PATTERN, ""),
				0,
			);
			if (descriptor) {
				descriptors.push(descriptor);
			}
		}
		return descriptors;
	}

	/**
	 * The descriptor in `dir` or a subdirectory, preferring the one named
	 * after the package directory.
	 */
	private async findIn(
		dir: string,
		name: string,
		depth: number,
	): Promise<PackageDescriptor | null> {
		const file =
			(await findDescriptorFile(dir, name)) ?? (await findDescriptorFile(dir));
		if (file) {
			try {
				return { ...(await readDescriptorFile(file)), dir };
			} catch (error) {
				console.error(`Warning: skipping ${dir}: ${errorMessage(error)}`);
				return null;
			}
		}
		if (depth >= MAX_DESCRIPTOR_DEPTH) {
			return null;
		}

		let children: Dirent[];
		try {
			children = await readdir(dir, { withFileTypes: true });
		} catch {
			return null;
		}
		for (const child of children) {
			if (!child.isDirectory() || child.name.startsWith(".")) continue;
			const found = await this.findIn(
				join(dir, child.name),
				name,
				depth + 1,
			);
			if (found) {
				return found;
			}
		}
		return null;
	}

	/**
	 * The highest installed version of `name`, if any.
	 */
	async find(name: string): Promise<PackageDescriptor | undefined> {
		const candidates = (await this.list()).filter((d) => d.name === name);
		return candidates.sort((a, b) =>
			compareVersionLists(b.version, a.version),
		)[0];
	}

	async isSatisfied(requirement: DependencyRequirement): Promise<boolean> {
		const builtin = this.builtins[requirement.name];
		if (builtin) {
			return versionAtLeast(builtin, requirement.version);
		}
		const installed = await this.find(requirement.name);
		return installed
			? versionAtLeast(installed.version, requirement.version)
			: false;
	}

	isActivated(name: string): boolean {
		return this.activated.has(name);
	}

	/**
	 * Activate a package.
	 *
	 * @returns false if a dependency is missing or too old
	 */
	async activate(
		descriptor: PackageDescriptor,
		options: ActivateOptions,
	): Promise<boolean> {
		return this.activateOnce(descriptor, options, new Set());
	}

	private async activateOnce(
		descriptor: PackageDescriptor,
		options: ActivateOptions,
		visiting: Set<string>,
	): Promise<boolean> {
		const current = this.activated.get(descriptor.name);
		if (current && !options.reload) {
			return true;
		}
		if (visiting.has(descriptor.name)) {
			return true;
		}
		visiting.add(descriptor.name);

		if (options.deps) {
			for (const requirement of descriptor.requirements) {
				if (!(await this.activateDependency(requirement, visiting))) {
					console.error(
						`Cannot activate ${descriptor.name}: requires ${requirement.name} ${joinVersion(requirement.version)}`,
					);
					return false;
				}
			}
		}

		if (current?.dir) {
			const index = this.loadPath.indexOf(current.dir);
			if (index !== -1) this.loadPath.splice(index, 1);
		}
		if (descriptor.dir) {
			this.loadPath.unshift(descriptor.dir);
			await this.registerUnits(descriptor);
		}
		this.activated.set(descriptor.name, descriptor);

		if (process.env.VCPM_DEBUG) {
			console.log(`[registry] Activated ${descriptor.name} (${descriptor.dir})`);
		}
		return true;
	}

	private async activateDependency(
		requirement: DependencyRequirement,
		visiting: Set<string>,
	): Promise<boolean> {
		const builtin = this.builtins[requirement.name];
		if (builtin) {
			return versionAtLeast(builtin, requirement.version);
		}

		const active = this.activated.get(requirement.name);
		if (active && versionAtLeast(active.version, requirement.version)) {
			return true;
		}

		const installed = await this.find(requirement.name);
		if (!installed || !versionAtLeast(installed.version, requirement.version)) {
			return false;
		}
		return this.activateOnce(installed, { reload: true, deps: true }, visiting);
	}

	private async registerUnits(descriptor: PackageDescriptor): Promise<void> {
		if (!descriptor.dir) return;

		const replaced: string[] = [];
		for (const file of await listSourceFiles(descriptor.dir)) {
			const unit = unitName(file);
			if (this.units.has(unit)) {
				replaced.push(unit);
			}
			this.units.set(unit, descriptor.dir);
		}
		this.stale.set(descriptor.name, replaced);
	}

	async reloadPreviouslyLoaded(
		descriptor: PackageDescriptor,
	): Promise<string[]> {
		const replaced = this.stale.get(descriptor.name) ?? [];
		this.stale.delete(descriptor.name);
		for (const unit of replaced) {
			console.log(`Reloaded ${unit} from ${descriptor.dir}`);
		}
		return replaced;
	}

	deactivate(name: string): void {
		const current = this.activated.get(name);
		if (!current) return;

		this.activated.delete(name);
		if (current.dir) {
			const index = this.loadPath.indexOf(current.dir);
			if (index !== -1) this.loadPath.splice(index, 1);
			for (const [unit, dir] of this.units) {
				if (dir === current.dir) this.units.delete(unit);
			}
		}
	}
}
