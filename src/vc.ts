/**
 * Version-control support.
 *
 * Packages are cloned with the backend's own command-line client.
 * Only git ships built in; other backends plug in through
 * {@link VcBackend}.
 */

import { execFile } from "node:child_process";
import { stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { promisify } from "node:util";
import {
	CheckoutFailedError,
	CloneFailedError,
	errorMessage,
} from "./errors";
import type { WorkingRevisionSource } from "./lib/package-version";

const execFileAsync = promisify(execFile);

/**
 * A checkout on local storage.
 */
export interface WorkingCopy {
	/** Backend token that produced the checkout */
	backend: string;
	/** Root directory of the checkout */
	dir: string;
}

/**
 * One version-control backend.
 */
export interface VcBackend {
	/** Backend token (e.g. "git") */
	readonly name: string;
	/** Clone `url` into `dest`; `dest` must not exist yet */
	clone(url: string, dest: string): Promise<void>;
	/** Check out `rev` (branch, tag or commit) in an existing clone */
	checkout(dir: string, rev: string): Promise<void>;
	/** Revision the file was last committed at, if the backend tracks it */
	workingRevision(file: string): Promise<string | undefined>;
	/** Whether `dir` looks like a checkout of this backend */
	isWorkingCopy(dir: string): Promise<boolean>;
}

/**
 * What the installer needs from the version-control layer.
 */
export interface VcCapability extends WorkingRevisionSource {
	clone(backend: string, url: string, dest: string): Promise<WorkingCopy>;
	checkoutRevision(copy: WorkingCopy, rev: string): Promise<void>;
}

export interface GitBackendOptions {
	/** Kill git after this many milliseconds (0 = no limit) */
	timeout?: number;
	/** git executable (default: "git") */
	command?: string;
}

/**
 * Message of a failed child process: its stderr if it wrote any.
 */
function processErrorMessage(error: unknown, timeout: number): string {
	if (error instanceof Error) {
		if ("killed" in error && error.killed && timeout > 0) {
			return `timed out after ${timeout}ms`;
		}
		const stderr =
			"stderr" in error && typeof error.stderr === "string"
				? error.stderr.trim()
				: "";
		return stderr || error.message;
	}
	return String(error);
}

/**
 * git backend using the git CLI.
 */
export class GitBackend implements VcBackend {
	readonly name = "git";
	private readonly timeout: number;
	private readonly command: string;

	constructor(options: GitBackendOptions = {}) {
		this.timeout = options.timeout ?? 0;
		this.command = options.command ?? "git";
	}

	private async run(args: string[], cwd?: string): Promise<string> {
		if (process.env.VCPM_DEBUG) {
			console.log(`[git] ${args.join(" ")}${cwd ? ` (in ${cwd})` : ""}`);
		}
		try {
			const { stdout } = await execFileAsync(this.command, args, {
				cwd,
				timeout: this.timeout,
			});
			return stdout;
		} catch (error) {
			throw new Error(processErrorMessage(error, this.timeout), {
				cause: error,
			});
		}
	}

	async clone(url: string, dest: string): Promise<void> {
		await this.run(["clone", "--quiet", url, dest]);
	}

	async checkout(dir: string, rev: string): Promise<void> {
		await this.run(["checkout", "--quiet", rev], dir);
	}

	async workingRevision(file: string): Promise<string | undefined> {
		try {
			const stdout = await this.run(
				["log", "-n", "1", "--format=%H", "--", basename(file)],
				dirname(file),
			);
			return stdout.trim() || undefined;
		} catch (error) {
			if (process.env.VCPM_DEBUG) {
				console.log(`[git] No revision for ${file}: ${errorMessage(error)}`);
			}
			return undefined;
		}
	}

	async isWorkingCopy(dir: string): Promise<boolean> {
		try {
			await stat(join(dir, ".git"));
			return true;
		} catch {
			return false;
		}
	}
}

/**
 * Dispatches to the backend named by each call.
 */
export class VcBackends implements VcCapability {
	private readonly backends = new Map<string, VcBackend>();

	constructor(backends: VcBackend[]) {
		for (const backend of backends) {
			this.backends.set(backend.name, backend);
		}
	}

	/**
	 * Registered backend tokens.
	 */
	names(): string[] {
		return [...this.backends.keys()];
	}

	private require(name: string): VcBackend | undefined {
		return this.backends.get(name);
	}

	async clone(backend: string, url: string, dest: string): Promise<WorkingCopy> {
		const impl = this.require(backend);
		if (!impl) {
			throw new CloneFailedError(
				url,
				`unsupported backend "${backend}" (available: ${this.names().join(", ")})`,
			);
		}

		try {
			await impl.clone(url, dest);
		} catch (error) {
			throw new CloneFailedError(url, errorMessage(error), { cause: error });
		}

		if (!(await impl.isWorkingCopy(dest))) {
			throw new CloneFailedError(url, `no working copy created in ${dest}`);
		}

		return { backend, dir: dest };
	}

	async checkoutRevision(copy: WorkingCopy, rev: string): Promise<void> {
		const impl = this.require(copy.backend);
		if (!impl) {
			throw new CheckoutFailedError(rev, `Unsupported backend "${copy.backend}"`);
		}

		try {
			await impl.checkout(copy.dir, rev);
		} catch (error) {
			throw new CheckoutFailedError(rev, errorMessage(error), { cause: error });
		}
	}

	async workingRevision(file: string): Promise<string | undefined> {
		for (const backend of this.backends.values()) {
			const revision = await backend.workingRevision(file);
			if (revision) {
				return revision;
			}
		}
		return undefined;
	}
}
