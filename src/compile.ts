/**
 * Compiling installed packages.
 *
 * Compilation is delegated to external commands from the configuration
 * (`compileCommand`, `nativeCompileCommand`). The package directory is
 * appended as the last argument; an unset command skips that step.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface Compiler {
	/** Compile the package in `dir`; awaited by the installer */
	compile(dir: string): Promise<void>;
	/** Slower optimising compilation; run in the background */
	compileNative(dir: string): Promise<void>;
}

export interface CommandCompilerOptions {
	compileCommand?: string;
	nativeCompileCommand?: string;
}

/**
 * Split a command line on whitespace, honouring double quotes.
 */
export function splitCommand(command: string): string[] {
	const parts = command.match(/"[^"]*"|\S+/g) ?? [];
	return parts.map((part) => part.replace(/^"(.*)"$/, "$1"));
}

export class CommandCompiler implements Compiler {
	constructor(private readonly options: CommandCompilerOptions) {}

	private async run(command: string | undefined, dir: string): Promise<void> {
		if (!command) {
			return;
		}
		const [file, ...args] = splitCommand(command);
		if (!file) {
			return;
		}
		if (process.env.VCPM_DEBUG) {
			console.log(`[compile] ${command} ${dir}`);
		}
		await execFileAsync(file, [...args, dir], { cwd: dir });
	}

	async compile(dir: string): Promise<void> {
		await this.run(this.options.compileCommand, dir);
	}

	async compileNative(dir: string): Promise<void> {
		await this.run(this.options.nativeCompileCommand, dir);
	}
}
