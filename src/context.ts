import { CommandCompiler } from "./compile";
import { type ResolvedConfig, resolveConfig } from "./config";
import { PackageInstaller } from "./installer";
import { ArchiveIndex } from "./package-index";
import { LocalRegistry } from "./package-registry";
import { VcTransactionInstaller } from "./transaction";
import { GitBackend, VcBackends } from "./vc";

export interface Context {
	config: ResolvedConfig;
	index: ArchiveIndex;
	registry: LocalRegistry;
	vc: VcBackends;
	installer: PackageInstaller;
}

export interface ContextOptions {
	/** Asked before an installed package directory is replaced */
	confirmOverwrite?: (name: string, dir: string) => Promise<boolean>;
}

/**
 * Build the installer and its collaborators from a resolved config.
 */
export function createContext(
	config: ResolvedConfig,
	options: ContextOptions = {},
): Context {
	const index = new ArchiveIndex(config.registryUrl);
	const registry = new LocalRegistry({
		packageDir: config.packageDir,
		builtins: config.builtins,
	});
	const vc = new VcBackends([new GitBackend({ timeout: config.cloneTimeout })]);
	const transactions = new VcTransactionInstaller(registry, index);

	const installer = new PackageInstaller({
		packageDir: config.packageDir,
		vc,
		index,
		transactions,
		registry,
		compiler: new CommandCompiler({
			compileCommand: config.compileCommand,
			nativeCompileCommand: config.nativeCompileCommand,
		}),
		confirmOverwrite: options.confirmOverwrite ?? (async () => false),
		defaultBackend: config.defaultBackend,
	});
	transactions.setFetcher(installer);

	return { config, index, registry, vc, installer };
}

/**
 * Resolve the configuration and build a context from it.
 */
export async function loadContext(
	options: ContextOptions = {},
): Promise<Context> {
	return createContext(await resolveConfig(), options);
}
