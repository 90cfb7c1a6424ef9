import { readFile, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import * as ini from "ini";
import { ConfigError } from "./errors";
import { tryVersionToList, type VersionList } from "./lib/version";

// =============================================================================
// Types
// =============================================================================

/**
 * Settings read from a .vcpmrc file (INI format)
 *
 * ```ini
 * registry = https://packages.example.com
 * packageDir = ~/.vcpm/packages
 * defaultBackend = git
 * cloneTimeout = 120000
 * compileCommand = emacs --batch -f batch-byte-compile-directory
 *
 * [builtins]
 * emacs = 29.1
 * ```
 */
export interface FileConfig {
	registry?: string;
	packageDir?: string;
	defaultBackend?: string;
	cloneTimeout?: string;
	compileCommand?: string;
	nativeCompileCommand?: string;
	/** Packages the host provides, name -> version */
	builtins?: Record<string, string>;
}

/**
 * A project .vcpmrc and where it was found
 */
export interface ProjectConfig {
	path: string;
	config: FileConfig;
}

/**
 * Fully resolved configuration (after cascade)
 */
export interface ResolvedConfig {
	registryUrl: string;
	packageDir: string;
	defaultBackend: string;
	/** Milliseconds; 0 disables the limit */
	cloneTimeout: number;
	compileCommand?: string;
	nativeCompileCommand?: string;
	builtins: Record<string, VersionList>;
}

// =============================================================================
// Constants
// =============================================================================

export const CONFIG_FILE = ".vcpmrc";

const DEFAULT_REGISTRY_URL = "https://packages.vcpm.dev";
const DEFAULT_BACKEND = "git";
const DEFAULT_CLONE_TIMEOUT = 5 * 60 * 1000;
const DEFAULT_BUILTINS: Record<string, string> = { emacs: "29.1" };

/**
 * Get the user config file path (~/.vcpmrc)
 */
export function getConfigPath(): string {
	return join(homedir(), CONFIG_FILE);
}

/**
 * Get the default package directory (~/.vcpm/packages)
 */
export function getDefaultPackageDir(): string {
	return join(homedir(), ".vcpm", "packages");
}

function expandHome(path: string): string {
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return join(homedir(), path.slice(2));
	return path;
}

// =============================================================================
// INI Config Functions
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringValue(value: unknown): string | undefined {
	if (typeof value === "string") return value.trim() || undefined;
	if (typeof value === "number") return String(value);
	return undefined;
}

/**
 * Parse the contents of a .vcpmrc file
 */
export function parseConfigFile(content: string): FileConfig {
	const parsed: unknown = ini.parse(content);
	if (!isRecord(parsed)) {
		return {};
	}

	let builtins: Record<string, string> | undefined;
	const section = parsed.builtins;
	if (isRecord(section)) {
		builtins = {};
		for (const [name, value] of Object.entries(section)) {
			const version = stringValue(value);
			if (version) builtins[name] = version;
		}
	}

	return {
		registry: stringValue(parsed.registry),
		packageDir: stringValue(parsed.packageDir),
		defaultBackend: stringValue(parsed.defaultBackend),
		cloneTimeout: stringValue(parsed.cloneTimeout),
		compileCommand: stringValue(parsed.compileCommand),
		nativeCompileCommand: stringValue(parsed.nativeCompileCommand),
		builtins,
	};
}

async function readConfigFile(path: string): Promise<FileConfig | null> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch {
		return null;
	}

	const config = parseConfigFile(content);
	if (process.env.VCPM_DEBUG) {
		console.log(`[config] Read ${path}:`, JSON.stringify(config, null, 2));
	}
	return config;
}

/**
 * Read the user config file (~/.vcpmrc)
 */
export async function readUserConfig(): Promise<FileConfig> {
	return (await readConfigFile(getConfigPath())) ?? {};
}

/**
 * Find the project config (.vcpmrc) by searching up from the current
 * directory. Relative paths in it are made absolute against its directory.
 *
 * @returns The config and the file it was read from, or null
 */
export async function findProjectConfig(): Promise<ProjectConfig | null> {
	const userConfig = getConfigPath();
	let currentDir = process.cwd();

	while (true) {
		const configPath = join(currentDir, CONFIG_FILE);
		if (configPath !== userConfig) {
			try {
				const stats = await stat(configPath);
				if (stats.isFile()) {
					const config = (await readConfigFile(configPath)) ?? {};
					if (config.packageDir) {
						config.packageDir = resolve(
							currentDir,
							expandHome(config.packageDir),
						);
					}
					return { path: configPath, config };
				}
			} catch {
				// not here, keep searching
			}
		}

		const parent = dirname(currentDir);
		if (parent === currentDir) {
			return null;
		}
		currentDir = parent;
	}
}

/**
 * Render a config file with a leading comment
 */
export function formatConfigFile(config: FileConfig, title: string): string {
	const { builtins, ...settings } = config;
	const lines: string[] = [`; ${title}`, ""];

	for (const [key, value] of Object.entries(settings)) {
		if (value !== undefined) {
			lines.push(`${key} = ${value}`);
		}
	}
	if (builtins && Object.keys(builtins).length > 0) {
		lines.push("", "[builtins]");
		for (const [name, version] of Object.entries(builtins)) {
			lines.push(`${name} = ${version}`);
		}
	}

	lines.push("");
	return lines.join("\n");
}

// =============================================================================
// Resolution
// =============================================================================

function parseTimeout(value: string): number {
	const timeout = Number(value);
	if (!Number.isInteger(timeout) || timeout < 0) {
		throw new ConfigError(
			`Invalid cloneTimeout "${value}": expected a non-negative integer (milliseconds)`,
		);
	}
	return timeout;
}

function parseBuiltins(
	builtins: Record<string, string>,
): Record<string, VersionList> {
	const parsed: Record<string, VersionList> = {};
	for (const [name, version] of Object.entries(builtins)) {
		const list = tryVersionToList(version);
		if (!list) {
			throw new ConfigError(`Invalid version "${version}" for builtin ${name}`);
		}
		parsed[name] = list;
	}
	return parsed;
}

/**
 * Merge config layers, later layers winning, then apply defaults.
 * Builtins are merged per package.
 *
 * @throws ConfigError if a value does not parse
 */
export function mergeConfigs(...layers: FileConfig[]): ResolvedConfig {
	const merged: FileConfig = {};
	const builtins: Record<string, string> = { ...DEFAULT_BUILTINS };

	for (const layer of layers) {
		for (const [key, value] of Object.entries(layer)) {
			if (key !== "builtins" && value !== undefined) {
				Object.assign(merged, { [key]: value });
			}
		}
		Object.assign(builtins, layer.builtins);
	}

	return {
		registryUrl: merged.registry ?? DEFAULT_REGISTRY_URL,
		packageDir: merged.packageDir
			? expandHome(merged.packageDir)
			: getDefaultPackageDir(),
		defaultBackend: merged.defaultBackend ?? DEFAULT_BACKEND,
		cloneTimeout:
			merged.cloneTimeout !== undefined
				? parseTimeout(merged.cloneTimeout)
				: DEFAULT_CLONE_TIMEOUT,
		compileCommand: merged.compileCommand,
		nativeCompileCommand: merged.nativeCompileCommand,
		builtins: parseBuiltins(builtins),
	};
}

/**
 * Settings taken from environment variables
 */
export function envConfig(env: NodeJS.ProcessEnv = process.env): FileConfig {
	return {
		registry: env.VCPM_REGISTRY_URL || undefined,
		packageDir: env.VCPM_PACKAGE_DIR || undefined,
	};
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Environment variables (VCPM_REGISTRY_URL, VCPM_PACKAGE_DIR)
 * 2. Project config (.vcpmrc in project directory or a parent)
 * 3. User config (~/.vcpmrc)
 * 4. Defaults
 */
export async function resolveConfig(): Promise<ResolvedConfig> {
	const userConfig = await readUserConfig();
	const projectConfig = await findProjectConfig();

	const resolved = mergeConfigs(
		userConfig,
		projectConfig?.config ?? {},
		envConfig(),
	);

	if (process.env.VCPM_DEBUG) {
		console.log("[config] Resolved config:");
		console.log(`[config]   registryUrl: ${resolved.registryUrl}`);
		console.log(`[config]   packageDir: ${resolved.packageDir}`);
		console.log(`[config]   defaultBackend: ${resolved.defaultBackend}`);
		console.log(`[config]   cloneTimeout: ${resolved.cloneTimeout}`);
		console.log(
			`[config]   builtins: ${Object.keys(resolved.builtins).join(", ")}`,
		);
	}

	return resolved;
}
