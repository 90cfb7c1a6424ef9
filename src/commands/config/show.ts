import {
	findProjectConfig,
	getConfigPath,
	resolveConfig,
} from "../../config";
import { errorMessage } from "../../errors";
import { joinVersion } from "../../lib/index";

/**
 * Show resolved configuration
 */
export async function configShow(): Promise<void> {
	try {
		const resolved = await resolveConfig();
		const projectConfig = await findProjectConfig();
		const configPath = getConfigPath();

		console.log("Resolved Configuration:\n");
		console.log(`  Registry URL:     ${resolved.registryUrl}`);
		console.log(`  Package dir:      ${resolved.packageDir}`);
		console.log(`  Default backend:  ${resolved.defaultBackend}`);
		console.log(`  Clone timeout:    ${resolved.cloneTimeout}ms`);
		console.log(
			`  Compile command:  ${resolved.compileCommand || "(not set)"}`,
		);
		console.log(
			`  Native compile:   ${resolved.nativeCompileCommand || "(not set)"}`,
		);
		console.log("");
		console.log("Builtins:");
		for (const [name, version] of Object.entries(resolved.builtins)) {
			console.log(`  ${name} ${joinVersion(version)}`);
		}
		console.log("");
		console.log("Config Locations:");
		console.log(`  User config:    ${configPath}`);
		console.log(`  Project config: ${projectConfig?.path ?? "(none)"}`);
		console.log("");
		console.log("Environment Variables:");
		console.log(
			`  VCPM_REGISTRY_URL: ${process.env.VCPM_REGISTRY_URL || "(not set)"}`,
		);
		console.log(
			`  VCPM_PACKAGE_DIR:  ${process.env.VCPM_PACKAGE_DIR || "(not set)"}`,
		);
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		process.exit(1);
	}
}
