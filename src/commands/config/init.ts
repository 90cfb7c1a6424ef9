import { stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_FILE, formatConfigFile } from "../../config";
import { errorMessage } from "../../errors";

export interface ConfigInitOptions {
	registry?: string;
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
 * Create a .vcpmrc file in the current directory (INI format)
 */
export async function configInit(options: ConfigInitOptions): Promise<void> {
	try {
		const configPath = join(process.cwd(), CONFIG_FILE);

		if (await exists(configPath)) {
			console.error(`Error: ${CONFIG_FILE} already exists in this directory.`);
			process.exit(1);
		}

		let content = formatConfigFile(
			{ registry: options.registry },
			"Project-specific vcpm configuration",
		);
		if (!options.registry) {
			content +=
				"; Uncomment to use a custom registry:\n; registry = https://packages.example.com\n";
		}

		await writeFile(configPath, content);

		console.log(`Created ${CONFIG_FILE}`);
		console.log("");
		console.log("Contents:");
		console.log(content);
		console.log(`Note: ${CONFIG_FILE} should be committed to version control.`);
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		process.exit(1);
	}
}
