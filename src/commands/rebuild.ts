import { loadContext } from "../context";
import { errorMessage } from "../errors";
import { joinVersion } from "../lib/index";

/**
 * Regenerate the descriptor of an installed vc package and reactivate it
 */
export async function rebuild(name: string): Promise<void> {
	try {
		const { installer } = await loadContext();
		const result = await installer.rebuild(name);
		console.log(
			`Rebuilt ${result.descriptor.name}@${joinVersion(result.descriptor.version)}`,
		);
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		process.exit(1);
	}
}
