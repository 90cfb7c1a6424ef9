/**
 * Remove command - Delete an installed vc package.
 */

import { loadContext } from "../context";
import { errorMessage } from "../errors";

export async function remove(name: string): Promise<void> {
	try {
		const { installer } = await loadContext();
		await installer.remove(name);
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		process.exit(1);
	}
}
