/**
 * List command - Show installed packages.
 *
 * Displays:
 * - Name and version
 * - Source kind (vc or archive)
 * - Upstream and commit for vc packages
 */

import { loadContext } from "../context";
import { errorMessage } from "../errors";
import { formatVcSpec, joinVersion } from "../lib/index";

export interface ListOptions {
	json?: boolean;
}

interface PackageListItem {
	name: string;
	version: string;
	kind: "vc" | "archive";
	dir?: string;
	upstream?: string;
	commit?: string;
}

export async function list(options: ListOptions): Promise<void> {
	try {
		const { registry, config } = await loadContext();
		const packages: PackageListItem[] = (await registry.list()).map(
			(descriptor) => ({
				name: descriptor.name,
				version: joinVersion(descriptor.version),
				kind: descriptor.kind,
				dir: descriptor.dir,
				upstream: descriptor.extras.upstream
					? formatVcSpec(descriptor.extras.upstream)
					: undefined,
				commit: descriptor.extras.commit,
			}),
		);

		if (options.json) {
			console.log(JSON.stringify(packages, null, 2));
			return;
		}

		if (packages.length === 0) {
			console.log(`No packages installed in ${config.packageDir}.`);
			return;
		}

		console.log(`Installed packages (${config.packageDir}):\n`);
		for (const pkg of packages) {
			console.log(`  ${pkg.name}@${pkg.version} [${pkg.kind}]`);
			if (pkg.upstream) {
				console.log(`    upstream: ${pkg.upstream}`);
			}
			if (pkg.commit) {
				console.log(`    commit:   ${pkg.commit}`);
			}
		}
		console.log(`\nTotal: ${packages.length} package(s)`);
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		process.exit(1);
	}
}
