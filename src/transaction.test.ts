import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { DependencyTransactionFailedError } from "./errors";
import type { DependencyRequirement } from "./lib/descriptor";
import { compareVersionLists, type VersionList } from "./lib/version";
import type { IndexEntry, PackageIndex } from "./package-index";
import type { PackageRegistry } from "./package-registry";
import { type DependencyFetcher, VcTransactionInstaller } from "./transaction";

/**
 * Registry stub tracking installed versions in memory
 */
function fakeRegistry(installed: Map<string, VersionList>): PackageRegistry {
	return {
		loadDescriptor: vi.fn(),
		activate: vi.fn(),
		reloadPreviouslyLoaded: vi.fn(),
		list: vi.fn(async () => []),
		deactivate: vi.fn(),
		async isSatisfied(requirement) {
			const version = installed.get(requirement.name);
			return (
				version !== undefined &&
				compareVersionLists(version, requirement.version) >= 0
			);
		},
	};
}

function fakeIndex(entries: IndexEntry[]): PackageIndex {
	return {
		async lookup(name) {
			return entries.find((entry) => entry.name === name);
		},
	};
}

const INDEX = fakeIndex([
	{ name: "dash", vc: "git https://example.com/dash.git" },
	{ name: "seq", vc: "git https://example.com/seq.git" },
	{ name: "tarball-only", version: "1.0" },
]);

const req = (name: string, version: VersionList): DependencyRequirement => ({
	name,
	version,
});

describe("VcTransactionInstaller", () => {
	let installed: Map<string, VersionList>;
	let fetcher: DependencyFetcher & {
		installDependency: Mock<(name: string) => Promise<void>>;
	};
	let transactions: VcTransactionInstaller;

	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		installed = new Map([["emacs", [29, 1]]]);
		fetcher = {
			isInstalling: () => false,
			installDependency: vi.fn(async (name: string) => {
				installed.set(name, [99]);
			}),
		};
		transactions = new VcTransactionInstaller(
			fakeRegistry(installed),
			INDEX,
		);
		transactions.setFetcher(fetcher);
	});

	it("should do nothing when every requirement is satisfied", async () => {
		await transactions.install([req("emacs", [26, 1])]);

		expect(fetcher.installDependency).not.toHaveBeenCalled();
	});

	it("should install missing vc packages in order", async () => {
		await transactions.install([
			req("emacs", [26, 1]),
			req("seq", [2, 0]),
			req("dash", [2, 19]),
		]);

		expect(fetcher.installDependency.mock.calls).toEqual([["seq"], ["dash"]]);
	});

	it("should fail before installing when a requirement has no vc entry", async () => {
		await expect(
			transactions.install([
				req("dash", [2, 19]),
				req("tarball-only", [1, 0]),
				req("nowhere", [0]),
			]),
		).rejects.toThrow("Unsatisfied dependencies: tarball-only 1.0, nowhere 0");
		expect(fetcher.installDependency).not.toHaveBeenCalled();
	});

	it("should count an outdated installation as missing", async () => {
		installed.set("dash", [2, 14]);

		await transactions.install([req("dash", [2, 19])]);

		expect(fetcher.installDependency).toHaveBeenCalledWith("dash");
	});

	it("should skip packages that are already being installed", async () => {
		fetcher.isInstalling = (name) => name === "dash";

		await transactions.install([req("dash", [2, 19])]);

		expect(fetcher.installDependency).not.toHaveBeenCalled();
	});

	it("should wrap a failed dependency install", async () => {
		fetcher.installDependency.mockRejectedValueOnce(new Error("clone failed"));

		const error = await transactions
			.install([req("seq", [2, 0])])
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(DependencyTransactionFailedError);
		expect(error).toHaveProperty(
			"message",
			"Failed to install dependency seq: clone failed",
		);
	});

	it("should fail when the installed version is still too old", async () => {
		fetcher.installDependency.mockImplementationOnce(async (name: string) => {
			installed.set(name, [1, 0]);
		});

		await expect(transactions.install([req("seq", [2, 0])])).rejects.toThrow(
			"Installed seq does not satisfy seq 2.0",
		);
	});

	it("should fail without a fetcher", async () => {
		const bare = new VcTransactionInstaller(fakeRegistry(installed), INDEX);

		await expect(bare.install([req("seq", [2, 0])])).rejects.toThrow(
			"Cannot install seq 2.0: no installer configured",
		);
	});
});
