import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	packageCommit,
	packageVersion,
	versionFromContent,
	type WorkingRevisionSource,
} from "./package-version";
import { directoryOrder } from "./source-files";

function revisions(map: Record<string, string>): WorkingRevisionSource {
	return {
		async workingRevision(file) {
			const name = file.split(/[\\/]/).pop() ?? "";
			return map[name];
		},
	};
}

describe("versionFromContent", () => {
	it("should prefer Package-Version over Version", () => {
		const content = ";; Version: 1.0\n;; Package-Version: 2.0\n";
		expect(versionFromContent(content)).toBe("2.0");
	});

	it("should strip revision keywords", () => {
		expect(versionFromContent(";; Version: $Revision: 1.4 $\n")).toBe("1.4");
	});

	it("should reject values that are not versions", () => {
		expect(versionFromContent(";; Version: tip\n")).toBeNull();
		expect(versionFromContent(";; Author: Someone\n")).toBeNull();
	});
});

describe("packageVersion", () => {
	const testDir = join(process.cwd(), ".test-package-version-temp");

	beforeEach(async () => {
		await mkdir(testDir, { recursive: true });
	});

	afterEach(async () => {
		await rm(testDir, { recursive: true, force: true });
	});

	it("should return 0 for a directory without source files", async () => {
		expect(await packageVersion(testDir)).toBe("0");
	});

	it("should return 0 when no file declares a version", async () => {
		await writeFile(join(testDir, "foo.el"), ";; Author: Someone\n");
		expect(await packageVersion(testDir)).toBe("0");
	});

	it("should take the version from the shortest file name", async () => {
		await writeFile(join(testDir, "foo-utils.el"), ";; Version: 3.0\n");
		await writeFile(join(testDir, "foo.el"), ";; Version: 1.2\n");
		await writeFile(join(testDir, "foo-core.el"), ";; Version: 2.0\n");

		expect(await packageVersion(testDir)).toBe("1.2");
	});

	it("should skip shorter files that declare no version", async () => {
		await writeFile(join(testDir, "a.el"), ";; Author: Someone\n");
		await writeFile(join(testDir, "foo-core.el"), ";; Version: 2.0\n");
		await writeFile(join(testDir, "foo-utils.el"), ";; Version: 3.0\n");

		expect(await packageVersion(testDir)).toBe("2.0");
	});

	it("should break length ties by directory order", async () => {
		await writeFile(join(testDir, "bbb.el"), ";; Version: 2.0\n");
		await writeFile(join(testDir, "aaa.el"), ";; Version: 1.0\n");

		expect(await packageVersion(testDir)).toBe("1.0");
	});

	it("should accept a custom file order", async () => {
		await writeFile(join(testDir, "foo.el"), ";; Version: 1.2\n");
		await writeFile(join(testDir, "foo-core.el"), ";; Version: 2.0\n");

		const longestFirst = (files: string[]) =>
			[...files].sort((a, b) => b.length - a.length);
		expect(await packageVersion(testDir, { order: longestFirst })).toBe("2.0");
	});
});

describe("packageCommit", () => {
	const testDir = join(process.cwd(), ".test-package-commit-temp");

	beforeEach(async () => {
		await mkdir(testDir, { recursive: true });
	});

	afterEach(async () => {
		await rm(testDir, { recursive: true, force: true });
	});

	it("should return unknown without VC metadata", async () => {
		await writeFile(join(testDir, "foo.el"), "");
		expect(await packageCommit(testDir, revisions({}))).toBe("unknown");
	});

	it("should return unknown for a directory without source files", async () => {
		expect(await packageCommit(testDir, revisions({}))).toBe("unknown");
	});

	it("should return the first non-blank revision in directory order", async () => {
		await writeFile(join(testDir, "aaa.el"), "");
		await writeFile(join(testDir, "bbb.el"), "");
		await writeFile(join(testDir, "ccc.el"), "");

		const vc = revisions({
			"aaa.el": "  ",
			"bbb.el": " abc123\n",
			"ccc.el": "def456",
		});
		expect(await packageCommit(testDir, vc)).toBe("abc123");
		expect(
			await packageCommit(testDir, vc, {
				order: (files) => directoryOrder(files).reverse(),
			}),
		).toBe("def456");
	});
});
