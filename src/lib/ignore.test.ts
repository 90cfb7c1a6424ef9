import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	ALWAYS_IGNORED,
	ELPAIGNORE_FILE,
	loadIgnorePatterns,
	parseIgnorePatterns,
} from "./ignore";
import { listSourceFiles } from "./source-files";

describe("parseIgnorePatterns", () => {
	it("should parse patterns from content", () => {
		const content = `
# Comment line
test
*-tests.el

# Another comment
make-docs.el
`;
		const patterns = parseIgnorePatterns(content);
		expect(patterns).toEqual(["test", "*-tests.el", "make-docs.el"]);
	});

	it("should handle empty content", () => {
		expect(parseIgnorePatterns("")).toEqual([]);
	});

	it("should handle content with only comments", () => {
		const content = `# Comment 1
# Comment 2`;
		expect(parseIgnorePatterns(content)).toEqual([]);
	});

	it("should trim whitespace from patterns", () => {
		const content = "  test  \n  docs  ";
		expect(parseIgnorePatterns(content)).toEqual(["test", "docs"]);
	});
});

describe("ALWAYS_IGNORED", () => {
	it("should cover generated and directory-local files", () => {
		expect(ALWAYS_IGNORED).toEqual([
			"*-pkg.el",
			"*-autoloads.el",
			".dir-locals.el",
		]);
	});
});

describe("loadIgnorePatterns", () => {
	const testDir = join(process.cwd(), ".test-ignore-temp");

	beforeEach(async () => {
		await mkdir(testDir, { recursive: true });
	});

	afterEach(async () => {
		await rm(testDir, { recursive: true, force: true });
	});

	it("should use defaults when no .elpaignore exists", async () => {
		const result = await loadIgnorePatterns(testDir);

		expect(result.source).toBeNull();
		expect(result.patterns).toEqual([]);
		expect(result.ig.ignores("foo-pkg.el")).toBe(true);
		expect(result.ig.ignores("foo-autoloads.el")).toBe(true);
		expect(result.ig.ignores(".dir-locals.el")).toBe(true);
		expect(result.ig.ignores("foo.el")).toBe(false);
	});

	it("should load patterns from .elpaignore", async () => {
		await writeFile(join(testDir, ELPAIGNORE_FILE), "*-tests.el\ndocs\n");

		const result = await loadIgnorePatterns(testDir);

		expect(result.source).toBe(".elpaignore");
		expect(result.patterns).toEqual(["*-tests.el", "docs"]);
		expect(result.ig.ignores("foo-tests.el")).toBe(true);
		expect(result.ig.ignores("foo-pkg.el")).toBe(true);
		expect(result.ig.ignores("foo.el")).toBe(false);
	});
});

describe("listSourceFiles", () => {
	const testDir = join(process.cwd(), ".test-source-files-temp");

	beforeEach(async () => {
		await mkdir(testDir, { recursive: true });
	});

	afterEach(async () => {
		await rm(testDir, { recursive: true, force: true });
	});

	it("should list .el files directly inside the directory, alphabetically", async () => {
		await writeFile(join(testDir, "foo.el"), "");
		await writeFile(join(testDir, "bar.el"), "");
		await writeFile(join(testDir, "README.md"), "");
		await mkdir(join(testDir, "lisp"));
		await writeFile(join(testDir, "lisp", "nested.el"), "");

		expect(await listSourceFiles(testDir)).toEqual([
			join(testDir, "bar.el"),
			join(testDir, "foo.el"),
		]);
	});

	it("should skip descriptor, autoload and ignored files", async () => {
		await writeFile(join(testDir, "foo.el"), "");
		await writeFile(join(testDir, "foo-pkg.el"), "");
		await writeFile(join(testDir, "foo-autoloads.el"), "");
		await writeFile(join(testDir, "foo-tests.el"), "");
		await writeFile(join(testDir, ELPAIGNORE_FILE), "*-tests.el\n");

		expect(await listSourceFiles(testDir)).toEqual([join(testDir, "foo.el")]);
	});

	it("should return an empty list for a missing directory", async () => {
		expect(await listSourceFiles(join(testDir, "missing"))).toEqual([]);
	});
});
