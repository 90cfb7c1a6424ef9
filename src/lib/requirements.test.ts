import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MalformedRequirementsError } from "../errors";
import {
	extractRequirements,
	mergeRequirements,
	parseRequirements,
	requirementsFromContent,
} from "./requirements";
import { byNameLength } from "./source-files";

describe("parseRequirements", () => {
	it("should parse name/version pairs", () => {
		const text = '((emacs "26.1") (dash "2.19"))';
		expect(parseRequirements(text, "a.el")).toEqual([
			{ name: "emacs", version: "26.1" },
			{ name: "dash", version: "2.19" },
		]);
	});

	it("should default missing versions to 0", () => {
		expect(parseRequirements("((seq) compat)", "a.el")).toEqual([
			{ name: "seq", version: "0" },
			{ name: "compat", version: "0" },
		]);
	});

	it("should treat nil and () as no requirements", () => {
		expect(parseRequirements("nil", "a.el")).toEqual([]);
		expect(parseRequirements("()", "a.el")).toEqual([]);
	});

	it("should reject entries of the wrong shape", () => {
		expect(() => parseRequirements('(("dash" "2.19"))', "a.el")).toThrow(
			MalformedRequirementsError,
		);
		expect(() => parseRequirements('((dash "2.19" "x"))', "a.el")).toThrow(
			MalformedRequirementsError,
		);
		expect(() => parseRequirements("((dash 2))", "a.el")).toThrow(
			MalformedRequirementsError,
		);
	});

	it("should reject invalid version strings", () => {
		expect(() => parseRequirements('((dash "latest"))', "a.el")).toThrow(
			MalformedRequirementsError,
		);
	});

	it("should reject text that is not a list", () => {
		expect(() => parseRequirements('"dash"', "a.el")).toThrow(
			"Malformed Package-Requires header in a.el: expected a list",
		);
		expect(() => parseRequirements("((dash", "a.el")).toThrow(
			MalformedRequirementsError,
		);
	});
});

describe("requirementsFromContent", () => {
	it("should join continuation lines", () => {
		const content = `;;; foo.el --- Foo
;; Package-Requires: ((emacs "26.1")
;;                    (dash "2.19"))
;;; Code:
`;
		expect(requirementsFromContent(content, "foo.el")).toEqual([
			{ name: "emacs", version: "26.1" },
			{ name: "dash", version: "2.19" },
		]);
	});

	it("should ignore a comment line right after the header", () => {
		const content = `;; Package-Requires: ((emacs "26.1"))
;; This file is not part of GNU Emacs.

;;; Code:
`;
		expect(requirementsFromContent(content, "foo.el")).toEqual([
			{ name: "emacs", version: "26.1" },
		]);
	});

	it("should return nothing without a header", () => {
		expect(requirementsFromContent(";; Version: 1.0\n", "foo.el")).toEqual([]);
	});
});

describe("mergeRequirements", () => {
	it("should keep the highest minimum version for a repeated name", () => {
		expect(
			mergeRequirements([
				{ name: "dash", version: "2.14" },
				{ name: "emacs", version: "26.1" },
				{ name: "dash", version: "2.19" },
				{ name: "emacs", version: "25.1" },
			]),
		).toEqual([
			{ name: "dash", version: [2, 19] },
			{ name: "emacs", version: [26, 1] },
		]);
	});

	it("should keep the first entry when versions are equal", () => {
		expect(
			mergeRequirements([
				{ name: "seq", version: "2.0" },
				{ name: "seq", version: "2" },
			]),
		).toEqual([{ name: "seq", version: [2, 0] }]);
	});
});

describe("extractRequirements", () => {
	const testDir = join(process.cwd(), ".test-requirements-temp");

	beforeEach(async () => {
		await mkdir(testDir, { recursive: true });
	});

	afterEach(async () => {
		await rm(testDir, { recursive: true, force: true });
	});

	it("should collect requirements from every file in scan order", async () => {
		await writeFile(
			join(testDir, "foo.el"),
			';; Package-Requires: ((emacs "26.1") (dash "2.14"))\n',
		);
		await writeFile(
			join(testDir, "foo-extra.el"),
			';; Package-Requires: ((dash "2.19"))\n',
		);
		await writeFile(
			join(testDir, "foo-pkg.el"),
			';; Package-Requires: ((ignored "1"))\n',
		);

		const raw = await extractRequirements(testDir, { order: byNameLength });
		expect(raw).toEqual([
			{ name: "emacs", version: "26.1" },
			{ name: "dash", version: "2.14" },
			{ name: "dash", version: "2.19" },
		]);

		expect(mergeRequirements(raw)).toEqual([
			{ name: "emacs", version: [26, 1] },
			{ name: "dash", version: [2, 19] },
		]);
	});

	it("should name the file with a malformed header", async () => {
		await writeFile(join(testDir, "broken.el"), ";; Package-Requires: (((\n");

		await expect(extractRequirements(testDir)).rejects.toThrow(
			/Malformed Package-Requires header in broken\.el/,
		);
	});

	it("should return nothing for a directory without sources", async () => {
		expect(await extractRequirements(testDir)).toEqual([]);
	});
});
