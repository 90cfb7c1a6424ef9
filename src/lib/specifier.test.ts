import { describe, expect, it } from "vitest";
import {
	formatVcSpec,
	guessBackend,
	isUrlSpecifier,
	packageNameFromUrl,
	parseVcSpec,
} from "./specifier";

describe("specifier utilities", () => {
	describe("isUrlSpecifier", () => {
		it("should accept clonable URL schemes", () => {
			expect(isUrlSpecifier("https://example.com/pkg.git")).toBe(true);
			expect(isUrlSpecifier("http://example.com/pkg")).toBe(true);
			expect(isUrlSpecifier("git://example.com/pkg.git")).toBe(true);
			expect(isUrlSpecifier("ssh://git@example.com/pkg.git")).toBe(true);
			expect(isUrlSpecifier("file:///srv/repos/pkg")).toBe(true);
		});

		it("should reject package names and other strings", () => {
			expect(isUrlSpecifier("magit")).toBe(false);
			expect(isUrlSpecifier("ftp://example.com/pkg")).toBe(false);
			expect(isUrlSpecifier("https://")).toBe(false);
			expect(isUrlSpecifier("")).toBe(false);
		});
	});

	describe("packageNameFromUrl", () => {
		it("should use the last path component without extension", () => {
			expect(packageNameFromUrl("https://example.com/pkg.git")).toBe("pkg");
			expect(packageNameFromUrl("https://example.com/group/my-mode")).toBe(
				"my-mode",
			);
		});

		it("should ignore a trailing slash", () => {
			expect(packageNameFromUrl("https://example.com/group/my-mode/")).toBe(
				"my-mode",
			);
		});

		it("should return null without a path", () => {
			expect(packageNameFromUrl("https://example.com/")).toBeNull();
			expect(packageNameFromUrl("not a url")).toBeNull();
		});
	});

	describe("parseVcSpec", () => {
		it("should parse all four fields", () => {
			expect(
				parseVcSpec("git https://example.com/pkg.git sub branchname"),
			).toEqual({
				backend: "git",
				url: "https://example.com/pkg.git",
				lispDir: "sub",
				branch: "branchname",
			});
		});

		it("should leave optional fields absent", () => {
			const upstream = parseVcSpec("git https://example.com/pkg.git");
			expect(upstream).toEqual({
				backend: "git",
				url: "https://example.com/pkg.git",
			});
			expect(upstream?.lispDir).toBeUndefined();
			expect(upstream?.branch).toBeUndefined();
		});

		it("should tolerate surrounding whitespace", () => {
			expect(parseVcSpec("  hg https://example.com/pkg  ")).toEqual({
				backend: "hg",
				url: "https://example.com/pkg",
			});
		});

		it("should return a frozen upstream", () => {
			expect(Object.isFrozen(parseVcSpec("git https://example.com/a"))).toBe(
				true,
			);
		});

		it("should reject malformed specs", () => {
			expect(parseVcSpec("git")).toBeNull();
			expect(parseVcSpec("")).toBeNull();
			expect(parseVcSpec("git url lisp main extra")).toBeNull();
		});
	});

	describe("formatVcSpec", () => {
		it("should format back to spec string", () => {
			expect(
				formatVcSpec({ backend: "git", url: "https://example.com/pkg.git" }),
			).toBe("git https://example.com/pkg.git");
			expect(
				formatVcSpec({
					backend: "git",
					url: "https://example.com/pkg.git",
					lispDir: "lisp",
					branch: "main",
				}),
			).toBe("git https://example.com/pkg.git lisp main");
		});

		it("should write a branch without subdirectory with a dot", () => {
			expect(
				formatVcSpec({
					backend: "git",
					url: "https://example.com/pkg.git",
					branch: "main",
				}),
			).toBe("git https://example.com/pkg.git . main");
		});

		it("should mark an unknown backend", () => {
			expect(formatVcSpec({ url: "https://example.com/pkg" })).toBe(
				"? https://example.com/pkg",
			);
		});
	});

	describe("guessBackend", () => {
		it("should detect git from the URL", () => {
			expect(guessBackend("https://example.com/pkg.git", "hg")).toBe("git");
			expect(guessBackend("git://example.com/pkg", "hg")).toBe("git");
			expect(guessBackend("https://github.com/someone/pkg", "hg")).toBe("git");
			expect(guessBackend("https://codeberg.org/someone/pkg", "hg")).toBe(
				"git",
			);
		});

		it("should detect hg on hg.sr.ht", () => {
			expect(guessBackend("https://hg.sr.ht/~someone/pkg", "git")).toBe("hg");
		});

		it("should fall back to the default", () => {
			expect(guessBackend("https://example.com/pkg", "git")).toBe("git");
			expect(guessBackend("https://example.com/pkg", "hg")).toBe("hg");
		});
	});
});
