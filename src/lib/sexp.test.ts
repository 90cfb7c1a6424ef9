import { describe, expect, it } from "vitest";
import {
	cons,
	isNil,
	printSexp,
	quote,
	readSexp,
	SexpParseError,
	sym,
	unquote,
} from "./sexp";

describe("readSexp", () => {
	it("should read strings, integers and symbols", () => {
		expect(readSexp('"hello"')).toBe("hello");
		expect(readSexp("42")).toBe(42);
		expect(readSexp("-7")).toBe(-7);
		expect(readSexp("define-package")).toEqual(sym("define-package"));
		expect(readSexp(":upstream")).toEqual(sym(":upstream"));
	});

	it("should read string escapes", () => {
		expect(readSexp('"say \\"hi\\"\\n"')).toBe('say "hi"\n');
	});

	it("should read nested lists", () => {
		expect(readSexp('((dash "2.19") (emacs "26.1"))')).toEqual([
			[sym("dash"), "2.19"],
			[sym("emacs"), "26.1"],
		]);
	});

	it("should read a dotted pair", () => {
		expect(readSexp('(vc . "1.2")')).toEqual(cons(sym("vc"), "1.2"));
	});

	it("should read a dotted list as nested conses", () => {
		expect(readSexp("(a b . c)")).toEqual(
			cons(sym("a"), cons(sym("b"), sym("c"))),
		);
	});

	it("should read a quoted form", () => {
		expect(readSexp("'(git)")).toEqual(quote([sym("git")]));
	});

	it("should skip comments", () => {
		expect(readSexp(";; leading comment\n(a) ; trailing")).toEqual([sym("a")]);
	});

	it("should reject trailing content", () => {
		expect(() => readSexp("(a) (b)")).toThrow(SexpParseError);
	});

	it("should reject unterminated input", () => {
		expect(() => readSexp("(a")).toThrow("Unterminated list");
		expect(() => readSexp('"abc')).toThrow("Unterminated string");
	});

	it("should reject an unexpected closing paren", () => {
		expect(() => readSexp(")")).toThrow("Unexpected ')'");
	});
});

describe("isNil / unquote", () => {
	it("should treat nil and the empty list alike", () => {
		expect(isNil(sym("nil"))).toBe(true);
		expect(isNil([])).toBe(true);
		expect(isNil(sym("t"))).toBe(false);
		expect(isNil("nil")).toBe(false);
	});

	it("should strip one level of quote", () => {
		expect(unquote(readSexp("'(a)"))).toEqual([sym("a")]);
		expect(unquote(readSexp("''a"))).toEqual(quote(sym("a")));
		expect(unquote([sym("a")])).toEqual([sym("a")]);
	});
});

describe("printSexp", () => {
	it("should print atoms", () => {
		expect(printSexp("a \"quoted\" \\ string")).toBe(
			'"a \\"quoted\\" \\\\ string"',
		);
		expect(printSexp(3)).toBe("3");
		expect(printSexp(sym("git"))).toBe("git");
		expect(printSexp([])).toBe("nil");
	});

	it("should print quote forms with an apostrophe", () => {
		expect(printSexp(quote([sym("dash"), "2.19"]))).toBe("'(dash \"2.19\")");
	});

	it("should print conses with a dot", () => {
		expect(printSexp(cons(sym("vc"), "1.2"))).toBe('(vc . "1.2")');
	});

	it("should read back what it prints", () => {
		const text =
			'(define-package "foo" (vc . "1.2") "Frobnicate things" \'((dash "2.19")) :upstream \'(git "https://example.com/foo.git" nil nil) :commit "abc123")';
		expect(printSexp(readSexp(text))).toBe(text);
	});
});
