/**
 * Minimal s-expression reader and printer.
 *
 * Covers the subset used by package headers and generated descriptor
 * files: lists, dotted pairs, symbols, strings, integers and the `'`
 * quote shorthand.
 */

export interface SexpSymbol {
	type: "symbol";
	name: string;
}

export interface SexpCons {
	type: "cons";
	car: SexpValue;
	cdr: SexpValue;
}

export type SexpValue = SexpSymbol | SexpCons | SexpValue[] | string | number;

export class SexpParseError extends Error {
	constructor(
		message: string,
		public readonly position: number,
	) {
		super(`${message} at position ${position}`);
		this.name = "SexpParseError";
	}
}

export function sym(name: string): SexpSymbol {
	return { type: "symbol", name };
}

export function cons(car: SexpValue, cdr: SexpValue): SexpCons {
	return { type: "cons", car, cdr };
}

export function quote(value: SexpValue): SexpValue[] {
	return [sym("quote"), value];
}

export function isSymbol(value: SexpValue, name?: string): value is SexpSymbol {
	return (
		typeof value === "object" &&
		!Array.isArray(value) &&
		value.type === "symbol" &&
		(name === undefined || value.name === name)
	);
}

export function isCons(value: SexpValue): value is SexpCons {
	return (
		typeof value === "object" && !Array.isArray(value) && value.type === "cons"
	);
}

/**
 * `nil` and the empty list are the same value.
 */
export function isNil(value: SexpValue): boolean {
	return (Array.isArray(value) && value.length === 0) || isSymbol(value, "nil");
}

/**
 * Strip one level of `(quote x)` if present.
 */
export function unquote(value: SexpValue): SexpValue {
	if (Array.isArray(value) && value.length === 2) {
		const [head, body] = value;
		if (head !== undefined && body !== undefined && isSymbol(head, "quote")) {
			return body;
		}
	}
	return value;
}

// =============================================================================
// Reader
// =============================================================================

const DELIMITERS = new Set(["(", ")", "'", '"', ";"]);

class Reader {
	private pos = 0;

	constructor(private readonly input: string) {}

	atEnd(): boolean {
		this.skipWhitespace();
		return this.pos >= this.input.length;
	}

	read(): SexpValue {
		this.skipWhitespace();
		const ch = this.input[this.pos];

		if (ch === undefined) {
			throw new SexpParseError("Unexpected end of input", this.pos);
		}
		if (ch === "(") {
			this.pos++;
			return this.readList();
		}
		if (ch === ")") {
			throw new SexpParseError("Unexpected ')'", this.pos);
		}
		if (ch === "'") {
			this.pos++;
			return quote(this.read());
		}
		if (ch === '"') {
			this.pos++;
			return this.readString();
		}
		return this.readAtom();
	}

	private readList(): SexpValue {
		const items: SexpValue[] = [];

		for (;;) {
			this.skipWhitespace();
			const ch = this.input[this.pos];

			if (ch === undefined) {
				throw new SexpParseError("Unterminated list", this.pos);
			}
			if (ch === ")") {
				this.pos++;
				return items;
			}
			if (ch === "." && this.isDelimiter(this.input[this.pos + 1])) {
				const dotPos = this.pos;
				this.pos++;
				const tail = this.read();
				this.skipWhitespace();
				if (this.input[this.pos] !== ")") {
					throw new SexpParseError("Expected ')' after dotted tail", this.pos);
				}
				this.pos++;
				const head = items.pop();
				if (head === undefined) {
					throw new SexpParseError("Dot without a preceding element", dotPos);
				}
				// (a b . c) nests to the right
				let result: SexpValue = isNil(tail) ? [head] : cons(head, tail);
				for (let i = items.length - 1; i >= 0; i--) {
					const item = items[i];
					if (item === undefined) continue;
					result = cons(item, result);
				}
				return result;
			}

			items.push(this.read());
		}
	}

	private readString(): string {
		let out = "";

		for (;;) {
			const ch = this.input[this.pos];
			if (ch === undefined) {
				throw new SexpParseError("Unterminated string", this.pos);
			}
			this.pos++;

			if (ch === '"') {
				return out;
			}
			if (ch === "\\") {
				const next = this.input[this.pos];
				this.pos++;
				if (next === undefined) {
					throw new SexpParseError("Unterminated string", this.pos);
				}
				if (next === "n") out += "\n";
				else if (next === "t") out += "\t";
				// backslash-newline is a line continuation
				else if (next !== "\n") out += next;
				continue;
			}
			out += ch;
		}
	}

	private readAtom(): SexpValue {
		const start = this.pos;
		let text = "";

		while (this.pos < this.input.length) {
			const ch = this.input[this.pos];
			if (ch === undefined || this.isDelimiter(ch)) break;
			if (ch === "\\") {
				text += this.input[this.pos + 1] ?? "";
				this.pos += 2;
				continue;
			}
			text += ch;
			this.pos++;
		}

		if (text === "") {
			throw new SexpParseError("Unexpected character", start);
		}
		if (/^[+-]?\d+$/.test(text)) {
			return Number.parseInt(text, 10);
		}
		return sym(text);
	}

	private skipWhitespace(): void {
		while (this.pos < this.input.length) {
			const ch = this.input[this.pos];
			if (ch === ";") {
				while (this.pos < this.input.length && this.input[this.pos] !== "\n") {
					this.pos++;
				}
			} else if (ch !== undefined && /\s/.test(ch)) {
				this.pos++;
			} else {
				return;
			}
		}
	}

	private isDelimiter(ch: string | undefined): boolean {
		return ch === undefined || /\s/.test(ch) || DELIMITERS.has(ch);
	}
}

/**
 * Read exactly one form from `input`. Trailing content other than
 * whitespace and comments is an error.
 */
export function readSexp(input: string): SexpValue {
	const reader = new Reader(input);
	const value = reader.read();
	if (!reader.atEnd()) {
		throw new SexpParseError("Trailing content after form", input.length);
	}
	return value;
}

// =============================================================================
// Printer
// =============================================================================

function printString(value: string): string {
	return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Print a value the way it would be read back.
 */
export function printSexp(value: SexpValue): string {
	if (typeof value === "string") {
		return printString(value);
	}
	if (typeof value === "number") {
		return String(value);
	}
	if (Array.isArray(value)) {
		const [head, body] = value;
		if (
			value.length === 2 &&
			head !== undefined &&
			body !== undefined &&
			isSymbol(head, "quote")
		) {
			return `'${printSexp(body)}`;
		}
		if (value.length === 0) {
			return "nil";
		}
		return `(${value.map(printSexp).join(" ")})`;
	}
	if (value.type === "symbol") {
		return value.name;
	}
	return `(${printSexp(value.car)} . ${printSexp(value.cdr)})`;
}
