/**
 * Source file header parsing.
 *
 * Package metadata lives in comment headers at the top of a source file:
 *
 * ```
 * ;;; foo.el --- Frobnicate things  -*- lexical-binding: t -*-
 *
 * ;; Version: 1.2
 * ;; Package-Requires: ((emacs "26.1")
 * ;;                    (dash "2.19"))
 *
 * ;;; Code:
 * ```
 *
 * Only the region before the `;;; Code:` line is searched. Header names
 * are matched case-insensitively.
 */

const CODE_MARK = /^;;;[ \t]+Code:/im;
const HEADER_LINE = /^;+[ \t]+(?:@\(#\))?[ \t]*\$?/;
const CONTINUATION_LINE = /^;+(?:\t|[ \t]{2,})[ \t]*(\S.*)$/;
const SUMMARY_LINE = /^;;;[ \t]*\S+\.el[ \t]+-{3,}[ \t]*(.*)$/m;

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function headerRegExp(header: string): RegExp {
	return new RegExp(
		`${HEADER_LINE.source}${escapeRegExp(header)}[ \\t]*:[ \\t]*(.*)$`,
		"i",
	);
}

/**
 * The lines of the header region (everything before `;;; Code:`).
 */
export function headerRegion(content: string): string[] {
	const mark = content.match(CODE_MARK);
	const region =
		mark?.index !== undefined ? content.slice(0, mark.index) : content;
	return region.split(/\r?\n/);
}

/**
 * Read a single-line header value, or null if absent or empty.
 */
export function readHeader(content: string, header: string): string | null {
	const pattern = headerRegExp(header);
	for (const line of headerRegion(content)) {
		const match = line.match(pattern);
		if (match) {
			const value = (match[1] ?? "").trim();
			return value || null;
		}
	}
	return null;
}

/**
 * Read a header whose value may continue on the following comment lines.
 *
 * A following line continues the value only if the comment starter is
 * followed by a tab or at least two blanks. Returns the value lines, or
 * null if the header is absent.
 */
export function readMultilineHeader(
	content: string,
	header: string,
): string[] | null {
	const pattern = headerRegExp(header);
	const lines = headerRegion(content);
	const start = lines.findIndex((line) => pattern.test(line));
	if (start === -1) {
		return null;
	}

	const first = (lines[start]?.match(pattern)?.[1] ?? "").trim();
	if (!first) {
		return null;
	}

	const values = [first];
	for (const line of lines.slice(start + 1)) {
		const continuation = line.match(CONTINUATION_LINE);
		if (!continuation) break;

		values.push((continuation[1] ?? "").trim());
	}

	return values;
}

/**
 * Read the one-line summary from the first line of a file:
 * `;;; foo.el --- Summary text  -*- mode cookie -*-`
 */
export function readSummary(content: string): string | null {
	const match = content.match(SUMMARY_LINE);
	if (!match) {
		return null;
	}

	const summary = (match[1] ?? "").replace(/-\*-.*-\*-/, "").trim();
	return summary || null;
}
