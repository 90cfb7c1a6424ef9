/**
 * Version lists.
 *
 * Package versions are dotted strings such as "1.2", "2.0pre3" or
 * "1.4-beta". They are compared as lists of integers where pre-release
 * labels map to negative numbers, so "1.0pre1" sorts before "1.0".
 */

export type VersionList = number[];

export class InvalidVersionError extends Error {
	constructor(version: string, reason?: string) {
		super(
			`Invalid version syntax: '${version}'${reason ? ` (${reason})` : ""}`,
		);
		this.name = "InvalidVersionError";
	}
}

/**
 * Labels allowed between numeric components, checked in order.
 */
const VERSION_LABELS: Array<[RegExp, number]> = [
	[/^[-._+ ]?snapshot$/i, -4],
	[/^[-._+]$/, -4],
	[/^[-._+ ]?(cvs|git|bzr|svn|hg|darcs)$/i, -4],
	[/^[-._+ ]?unknown$/i, -4],
	[/^[-._+ ]?alpha$/i, -3],
	[/^[-._+ ]?beta$/i, -2],
	[/^[-._+ ]?(pre|rc)$/i, -1],
];

const LABEL_NAMES: Record<number, string> = {
	[-1]: "pre",
	[-2]: "beta",
	[-3]: "alpha",
	[-4]: "snapshot",
};

/**
 * Parse a version string into a version list.
 *
 * @example
 * ```typescript
 * versionToList("1.2")      // => [1, 2]
 * versionToList("1.0pre2")  // => [1, 0, -1, 2]
 * versionToList("22.3a")    // => [22, 3, 1]
 * ```
 */
export function versionToList(version: string): VersionList {
	// ".5" reads as "0.5"
	const input = version.startsWith(".") ? `0${version}` : version;
	const parts: VersionList = [];
	let rest = input;

	for (;;) {
		const numeric = rest.match(/^\d+/);
		if (!numeric) break;
		parts.push(Number.parseInt(numeric[0], 10));
		rest = rest.slice(numeric[0].length);

		const label = rest.match(/^\D+/);
		if (!label) break;
		rest = rest.slice(label[0].length);

		const text = label[0];
		if (text === ".") continue;

		const known = VERSION_LABELS.find(([pattern]) => pattern.test(text));
		if (known) {
			parts.push(known[1]);
			continue;
		}

		// 22.3a is 22.3.1, 22.3b is 22.3.2
		const letter = text.match(/^[-._+ ]?([a-zA-Z])$/);
		if (letter?.[1]) {
			parts.push(letter[1].toLowerCase().charCodeAt(0) - 96);
			continue;
		}

		throw new InvalidVersionError(version);
	}

	if (parts.length === 0) {
		throw new InvalidVersionError(version, "must start with a number");
	}
	if (rest !== "") {
		throw new InvalidVersionError(version);
	}

	return parts;
}

/**
 * Like {@link versionToList} but returns null for invalid input.
 */
export function tryVersionToList(version: string): VersionList | null {
	try {
		return versionToList(version);
	} catch {
		return null;
	}
}

/**
 * Render a version list back to its canonical string form.
 *
 * @example
 * ```typescript
 * joinVersion([1, 0, -1, 2]) // => "1.0pre2"
 * ```
 */
export function joinVersion(version: VersionList): string {
	let out = "";

	version.forEach((part, index) => {
		if (part >= 0) {
			const previous = version[index - 1];
			const needsDot = index > 0 && previous !== undefined && previous >= 0;
			out += `${needsDot ? "." : ""}${part}`;
			return;
		}
		const label = LABEL_NAMES[part];
		if (!label) {
			throw new Error(`Invalid version list: (${version.join(" ")})`);
		}
		out += label;
	});

	return out;
}

/**
 * Compare two version lists, padding the shorter one with zeros.
 * Returns: -1 if a < b, 0 if equal, 1 if a > b
 */
export function compareVersionLists(a: VersionList, b: VersionList): number {
	const length = Math.max(a.length, b.length);
	for (let i = 0; i < length; i++) {
		const left = a[i] ?? 0;
		const right = b[i] ?? 0;
		if (left !== right) {
			return left < right ? -1 : 1;
		}
	}
	return 0;
}

/**
 * Check whether `version` is at least `minimum`.
 */
export function versionAtLeast(
	version: VersionList,
	minimum: VersionList,
): boolean {
	return compareVersionLists(version, minimum) >= 0;
}

/**
 * Strip a revision-control keyword wrapper such as "$Revision: 1.4 $"
 * from a header value. Returns null if what remains is not a version.
 */
export function stripRcsId(value: string | null | undefined): string | null {
	if (!value) {
		return null;
	}

	const stripped = value
		.replace(/^[ \t]*\$Revision:[ \t]+/, "")
		.replace(/[ \t]*\$[ \t]*$/, "")
		.trim();

	return tryVersionToList(stripped) ? stripped : null;
}
