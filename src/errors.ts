/**
 * Base error class for vcpm configuration errors
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Error kinds raised while resolving and installing a package
 */
export type VcpmErrorCode =
	| "UNKNOWN_PACKAGE"
	| "NO_VC_HEADER"
	| "INVALID_SPEC"
	| "NO_REPOSITORY"
	| "ALREADY_INSTALLED"
	| "CLONE_FAILED"
	| "CHECKOUT_FAILED"
	| "MALFORMED_REQUIREMENTS"
	| "DEPENDENCY_TRANSACTION_FAILED"
	| "DESCRIPTOR_WRITE_FAILED"
	| "INDEX_FETCH_FAILED";

/**
 * Base error class for install pipeline failures
 */
export class VcpmError extends Error {
	constructor(
		message: string,
		public readonly code: VcpmErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "VcpmError";
	}
}

/**
 * Error thrown when a name is neither a URL nor a known package
 */
export class UnknownPackageError extends VcpmError {
	constructor(nameOrUrl: string) {
		super(`Unknown package: ${nameOrUrl || "(empty)"}`, "UNKNOWN_PACKAGE");
		this.name = "UnknownPackageError";
	}
}

/**
 * Error thrown when a package index entry has no vc spec
 */
export class NoVcHeaderError extends VcpmError {
	constructor(name: string) {
		super(
			`Package "${name}" does not declare a version-control repository`,
			"NO_VC_HEADER",
		);
		this.name = "NoVcHeaderError";
	}
}

/**
 * Error thrown when a vc spec does not match `backend location [subdir [branch]]`
 */
export class InvalidSpecError extends VcpmError {
	constructor(name: string, spec: string, reason?: string) {
		super(
			`Invalid vc spec for "${name}": "${spec}"\n${
				reason ?? "Expected: <backend> <location> [<subdir> [<branch>]]"
			}`,
			"INVALID_SPEC",
		);
		this.name = "InvalidSpecError";
	}
}

/**
 * Error thrown when a vc descriptor has no upstream
 */
export class NoRepositoryError extends VcpmError {
	constructor(name: string) {
		super(`Package "${name}" has no repository to clone from`, "NO_REPOSITORY");
		this.name = "NoRepositoryError";
	}
}

/**
 * Error thrown when the target directory exists and overwrite was declined
 */
export class AlreadyInstalledError extends VcpmError {
	constructor(
		name: string,
		public readonly dir: string,
	) {
		super(`Package "${name}" is already installed in ${dir}`, "ALREADY_INSTALLED");
		this.name = "AlreadyInstalledError";
	}
}

/**
 * Error thrown when cloning a repository fails
 */
export class CloneFailedError extends VcpmError {
	constructor(url: string, reason: string, options?: { cause?: unknown }) {
		super(`Failed to clone ${url}: ${reason}`, "CLONE_FAILED", options);
		this.name = "CloneFailedError";
	}
}

/**
 * Error thrown when checking out a revision fails.
 * The message is the backend's own.
 */
export class CheckoutFailedError extends VcpmError {
	constructor(
		public readonly rev: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, "CHECKOUT_FAILED", options);
		this.name = "CheckoutFailedError";
	}
}

/**
 * Error thrown when a Package-Requires header cannot be parsed
 */
export class MalformedRequirementsError extends VcpmError {
	constructor(
		public readonly file: string,
		reason: string,
	) {
		super(
			`Malformed Package-Requires header in ${file}: ${reason}`,
			"MALFORMED_REQUIREMENTS",
		);
		this.name = "MalformedRequirementsError";
	}
}

/**
 * Error thrown when dependencies could not be installed
 */
export class DependencyTransactionFailedError extends VcpmError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "DEPENDENCY_TRANSACTION_FAILED", options);
		this.name = "DependencyTransactionFailedError";
	}
}

/**
 * Error thrown when the descriptor file cannot be written
 */
export class DescriptorWriteFailedError extends VcpmError {
	constructor(path: string, reason: string, options?: { cause?: unknown }) {
		super(
			`Failed to write package descriptor ${path}: ${reason}`,
			"DESCRIPTOR_WRITE_FAILED",
			options,
		);
		this.name = "DescriptorWriteFailedError";
	}
}

/**
 * Error thrown when the package index cannot be loaded
 */
export class IndexFetchError extends VcpmError {
	constructor(
		location: string,
		public readonly status?: number,
	) {
		super(
			`Failed to load package index from ${location}${status ? ` (HTTP ${status})` : ""}`,
			"INDEX_FETCH_FAILED",
		);
		this.name = "IndexFetchError";
	}
}

/**
 * Get a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Error thrown when a descriptor file does not have the expected shape
 */
export class InvalidDescriptorError extends Error {
	constructor(path: string, reason: string) {
		super(`Invalid package descriptor ${path}: ${reason}`);
		this.name = "InvalidDescriptorError";
	}
}
