/**
 * Error taxonomy for StoredSafe lookups.
 *
 * Every error names the phase it failed in; the message is prefixed with it
 * so a host that only shows `message` still reports where the lookup broke.
 */

export type LookupPhase = "config" | "auth" | "fetch" | "refresh";

export class StoredSafeError extends Error {
	readonly phase: LookupPhase;

	constructor(phase: LookupPhase, message: string, options?: { cause?: unknown }) {
		super(`[${phase}] ${message}`, options);
		this.name = "StoredSafeError";
		this.phase = phase;
	}
}

/** Missing server/token with no recovery path, malformed term, bad setting. */
export class ConfigError extends StoredSafeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("config", message, options);
		this.name = "ConfigError";
	}
}

/** The vault could not be reached at all. */
export class UnreachableError extends StoredSafeError {
	constructor(phase: "auth" | "fetch", server: string, options?: { cause?: unknown }) {
		super(phase, `Can not reach "${server}"`, options);
		this.name = "UnreachableError";
	}
}

/** A 2xx auth check whose body does not carry the success marker. */
export class AuthProtocolError extends StoredSafeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("auth", message, options);
		this.name = "AuthProtocolError";
	}
}

export class TokenUpdateScriptNotFoundError extends StoredSafeError {
	constructor(message: string) {
		super("refresh", message);
		this.name = "TokenUpdateScriptNotFoundError";
	}
}

export class TokenUpdateFailedError extends StoredSafeError {
	readonly exitCode: number | null;

	constructor(message: string, options?: { cause?: unknown; exitCode?: number | null }) {
		super("refresh", message, { cause: options?.cause });
		this.name = "TokenUpdateFailedError";
		this.exitCode = options?.exitCode ?? null;
	}
}

export class TokenUpdateTimeoutError extends StoredSafeError {
	readonly timeoutMs: number;

	constructor(timeoutMs: number) {
		super("refresh", `Token update script timed out after ${timeoutMs}ms`);
		this.name = "TokenUpdateTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

/** Gave up waiting for another process to release the token update lock. */
export class LockTimeoutError extends StoredSafeError {
	constructor(lockFile: string, waitedMs: number) {
		super("refresh", `Timed out after ${waitedMs}ms waiting for lock ${lockFile}`);
		this.name = "LockTimeoutError";
	}
}

/** The vault answered an object request with a non-auth error status. */
export class LookupFailedError extends StoredSafeError {
	readonly status: number;

	constructor(objectId: string, status: number) {
		super("fetch", `Failed to retrieve object ${objectId} from StoredSafe (HTTP ${status})`);
		this.name = "LookupFailedError";
		this.status = status;
	}
}

/** The object or field is absent from an otherwise well-formed response. */
export class FieldNotFoundError extends StoredSafeError {
	constructor(term: string, reason: string) {
		super("fetch", `Could not find the requested information in StoredSafe for ${term}: ${reason}`);
		this.name = "FieldNotFoundError";
	}
}
