/**
 * StoredSafe REST client.
 *
 * Two wire operations: the token check and the object fetch. Responses are
 * mapped to plain values and tagged outcomes; only conditions no retry can
 * fix (unreachable server, protocol mismatch) are thrown.
 */

import type { Agent } from "undici";

import { formatErrorSafe } from "../infra/network-errors.js";
import { fetchWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { AuthProtocolError, UnreachableError } from "./errors.js";
import {
	AUTH_CHECK_PATH,
	AuthCheckResponseSchema,
	OBJECT_PATH,
	type ObjectResponse,
	ObjectResponseSchema,
	SUCCESS_STATUS,
	TOKEN_HEADER,
} from "./protocol.js";
import type { Session } from "./session.js";
import { type LookupTerm, formatTerm, isDownload } from "./term.js";
import { type VerifyMode, createDispatcher } from "./tls.js";

const logger = getChildLogger({ module: "storedsafe-client" });

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type FetchOutcome =
	| { kind: "success"; value: string }
	| { kind: "token-rejected" }
	| { kind: "transient-failure"; status: number }
	| { kind: "malformed"; reason: string };

export interface StoredSafeClientOptions {
	verify: VerifyMode;
	/** Per-request timeout in ms. 0 disables it. */
	timeoutMs?: number;
	fetchImpl?: typeof fetch;
}

const HTTP_FORBIDDEN = 403;

// ═══════════════════════════════════════════════════════════════════════════════
// Client
// ═══════════════════════════════════════════════════════════════════════════════

export class StoredSafeClient {
	private readonly fetchImpl: typeof fetch;
	private readonly timeoutMs: number;
	private readonly dispatcher: Agent | undefined;

	constructor(options: StoredSafeClientOptions) {
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.timeoutMs = options.timeoutMs ?? 0;
		this.dispatcher = createDispatcher(options.verify);
	}

	/**
	 * Check whether the session token is still valid.
	 */
	async authCheck(session: Session): Promise<boolean> {
		const response = await this.send("auth", session, `${session.baseUrl}${AUTH_CHECK_PATH}`, {
			method: "POST",
			headers: {
				[TOKEN_HEADER]: session.token,
				"Content-Type": "application/json",
			},
			// Older servers read the token from the body instead of the header.
			body: JSON.stringify({ token: session.token }),
		});

		if (!response.ok) {
			logger.debug({ status: response.status }, "auth check rejected");
			await discardBody(response);
			return false;
		}

		const raw = await response.text();
		const parsed = AuthCheckResponseSchema.safeParse(safeJsonParse(raw));
		if (!parsed.success) {
			throw new AuthProtocolError("Unexpected auth check response from server", {
				cause: parsed.error,
			});
		}
		if (parsed.data.CALLINFO.status !== SUCCESS_STATUS) {
			throw new AuthProtocolError(
				`Session not authenticated with server (status ${parsed.data.CALLINFO.status}). Token invalid?`,
			);
		}
		return true;
	}

	/**
	 * Fetch one field (or the attached file, for `download`) of an object.
	 */
	async fetchObject(session: Session, term: LookupTerm): Promise<FetchOutcome> {
		const url = new URL(`${session.baseUrl}${OBJECT_PATH}/${encodeURIComponent(term.objectId)}`);
		url.searchParams.set("token", session.token);
		url.searchParams.set("decrypt", "true");
		if (isDownload(term)) {
			url.searchParams.set("filedata", "true");
			logger.debug({ objectId: term.objectId }, "requesting file content");
		}

		const response = await this.send("fetch", session, url, { method: "GET" });

		if (response.status === HTTP_FORBIDDEN) {
			await discardBody(response);
			return { kind: "token-rejected" };
		}
		if (response.status >= 400) {
			await discardBody(response);
			return { kind: "transient-failure", status: response.status };
		}

		const raw = await response.text();
		const parsed = ObjectResponseSchema.safeParse(safeJsonParse(raw));
		if (!parsed.success) {
			return { kind: "malformed", reason: "response is not a StoredSafe object" };
		}
		return extractValue(parsed.data, term);
	}

	async close(): Promise<void> {
		if (!this.dispatcher) return;
		try {
			await this.dispatcher.close();
		} catch (err) {
			logger.debug({ error: formatErrorSafe(err) }, "failed to close dispatcher");
		}
	}

	private async send(
		phase: "auth" | "fetch",
		session: Session,
		url: string | URL,
		init: RequestInit,
	): Promise<Response> {
		const requestInit: RequestInit = this.dispatcher
			? {
					...init,
					// undici's Agent and the Dispatcher type on RequestInit come from
					// different package copies; Agent is a Dispatcher at runtime.
					dispatcher: this.dispatcher as never,
				}
			: init;

		try {
			return await fetchWithTimeout(this.fetchImpl, url, requestInit, this.timeoutMs);
		} catch (err) {
			logger.debug({ server: session.server, error: formatErrorSafe(err) }, "request failed");
			throw new UnreachableError(phase, session.server, { cause: err });
		}
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Response decoding
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pull the requested value out of an object response.
 *
 * Field lookup order is encrypted fields, public fields, then the object's
 * top-level properties; the first key present wins. `download` reads only
 * the base64 FILEDATA blob.
 */
export function extractValue(data: ObjectResponse, term: LookupTerm): FetchOutcome {
	const object = data.OBJECT?.[0];
	if (!object) {
		return { kind: "malformed", reason: `object ${term.objectId} not found` };
	}

	if (isDownload(term)) {
		if (!data.FILEDATA) {
			return { kind: "malformed", reason: "object has no file content" };
		}
		logger.debug({ objectId: term.objectId }, "returning base64 decoded file content");
		return { kind: "success", value: Buffer.from(data.FILEDATA, "base64").toString("utf8") };
	}

	const { fieldName } = term;
	let found: unknown;
	if (object.crypted && Object.hasOwn(object.crypted, fieldName)) {
		found = object.crypted[fieldName];
	} else if (object.public && Object.hasOwn(object.public, fieldName)) {
		found = object.public[fieldName];
	} else if (Object.hasOwn(object, fieldName)) {
		found = object[fieldName];
	}

	const value = stringifyScalar(found);
	if (!value) {
		return { kind: "malformed", reason: `no value for ${formatTerm(term)}` };
	}
	return { kind: "success", value };
}

function stringifyScalar(value: unknown): string | undefined {
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean") return String(value);
	return undefined;
}

/**
 * Unread bodies keep the connection busy until garbage collection.
 */
async function discardBody(response: Response): Promise<void> {
	try {
		await response.body?.cancel();
	} catch (err) {
		logger.debug({ error: formatErrorSafe(err) }, "failed to discard response body");
	}
}

function safeJsonParse(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return null;
	}
}
