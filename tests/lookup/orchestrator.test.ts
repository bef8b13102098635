import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { checkAuth, lookup } from "../../src/lookup/orchestrator.js";
import {
	ConfigError,
	FieldNotFoundError,
	LookupFailedError,
	TokenUpdateFailedError,
	TokenUpdateScriptNotFoundError,
} from "../../src/storedsafe/errors.js";
import type { ScriptRunner } from "../../src/token-update/script-runner.js";

// ═══════════════════════════════════════════════════════════════════════════════
// In-process vault
// ═══════════════════════════════════════════════════════════════════════════════

type VaultObject = {
	crypted?: Record<string, unknown>;
	public?: Record<string, unknown>;
	filedata?: string;
	[key: string]: unknown;
};

class FakeVault {
	readonly validTokens = new Set<string>();
	readonly requests: string[] = [];
	/** Revoke the token that fetched an object right after serving it. */
	revokeAfterFetch = false;

	constructor(private readonly objects: Record<string, VaultObject>) {}

	readonly fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
		const url = new URL(input instanceof Request ? input.url : input.toString());
		expect(url.host).toBe("safe.example.com");
		this.requests.push(url.pathname);

		if (url.pathname === "/api/1.0/auth/check") {
			const token = new Headers(init?.headers).get("x-http-token") ?? "";
			return this.validTokens.has(token)
				? json({ CALLINFO: { status: "SUCCESS" } })
				: json({ ERRORS: ["Invalid token"] }, 401);
		}

		const objectId = decodeURIComponent(url.pathname.replace("/api/1.0/object/", ""));
		const token = url.searchParams.get("token") ?? "";
		if (!this.validTokens.has(token)) {
			return json({ ERRORS: ["Token expired"] }, 403);
		}
		const object = this.objects[objectId];
		if (!object) {
			return json({ ERRORS: ["Object not found"] }, 404);
		}
		if (this.revokeAfterFetch) {
			this.validTokens.delete(token);
		}

		const { filedata, ...fields } = object;
		return json({
			OBJECT: [{ objectid: objectId, ...fields }],
			...(url.searchParams.get("filedata") === "true" && filedata ? { FILEDATA: filedata } : {}),
			CALLINFO: { status: "SUCCESS" },
		});
	});
}

function json(payload: unknown, status = 200) {
	return new Response(JSON.stringify(payload), { status });
}

const OBJECTS: Record<string, VaultObject> = {
	"100": {
		objectname: "web01",
		public: { host: "web01.example.com", username: "alice" },
		crypted: { password: "s3cret\n" },
	},
	"200": {
		objectname: "db01",
		public: { username: "postgres" },
		crypted: { password: "hunter2" },
	},
	"300": {
		objectname: "tls.pem",
		filedata: Buffer.from("-----BEGIN CERTIFICATE-----\n").toString("base64"),
	},
};

describe("lookup", () => {
	let dir: string;
	let rcFile: string;
	let lockFile: string;
	let scriptPath: string;
	let vault: FakeVault;
	let issued: number;

	/** Stand-in for the update script: logs in and rewrites the rc file. */
	const login = vi.fn<ScriptRunner>();

	function env(overrides: Record<string, string | undefined> = {}) {
		return {
			STOREDSAFE_SERVER: "safe.example.com",
			STOREDSAFE_TOKEN: "initial-token",
			STOREDSAFE_TOKEN_UPDATE_SCRIPT: scriptPath,
			STOREDSAFE_RC_FILE: rcFile,
			...overrides,
		};
	}

	function options(overrides: Record<string, string | undefined> = {}, maxRetries?: number) {
		return {
			env: env(overrides),
			fetchImpl: vault.fetch,
			runScript: login,
			lockFile,
			lockWaitPollMs: 10,
			maxRetries,
		};
	}

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "storedsafe-lookup-"));
		rcFile = path.join(dir, "client.rc");
		lockFile = path.join(dir, "token_update_lock");
		scriptPath = path.join(dir, "login.sh");
		fs.writeFileSync(scriptPath, "#!/bin/sh\n");

		vault = new FakeVault(OBJECTS);
		issued = 0;
		login.mockReset();
		login.mockImplementation(async () => {
			issued += 1;
			const token = `refreshed-token-${issued}`;
			vault.validTokens.add(token);
			fs.writeFileSync(rcFile, `username:alice\ntoken:${token}\nmysite:safe.example.com\n`);
			return { kind: "exited", exitCode: 0, signal: null, stdout: "", stderr: "" };
		});
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("returns field values in input order with a valid token", async () => {
		vault.validTokens.add("initial-token");

		const values = await lookup(["100/username", "100/password", "200/password"], options());

		expect(values).toEqual(["alice", "s3cret", "hunter2"]);
		expect(login).not.toHaveBeenCalled();
		expect(vault.requests).toEqual([
			"/api/1.0/auth/check",
			"/api/1.0/object/100",
			"/api/1.0/object/100",
			"/api/1.0/object/200",
		]);
	});

	it("reads top-level object properties and file content", async () => {
		vault.validTokens.add("initial-token");

		const values = await lookup(["200/objectname", "300/download"], options());

		expect(values).toEqual(["db01", "-----BEGIN CERTIFICATE-----"]);
	});

	it("refreshes a stale token once before fetching", async () => {
		const values = await lookup(["100/username", "100/password"], options());

		expect(values).toEqual(["alice", "s3cret"]);
		expect(login).toHaveBeenCalledTimes(1);
		expect(login).toHaveBeenCalledWith(scriptPath, 120_000);
		expect(fs.existsSync(lockFile)).toBe(false);
	});

	it("runs the update script when no token is configured", async () => {
		const values = await lookup(["100/username"], options({ STOREDSAFE_TOKEN: undefined }));

		expect(values).toEqual(["alice"]);
		expect(login).toHaveBeenCalledTimes(1);
	});

	it("retries the same term after the vault rejects the token", async () => {
		vault.validTokens.add("initial-token");
		vault.revokeAfterFetch = true;

		const values = await lookup(["100/username", "200/password"], options());

		expect(values).toEqual(["alice", "hunter2"]);
		expect(login).toHaveBeenCalledTimes(1);
		expect(vault.requests).toEqual([
			"/api/1.0/auth/check",
			"/api/1.0/object/100",
			"/api/1.0/object/200",
			"/api/1.0/auth/check",
			"/api/1.0/object/200",
		]);
	});

	it("draws every refresh in the run from one budget", async () => {
		vault.validTokens.add("initial-token");
		vault.revokeAfterFetch = true;

		await expect(
			lookup(["100/username", "200/username", "100/password"], options({}, 2)),
		).resolves.toEqual(["alice", "postgres", "s3cret"]);
		expect(login).toHaveBeenCalledTimes(2);
	});

	it("fails without partial results once the budget is spent", async () => {
		vault.validTokens.add("initial-token");
		vault.revokeAfterFetch = true;

		const err = await lookup(
			["100/username", "200/username", "100/password", "200/password"],
			options({}, 2),
		).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(TokenUpdateFailedError);
		expect(err).toMatchObject({
			message: "[refresh] Failed updating token, maximum retries reached (2 attempts)",
		});
		expect(login).toHaveBeenCalledTimes(2);
		expect(fs.existsSync(lockFile)).toBe(false);
	});

	it("fails when the token is stale and no script is configured", async () => {
		await expect(
			lookup(["100/username"], options({ STOREDSAFE_TOKEN_UPDATE_SCRIPT: undefined })),
		).rejects.toBeInstanceOf(TokenUpdateScriptNotFoundError);
		expect(login).not.toHaveBeenCalled();
	});

	it("fails on a lookup error status", async () => {
		vault.validTokens.add("initial-token");

		await expect(lookup(["100/username", "999/username"], options())).rejects.toThrow(
			new LookupFailedError("999", 404),
		);
	});

	it("fails on a missing field", async () => {
		vault.validTokens.add("initial-token");

		const err = await lookup(["200/host"], options()).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(FieldNotFoundError);
		expect(err).toMatchObject({
			message:
				"[fetch] Could not find the requested information in StoredSafe for 200/host: no value for 200/host",
		});
	});

	it("rejects a malformed term before contacting the vault", async () => {
		vault.validTokens.add("initial-token");

		await expect(lookup(["100/username", "garbage"], options())).rejects.toBeInstanceOf(ConfigError);
		expect(vault.fetch).not.toHaveBeenCalled();
	});

	it("honors framework variables", async () => {
		vault.validTokens.add("initial-token");

		const values = await lookup(["100/username"], {
			env: { STOREDSAFE_TOKEN: "initial-token", STOREDSAFE_RC_FILE: rcFile },
			variables: { storedsafe_server: "safe.example.com" },
			fetchImpl: vault.fetch,
			runScript: login,
			lockFile,
		});

		expect(values).toEqual(["alice"]);
	});
});

describe("checkAuth", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "storedsafe-check-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("reports the server and how many refreshes it took", async () => {
		const rcFile = path.join(dir, "client.rc");
		const scriptPath = path.join(dir, "login.sh");
		fs.writeFileSync(scriptPath, "#!/bin/sh\n");
		const vault = new FakeVault({});
		const runScript = vi.fn<ScriptRunner>(async () => {
			vault.validTokens.add("refreshed-token");
			fs.writeFileSync(rcFile, "token:refreshed-token\n");
			return { kind: "exited", exitCode: 0, signal: null, stdout: "", stderr: "" };
		});

		const status = await checkAuth({
			env: {
				STOREDSAFE_SERVER: "safe.example.com",
				STOREDSAFE_TOKEN: "stale-token",
				STOREDSAFE_TOKEN_UPDATE_SCRIPT: scriptPath,
				STOREDSAFE_RC_FILE: rcFile,
			},
			fetchImpl: vault.fetch,
			runScript,
			lockFile: path.join(dir, "lock"),
			lockWaitPollMs: 10,
		});

		expect(status).toEqual({ server: "safe.example.com", refreshes: 1 });
		expect(vault.requests).toEqual(["/api/1.0/auth/check", "/api/1.0/auth/check"]);
	});
});
