import { z } from "zod";

import { getChildLogger } from "../logging.js";
import { ConfigError } from "../storedsafe/errors.js";
import { type VerifyMode, describeVerifyMode } from "../storedsafe/tls.js";
import { expandHome, nonEmpty } from "../utils.js";
import { DEFAULT_RC_FILE, TOKEN_UPDATE_LOCK_FILE } from "./path.js";
import { readRcFile } from "./rc-file.js";
import { type FrameworkVariables, VARIABLE_NAMES, type VariableValue } from "./variables.js";

const logger = getChildLogger({ module: "config" });

/** Token refreshes allowed per invocation, shared by every term. */
export const MAX_RETRIES = 5;

/** Poll interval while another process holds the token update lock. */
export const UPDATE_WAIT_SLEEP_MS = 1000;

const DEFAULT_TOKEN_UPDATE_TIMEOUT_SECONDS = 120;

export const ENV_NAMES = {
	server: "STOREDSAFE_SERVER",
	token: "STOREDSAFE_TOKEN",
	cabundle: "STOREDSAFE_CABUNDLE",
	skipVerify: "STOREDSAFE_SKIP_VERIFY",
	tokenUpdateScript: "STOREDSAFE_TOKEN_UPDATE_SCRIPT",
	rcFile: "STOREDSAFE_RC_FILE",
	tokenUpdateTimeout: "STOREDSAFE_TOKEN_UPDATE_TIMEOUT",
	lockTimeout: "STOREDSAFE_LOCK_TIMEOUT",
	httpTimeout: "STOREDSAFE_HTTP_TIMEOUT",
} as const;

const TRUE_LITERALS = new Set(["1", "true", "True", "t"]);

const SecondsSchema = z.coerce.number().finite().nonnegative();

export type Environment = Readonly<Record<string, string | undefined>>;

export type StoredSafeConfig = Readonly<{
	server: string;
	token?: string;
	verify: VerifyMode;
	tokenUpdateScript?: string;
	rcFile: string;
	lockFile: string;
	tokenUpdateTimeoutMs: number;
	lockWaitPollMs: number;
	/** 0 waits for the lock indefinitely. */
	lockWaitTimeoutMs: number;
	/** 0 disables the request timeout. */
	httpTimeoutMs: number;
}>;

export interface ResolveConfigOptions {
	env?: Environment;
	variables?: FrameworkVariables;
	/** Override the shared lock file (tests). */
	lockFile?: string;
	/** Override the lock poll interval (tests). */
	lockWaitPollMs?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Resolution
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve the lookup configuration.
 *
 * Each setting is taken from the environment first, then from the framework
 * variables; server and token fall back to the rc file.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<StoredSafeConfig> {
	const env = options.env ?? process.env;
	const vars = options.variables ?? {};

	const rcFile = expandHome(
		nonEmpty(env[ENV_NAMES.rcFile]) ?? varString(vars, VARIABLE_NAMES.rcFile) ?? DEFAULT_RC_FILE,
	);

	let server = nonEmpty(env[ENV_NAMES.server]) ?? varString(vars, VARIABLE_NAMES.server);
	let token = nonEmpty(env[ENV_NAMES.token]);

	if (!server || !token) {
		const rc = await readRcFile(rcFile);
		server = server ?? rc.server;
		token = token ?? rc.token;
	}

	if (!server) {
		throw new ConfigError(
			`StoredSafe address not set. Specify with ${ENV_NAMES.server} environment variable, ${VARIABLE_NAMES.server} variable or in ${rcFile}`,
		);
	}

	const scriptSetting =
		nonEmpty(env[ENV_NAMES.tokenUpdateScript]) ?? varString(vars, VARIABLE_NAMES.tokenUpdateScript);
	const tokenUpdateScript = scriptSetting ? expandHome(scriptSetting) : undefined;

	if (!token && !tokenUpdateScript) {
		throw new ConfigError(
			`StoredSafe token not set and no update script available. Specify token with ${ENV_NAMES.token} environment variable or in ${rcFile}, or an update script with ${ENV_NAMES.tokenUpdateScript} or ${VARIABLE_NAMES.tokenUpdateScript}`,
		);
	}

	const verify = resolveVerifyMode(env, vars);

	const config: StoredSafeConfig = Object.freeze({
		server,
		token,
		verify,
		tokenUpdateScript,
		rcFile,
		lockFile: options.lockFile ?? TOKEN_UPDATE_LOCK_FILE,
		tokenUpdateTimeoutMs: resolveSeconds(
			env,
			vars,
			"tokenUpdateTimeout",
			DEFAULT_TOKEN_UPDATE_TIMEOUT_SECONDS,
		),
		lockWaitPollMs: options.lockWaitPollMs ?? UPDATE_WAIT_SLEEP_MS,
		lockWaitTimeoutMs: resolveSeconds(env, vars, "lockTimeout", 0),
		httpTimeoutMs: resolveSeconds(env, vars, "httpTimeout", 0),
	});

	logger.debug(
		{
			server: config.server,
			hasToken: Boolean(config.token),
			verify: describeVerifyMode(config.verify),
			tokenUpdateScript: config.tokenUpdateScript,
			rcFile: config.rcFile,
		},
		"resolved configuration",
	);
	return config;
}

function resolveVerifyMode(env: Environment, vars: FrameworkVariables): VerifyMode {
	const envSkip = nonEmpty(env[ENV_NAMES.skipVerify]);
	const skip =
		envSkip !== undefined
			? TRUE_LITERALS.has(envSkip)
			: isTruthy(vars[VARIABLE_NAMES.skipVerify]);
	if (skip) {
		return { kind: "skip" };
	}

	const cabundle = nonEmpty(env[ENV_NAMES.cabundle]) ?? varString(vars, VARIABLE_NAMES.cabundle);
	if (cabundle) {
		return { kind: "ca-bundle", path: expandHome(cabundle) };
	}
	return { kind: "default" };
}

function resolveSeconds(
	env: Environment,
	vars: FrameworkVariables,
	key: "tokenUpdateTimeout" | "lockTimeout" | "httpTimeout",
	fallback: number,
): number {
	const envValue = nonEmpty(env[ENV_NAMES[key]]);
	if (envValue !== undefined) {
		return secondsToMs(ENV_NAMES[key], envValue);
	}
	const varValue = vars[VARIABLE_NAMES[key]];
	if (varValue != null && varValue !== "") {
		return secondsToMs(VARIABLE_NAMES[key], varValue);
	}
	return fallback * 1000;
}

function secondsToMs(source: string, raw: string | number | boolean): number {
	const parsed = SecondsSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigError(`${source} must be a non-negative number of seconds, got "${String(raw)}"`);
	}
	return Math.round(parsed.data * 1000);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Framework variable coercion
// ═══════════════════════════════════════════════════════════════════════════════

function varString(vars: FrameworkVariables, name: string): string | undefined {
	const value = vars[name];
	if (typeof value === "string") return nonEmpty(value);
	if (typeof value === "number") return String(value);
	return undefined;
}

/**
 * Truthiness of a framework variable: `true`, a non-zero number, or one of
 * the literals the environment variable accepts.
 */
export function isTruthy(value: VariableValue | undefined): boolean {
	if (typeof value === "boolean") return value;
	if (typeof value === "number") return value !== 0;
	if (typeof value === "string") return TRUE_LITERALS.has(value.trim());
	return false;
}
