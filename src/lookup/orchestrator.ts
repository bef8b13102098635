/**
 * StoredSafe lookup.
 *
 * One call resolves the configuration, makes sure a valid session exists,
 * then fetches every term in order. A rejected token triggers the token
 * update script and the same term is tried again; every refresh in the run
 * draws from one budget. Any other failure ends the lookup with no partial
 * results.
 */

import {
	type Environment,
	MAX_RETRIES,
	type StoredSafeConfig,
	resolveConfig,
} from "../config/config.js";
import type { FrameworkVariables } from "../config/variables.js";
import { getChildLogger } from "../logging.js";
import { StoredSafeClient } from "../storedsafe/client.js";
import { FieldNotFoundError, LookupFailedError } from "../storedsafe/errors.js";
import { type Session, createSession } from "../storedsafe/session.js";
import { type LookupTerm, formatTerm, parseTerm } from "../storedsafe/term.js";
import { RetryBudget } from "../token-update/budget.js";
import { TokenRefreshCoordinator } from "../token-update/coordinator.js";
import type { ScriptRunner } from "../token-update/script-runner.js";

const logger = getChildLogger({ module: "lookup" });

export interface LookupOptions {
	env?: Environment;
	variables?: FrameworkVariables;
	fetchImpl?: typeof fetch;
	runScript?: ScriptRunner;
	/** Override the shared lock file (tests). */
	lockFile?: string;
	/** Override the lock poll interval (tests). */
	lockWaitPollMs?: number;
	maxRetries?: number;
}

export type AuthStatus = {
	server: string;
	/** Token refreshes it took to get a valid session. */
	refreshes: number;
};

type LookupContext = {
	config: StoredSafeConfig;
	client: StoredSafeClient;
	coordinator: TokenRefreshCoordinator;
	budget: RetryBudget;
};

// ═══════════════════════════════════════════════════════════════════════════════
// Public API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Look up `<objectid>/<fieldname>` terms. Results keep the input order.
 */
export async function lookup(
	terms: readonly string[],
	options: LookupOptions = {},
): Promise<string[]> {
	logger.debug({ terms }, "lookup initial terms");
	const parsed = terms.map(parseTerm);

	return withContext(options, async (ctx) => {
		let session = await authenticate(ctx, initialSession(ctx.config));
		const results: string[] = [];

		for (const term of parsed) {
			const fetched = await fetchTerm(ctx, session, term);
			session = fetched.session;
			results.push(fetched.value);
		}

		logger.debug(
			{ count: results.length, refreshes: ctx.budget.attempts },
			"lookup complete",
		);
		return results;
	});
}

/**
 * Make sure a valid session exists, refreshing the token if needed.
 */
export async function checkAuth(options: LookupOptions = {}): Promise<AuthStatus> {
	return withContext(options, async (ctx) => {
		const session = await authenticate(ctx, initialSession(ctx.config));
		return { server: session.server, refreshes: ctx.budget.attempts };
	});
}

// ═══════════════════════════════════════════════════════════════════════════════
// State machine
// ═══════════════════════════════════════════════════════════════════════════════

async function withContext<T>(
	options: LookupOptions,
	fn: (ctx: LookupContext) => Promise<T>,
): Promise<T> {
	const config = await resolveConfig({
		env: options.env,
		variables: options.variables,
		lockFile: options.lockFile,
		lockWaitPollMs: options.lockWaitPollMs,
	});
	const budget = new RetryBudget(options.maxRetries ?? MAX_RETRIES);
	const client = new StoredSafeClient({
		verify: config.verify,
		timeoutMs: config.httpTimeoutMs,
		fetchImpl: options.fetchImpl,
	});
	const coordinator = new TokenRefreshCoordinator({
		config,
		budget,
		runScript: options.runScript,
	});

	try {
		return await fn({ config, client, coordinator, budget });
	} finally {
		await client.close();
	}
}

function initialSession(config: StoredSafeConfig): Session | undefined {
	return config.token ? createSession(config.server, config.token) : undefined;
}

/**
 * Loop until the vault accepts the session's token. Without a token, or
 * when the check fails, the token update script provides a new session.
 */
async function authenticate(ctx: LookupContext, session: Session | undefined): Promise<Session> {
	let current = session;
	while (true) {
		if (current && (await ctx.client.authCheck(current))) {
			logger.debug({ server: current.server }, "token auth check success");
			return current;
		}
		current = await ctx.coordinator.refresh(current);
	}
}

async function fetchTerm(
	ctx: LookupContext,
	session: Session,
	term: LookupTerm,
): Promise<{ session: Session; value: string }> {
	let current = session;
	logger.debug({ term: formatTerm(term) }, "looking up term");

	while (true) {
		const outcome = await ctx.client.fetchObject(current, term);
		switch (outcome.kind) {
			case "success":
				logger.debug({ term: formatTerm(term) }, "successfully retrieved item");
				return { session: current, value: outcome.value.trimEnd() };
			case "token-rejected":
				logger.debug(
					{ term: formatTerm(term), remaining: ctx.budget.remaining },
					"token rejected when retrieving item, updating token and retrying",
				);
				current = await authenticate(ctx, await ctx.coordinator.refresh(current));
				break;
			case "transient-failure":
				throw new LookupFailedError(term.objectId, outcome.status);
			case "malformed":
				throw new FieldNotFoundError(formatTerm(term), outcome.reason);
		}
	}
}
