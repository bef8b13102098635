/**
 * Token refresh coordination.
 *
 * When the vault rejects the session token, the operator's update script is
 * run (one process at a time per host, under the lock file) and the new
 * token is read back from the rc file. Failed and timed-out runs are retried
 * while the invocation's shared budget lasts.
 */

import fs from "node:fs";

import type { StoredSafeConfig } from "../config/config.js";
import { readRcFile } from "../config/rc-file.js";
import { getChildLogger } from "../logging.js";
import {
	TokenUpdateFailedError,
	TokenUpdateScriptNotFoundError,
	TokenUpdateTimeoutError,
} from "../storedsafe/errors.js";
import { type Session, createSession } from "../storedsafe/session.js";
import type { RetryBudget } from "./budget.js";
import { withLock } from "./lock.js";
import { type ScriptResult, type ScriptRunner, runTokenUpdateScript } from "./script-runner.js";

const logger = getChildLogger({ module: "token-update" });

export type RefreshOutcome =
	| { kind: "refreshed"; session: Session }
	| { kind: "failed"; exitCode: number | null; detail: string }
	| { kind: "timed-out"; timeoutMs: number };

export interface TokenRefreshCoordinatorOptions {
	config: StoredSafeConfig;
	budget: RetryBudget;
	runScript?: ScriptRunner;
}

export class TokenRefreshCoordinator {
	private readonly config: StoredSafeConfig;
	private readonly budget: RetryBudget;
	private readonly runScript: ScriptRunner;

	constructor(options: TokenRefreshCoordinatorOptions) {
		this.config = options.config;
		this.budget = options.budget;
		this.runScript = options.runScript ?? runTokenUpdateScript;
	}

	/**
	 * Obtain a new session by running the token update script.
	 *
	 * @param current - session being replaced; its server is kept if the rc
	 *   file does not name one.
	 */
	async refresh(current?: Session): Promise<Session> {
		let lastError: TokenUpdateFailedError | TokenUpdateTimeoutError | undefined;

		while (true) {
			const script = this.requireScript();
			if (!this.budget.consume()) break;

			logger.debug(
				{ script, attempt: this.budget.attempts, maxAttempts: this.budget.max },
				"updating token using token update script",
			);
			const outcome = await this.attempt(script, current);

			if (outcome.kind === "refreshed") {
				logger.debug({ server: outcome.session.server }, "token update script produced a new token");
				return outcome.session;
			}
			lastError =
				outcome.kind === "timed-out"
					? new TokenUpdateTimeoutError(outcome.timeoutMs)
					: new TokenUpdateFailedError(`Token update script failed: ${outcome.detail}`, {
							exitCode: outcome.exitCode,
						});
			logger.warn(
				{ attempt: this.budget.attempts, remaining: this.budget.remaining },
				lastError.message,
			);
		}

		throw new TokenUpdateFailedError(
			`Failed updating token, maximum retries reached (${this.budget.max} attempts)`,
			{ cause: lastError, exitCode: lastError instanceof TokenUpdateFailedError ? lastError.exitCode : null },
		);
	}

	private requireScript(): string {
		const script = this.config.tokenUpdateScript;
		if (!script) {
			throw new TokenUpdateScriptNotFoundError(
				"Not logged in to StoredSafe and no token update script available. Specify one with STOREDSAFE_TOKEN_UPDATE_SCRIPT or storedsafe_token_update_script",
			);
		}
		if (!fs.existsSync(script)) {
			throw new TokenUpdateScriptNotFoundError(`Token update script does not exist at ${script}`);
		}
		return script;
	}

	private attempt(script: string, current: Session | undefined): Promise<RefreshOutcome> {
		const lockOptions = {
			pollIntervalMs: this.config.lockWaitPollMs,
			maxWaitMs: this.config.lockWaitTimeoutMs,
		};
		return withLock<RefreshOutcome>(this.config.lockFile, lockOptions, async () => {
			const result = await this.runScript(script, this.config.tokenUpdateTimeoutMs);
			logScriptResult(result);

			if (result.kind === "spawn-error") {
				return { kind: "failed", exitCode: null, detail: result.error.message };
			}
			if (result.kind === "timed-out") {
				return { kind: "timed-out", timeoutMs: result.timeoutMs };
			}
			if (result.exitCode !== 0) {
				const detail =
					result.exitCode === null
						? `killed by ${result.signal ?? "signal"}`
						: `exit code ${result.exitCode}`;
				return { kind: "failed", exitCode: result.exitCode, detail };
			}
			return this.readSession(current);
		});
	}

	private async readSession(current: Session | undefined): Promise<RefreshOutcome> {
		const rc = await readRcFile(this.config.rcFile);
		if (!rc.token) {
			return {
				kind: "failed",
				exitCode: 0,
				detail: `script exited cleanly but left no token in ${this.config.rcFile}`,
			};
		}
		const server = rc.server ?? current?.server ?? this.config.server;
		return { kind: "refreshed", session: createSession(server, rc.token) };
	}
}

function logScriptResult(result: ScriptResult): void {
	switch (result.kind) {
		case "exited":
			logger.debug(
				{ exitCode: result.exitCode, signal: result.signal, stdout: result.stdout, stderr: result.stderr },
				"token update script finished",
			);
			break;
		case "timed-out":
			logger.debug(
				{ timeoutMs: result.timeoutMs, stdout: result.stdout, stderr: result.stderr },
				"token update script timed out",
			);
			break;
		case "spawn-error":
			logger.debug({ error: result.error.message }, "token update script could not be started");
			break;
	}
}
