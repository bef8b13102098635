/**
 * Advisory cross-process lock for the token update script.
 *
 * The lock is the presence of an empty file. It is taken with an exclusive
 * create, so two processes can never both believe they hold it.
 */

import fs from "node:fs";

import { getChildLogger } from "../logging.js";
import { LockTimeoutError } from "../storedsafe/errors.js";
import { sleep } from "../utils.js";

const logger = getChildLogger({ module: "token-update-lock" });

export interface LockOptions {
	/** Fixed delay between attempts while the lock is held elsewhere. */
	pollIntervalMs: number;
	/** Give up after this long. 0 waits indefinitely. */
	maxWaitMs: number;
}

export type ReleaseLock = () => Promise<void>;

/**
 * Create the lock file, polling while another process holds it.
 */
export async function acquireLock(lockFile: string, options: LockOptions): Promise<ReleaseLock> {
	const startedAt = Date.now();
	let announced = false;

	while (true) {
		try {
			const handle = await fs.promises.open(lockFile, "wx", 0o600);
			await handle.close();
			logger.debug({ lockFile }, "acquired token update lock");
			return () => releaseLock(lockFile);
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code !== "EEXIST") {
				throw err;
			}
		}

		const waited = Date.now() - startedAt;
		if (options.maxWaitMs > 0 && waited >= options.maxWaitMs) {
			throw new LockTimeoutError(lockFile, waited);
		}
		if (!announced) {
			logger.debug({ lockFile }, "token update in progress elsewhere, waiting for lock");
			announced = true;
		}
		await sleep(options.pollIntervalMs);
	}
}

async function releaseLock(lockFile: string): Promise<void> {
	try {
		await fs.promises.unlink(lockFile);
		logger.debug({ lockFile }, "released token update lock");
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
			throw err;
		}
		logger.warn({ lockFile }, "token update lock was already removed");
	}
}

/**
 * Run `fn` while holding the lock. The lock is released however `fn` ends.
 */
export async function withLock<T>(
	lockFile: string,
	options: LockOptions,
	fn: () => Promise<T>,
): Promise<T> {
	const release = await acquireLock(lockFile, options);
	try {
		return await fn();
	} finally {
		await release();
	}
}
