/**
 * Reader for `~/.storedsafe-client.rc`.
 *
 * The file is owned by the StoredSafe login tooling (and the token update
 * script); this side only reads it. Lines are `key:value`, e.g.
 *
 *   token:abc123
 *   username:alice
 *   mysite:safe.example.com
 *   apikey:xyz
 */

import fs from "node:fs";

import { getChildLogger } from "../logging.js";
import { ConfigError } from "../storedsafe/errors.js";

const logger = getChildLogger({ module: "rc-file" });

/** Marks a logged-out rc file. */
const NONE_VALUE = "none";

export type RcCredentials = {
	server?: string;
	token?: string;
};

export function parseRcFile(content: string): RcCredentials {
	const result: RcCredentials = {};

	for (const line of content.split(/\r?\n/)) {
		const sep = line.indexOf(":");
		if (sep <= 0) continue;

		const key = line.slice(0, sep).trim();
		const value = line.slice(sep + 1).trim();
		if (key !== "token" && key !== "mysite") continue;

		// An explicit "none" means logged out: no server and no token, even
		// if the other key has a value.
		if (value === NONE_VALUE) {
			return {};
		}
		if (!value) continue;

		if (key === "token") {
			result.token = value;
		} else {
			result.server = value;
		}
	}

	return result;
}

/**
 * Read server and token from an rc file. A missing file reads as empty.
 */
export async function readRcFile(rcFile: string): Promise<RcCredentials> {
	let content: string;
	try {
		content = await fs.promises.readFile(rcFile, "utf8");
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			logger.debug({ rcFile }, "rc file not found");
			return {};
		}
		throw new ConfigError(`Can not read rc file ${rcFile}`, { cause: err });
	}

	const credentials = parseRcFile(content);
	logger.debug(
		{ rcFile, server: credentials.server, hasToken: Boolean(credentials.token) },
		"read rc file",
	);
	return credentials;
}
