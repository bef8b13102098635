import fs from "node:fs";

import { Agent } from "undici";

import { ConfigError } from "./errors.js";

/**
 * TLS peer verification for vault requests. Decided once at configuration
 * time; a request never falls back to a weaker mode.
 */
export type VerifyMode =
	| { kind: "default" }
	| { kind: "skip" }
	| { kind: "ca-bundle"; path: string };

export function describeVerifyMode(mode: VerifyMode): string {
	switch (mode.kind) {
		case "default":
			return "system trust store";
		case "skip":
			return "verification disabled";
		case "ca-bundle":
			return `CA bundle ${mode.path}`;
	}
}

/**
 * Build the undici dispatcher for a verification mode. The default mode
 * uses the global dispatcher, so no agent is created for it.
 */
export function createDispatcher(mode: VerifyMode): Agent | undefined {
	switch (mode.kind) {
		case "default":
			return undefined;
		case "skip":
			return new Agent({ connect: { rejectUnauthorized: false } });
		case "ca-bundle": {
			let ca: string;
			try {
				ca = fs.readFileSync(mode.path, "utf8");
			} catch (err) {
				throw new ConfigError(`Can not read CA bundle ${mode.path}`, { cause: err });
			}
			return new Agent({ connect: { ca, rejectUnauthorized: true } });
		}
	}
}
