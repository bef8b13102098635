import os from "node:os";
import path from "node:path";

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Expand a leading `~/` to the current user's home directory.
 */
export function expandHome(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

/**
 * Trim a value and collapse the empty string to undefined.
 */
export function nonEmpty(value: string | undefined | null): string | undefined {
	if (value == null) return undefined;
	const trimmed = value.trim();
	return trimmed === "" ? undefined : trimmed;
}
