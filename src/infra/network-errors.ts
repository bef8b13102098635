/**
 * Formatting for vault connectivity failures.
 *
 * undici nests the socket error under `cause`, so the chain is included.
 */

/**
 * Format an error to a string with URLs redacted. Object URLs carry the
 * session token in their query string.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(redactUrls(msg), maxLength);
		}
		return truncate(redactUrls(String(err)), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function redactUrls(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
