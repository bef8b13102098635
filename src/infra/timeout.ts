/**
 * Request timeouts for vault calls.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

/**
 * Run a fetch that is aborted with a {@link TimeoutError} after `timeoutMs`.
 * A non-positive timeout passes the call straight through; vault requests
 * are unbounded unless a timeout is configured.
 */
export async function fetchWithTimeout(
	fetchImpl: typeof fetch,
	url: string | URL,
	init: RequestInit,
	timeoutMs: number,
): Promise<Response> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return fetchImpl(url, init);
	}

	const controller = new AbortController();
	const timer = setTimeout(() => {
		controller.abort(new TimeoutError(`fetch timed out after ${timeoutMs}ms`, timeoutMs));
	}, timeoutMs);
	timer.unref();

	try {
		return await fetchImpl(url, { ...init, signal: controller.signal });
	} finally {
		clearTimeout(timer);
	}
}
