export type Session = Readonly<{
	server: string;
	token: string;
	baseUrl: string;
}>;

export function buildBaseUrl(server: string): string {
	return `https://${server}/api/1.0`;
}

/**
 * Create a session. Sessions are frozen; a token refresh makes a new one.
 */
export function createSession(server: string, token: string): Session {
	return Object.freeze({ server, token, baseUrl: buildBaseUrl(server) });
}
