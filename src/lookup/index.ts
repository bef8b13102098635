/**
 * StoredSafe lookup for automation hosts.
 *
 * Hosts call `lookup()` with `<objectid>/<fieldname>` terms and their own
 * `storedsafe_*` variables; configuration, token refresh and retries are
 * handled here.
 */

export { ENV_NAMES, MAX_RETRIES, type Environment, type StoredSafeConfig } from "../config/config.js";
export {
	type FrameworkVariables,
	FrameworkVariablesSchema,
	VARIABLE_NAMES,
} from "../config/variables.js";
export {
	AuthProtocolError,
	ConfigError,
	FieldNotFoundError,
	LockTimeoutError,
	type LookupPhase,
	LookupFailedError,
	StoredSafeError,
	TokenUpdateFailedError,
	TokenUpdateScriptNotFoundError,
	TokenUpdateTimeoutError,
	UnreachableError,
} from "../storedsafe/errors.js";
export { type AuthStatus, checkAuth, type LookupOptions, lookup } from "./orchestrator.js";
