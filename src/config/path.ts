import os from "node:os";
import path from "node:path";

/** rc file written by the StoredSafe login tooling. */
export const DEFAULT_RC_FILE = path.join(os.homedir(), ".storedsafe-client.rc");

/**
 * Lock file guarding the token update script, shared by every invocation on
 * the host.
 */
export const TOKEN_UPDATE_LOCK_FILE = "/tmp/.storedsafe_token_update_lock";
