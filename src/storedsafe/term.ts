import { ConfigError } from "./errors.js";

/** Field name that selects the object's file attachment instead of a field. */
export const DOWNLOAD_FIELD = "download";

export type LookupTerm = {
	objectId: string;
	fieldName: string;
};

/**
 * Parse `<object_id>/<field_name>`. Only the first `/` separates; both parts
 * are kept verbatim, so the field name keeps any further slashes and spaces.
 */
export function parseTerm(term: string): LookupTerm {
	const sep = term.indexOf("/");
	if (sep === -1) {
		throw new ConfigError(`Malformed lookup term "${term}", expected <objectid>/<fieldname>`);
	}
	const objectId = term.slice(0, sep);
	const fieldName = term.slice(sep + 1);
	if (!objectId || !fieldName) {
		throw new ConfigError(`Malformed lookup term "${term}", expected <objectid>/<fieldname>`);
	}
	return { objectId, fieldName };
}

export function formatTerm(term: LookupTerm): string {
	return `${term.objectId}/${term.fieldName}`;
}

export function isDownload(term: LookupTerm): boolean {
	return term.fieldName === DOWNLOAD_FIELD;
}
