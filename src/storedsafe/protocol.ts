/**
 * StoredSafe REST API (v1.0) response shapes.
 *
 * Only the parts the lookup reads are modelled; everything else passes
 * through untouched.
 */

import { z } from "zod";

export const SUCCESS_STATUS = "SUCCESS";

export const AUTH_CHECK_PATH = "/auth/check";
export const OBJECT_PATH = "/object";

export const TOKEN_HEADER = "X-Http-Token";

export const CallInfoSchema = z
	.object({
		status: z.string(),
	})
	.passthrough();

export const AuthCheckResponseSchema = z
	.object({
		CALLINFO: CallInfoSchema,
	})
	.passthrough();

export type AuthCheckResponse = z.infer<typeof AuthCheckResponseSchema>;

// An object without fields of a kind may send `[]` instead of `{}`.
const FieldMapSchema = z.record(z.unknown()).catch({});

/**
 * A vault object. Encrypted fields arrive decrypted under `crypted` when the
 * request asks for `decrypt=true`; public fields sit under `public`; object
 * metadata (objectid, objectname, ...) is top-level.
 */
export const StoredObjectSchema = z
	.object({
		crypted: FieldMapSchema.optional(),
		public: FieldMapSchema.optional(),
	})
	.passthrough();

export type StoredObject = z.infer<typeof StoredObjectSchema>;

export const ObjectResponseSchema = z
	.object({
		OBJECT: z.array(StoredObjectSchema).optional(),
		FILEDATA: z.string().optional(),
	})
	.passthrough();

export type ObjectResponse = z.infer<typeof ObjectResponseSchema>;
