/**
 * Framework variables: the host runtime's own settings for the lookup
 * (`storedsafe_server`, `storedsafe_skip_verify`, ...). They rank below
 * environment variables.
 */

import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { ConfigError } from "../storedsafe/errors.js";

const VariableValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const FrameworkVariablesSchema = z.record(VariableValueSchema);

export type VariableValue = z.infer<typeof VariableValueSchema>;
export type FrameworkVariables = z.infer<typeof FrameworkVariablesSchema>;

export const VARIABLE_NAMES = {
	server: "storedsafe_server",
	cabundle: "storedsafe_cabundle",
	skipVerify: "storedsafe_skip_verify",
	tokenUpdateScript: "storedsafe_token_update_script",
	rcFile: "storedsafe_rc_file",
	tokenUpdateTimeout: "storedsafe_token_update_timeout",
	lockTimeout: "storedsafe_lock_timeout",
	httpTimeout: "storedsafe_http_timeout",
} as const;

/**
 * Parse `key=value` assignments. The first `=` splits; later assignments of
 * the same key win.
 */
export function parseVarAssignments(assignments: readonly string[]): FrameworkVariables {
	const vars: FrameworkVariables = {};
	for (const assignment of assignments) {
		const eq = assignment.indexOf("=");
		if (eq <= 0) {
			throw new ConfigError(`Invalid variable "${assignment}", expected key=value`);
		}
		vars[assignment.slice(0, eq).trim()] = assignment.slice(eq + 1);
	}
	return vars;
}

/**
 * Load framework variables from a JSON5 file holding a flat object of
 * scalar values.
 */
export function loadVariablesFile(filePath: string): FrameworkVariables {
	let raw: string;
	try {
		raw = fs.readFileSync(filePath, "utf8");
	} catch (err) {
		throw new ConfigError(`Can not read variables file ${filePath}`, { cause: err });
	}

	let parsed: unknown;
	try {
		parsed = JSON5.parse(raw);
	} catch (err) {
		throw new ConfigError(`Variables file ${filePath} is not valid JSON5`, { cause: err });
	}

	const result = FrameworkVariablesSchema.safeParse(parsed);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid variables file ${filePath}: ${issues}`);
	}
	return result.data;
}
