import type { Command } from "commander";

import {
	type FrameworkVariables,
	loadVariablesFile,
	parseVarAssignments,
} from "../config/variables.js";

export type VariableOptions = {
	var: string[];
	varsFile?: string;
};

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

/**
 * Add the host-variable options shared by every command.
 */
export function addVariableOptions(command: Command): Command {
	return command
		.option(
			"--var <key=value>",
			"Framework variable, e.g. storedsafe_server=safe.example.com (repeatable)",
			collect,
			[],
		)
		.option("--vars-file <path>", "JSON5 file with framework variables");
}

/**
 * `--var` assignments are layered over the variables file.
 */
export function buildVariables(opts: VariableOptions): FrameworkVariables {
	const fromFile = opts.varsFile ? loadVariablesFile(opts.varsFile) : {};
	return { ...fromFile, ...parseVarAssignments(opts.var) };
}
