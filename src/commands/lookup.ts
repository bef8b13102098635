/**
 * `storedsafe-lookup lookup <terms...>`
 *
 * Prints one value per line in term order, or a JSON array with --json.
 * Downloaded files are printed as their decoded content.
 */

import type { Command } from "commander";

import { lookup } from "../lookup/orchestrator.js";
import { type VariableOptions, addVariableOptions, buildVariables } from "./variables-options.js";

type LookupCommandOptions = VariableOptions & {
	json?: boolean;
};

export function formatResults(results: readonly string[], json: boolean): string {
	if (json) {
		return `${JSON.stringify(results)}\n`;
	}
	return results.map((value) => `${value}\n`).join("");
}

export function registerLookupCommand(program: Command): void {
	addVariableOptions(
		program
			.command("lookup")
			.description("Retrieve values from StoredSafe")
			.argument("<terms...>", "Lookup terms as <objectid>/<fieldname> (fieldname 'download' for file content)"),
	)
		.option("--json", "Output results as a JSON array")
		.action(async (terms: string[], opts: LookupCommandOptions) => {
			const results = await lookup(terms, { variables: buildVariables(opts) });
			process.stdout.write(formatResults(results, opts.json ?? false));
		});
}
