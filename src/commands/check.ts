import chalk from "chalk";
import type { Command } from "commander";

import { getChildLogger } from "../logging.js";
import { checkAuth } from "../lookup/orchestrator.js";
import { type VariableOptions, addVariableOptions, buildVariables } from "./variables-options.js";

const logger = getChildLogger({ module: "cmd-check" });

export function registerCheckCommand(program: Command): void {
	addVariableOptions(
		program
			.command("check")
			.description("Verify that the StoredSafe token is valid, running the update script if not"),
	).action(async (opts: VariableOptions) => {
		try {
			const status = await checkAuth({ variables: buildVariables(opts) });
			console.log(chalk.green(`✓ Authenticated with ${status.server}`));
			if (status.refreshes > 0) {
				console.log(chalk.yellow(`  Token refreshed (${status.refreshes} update script run(s))`));
			}
		} catch (err) {
			logger.debug({ error: String(err) }, "auth check failed");
			console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
			process.exitCode = 1;
		}
	});
}
