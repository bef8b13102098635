import { registerCheckCommand } from "../commands/check.js";
import { registerLookupCommand } from "../commands/lookup.js";
import { closeLogger } from "../logging.js";
import { createProgram } from "./program.js";

export async function main(argv: readonly string[]): Promise<void> {
	const program = createProgram();

	registerLookupCommand(program);
	registerCheckCommand(program);

	try {
		await program.parseAsync([...argv]);
	} catch (err) {
		// Commander prints its own usage errors; this covers lookup failures.
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
		process.exitCode = 1;
	} finally {
		closeLogger();
	}
}
