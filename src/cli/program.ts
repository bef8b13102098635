import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const pkg = require("../../package.json") as { version?: string };
		return pkg.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("storedsafe-lookup")
		.description("Retrieve secrets and files from StoredSafe for automation tools")
		.version(getVersion())
		.option("-v, --verbose", "Enable debug logging on stderr");

	return program;
}
