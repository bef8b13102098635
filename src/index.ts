#!/usr/bin/env node

import { setVerbose } from "./globals.js";

// Module loggers are built on import, so --verbose has to be known before
// the commands load.
const args = process.argv.slice(2);
if (args.includes("-v") || args.includes("--verbose")) {
	setVerbose(true);
}

const { main } = await import("./cli/main.js");
await main(process.argv);
