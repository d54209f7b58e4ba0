#!/usr/bin/env node

import { applyGlobalArgs, scanGlobalArgs } from "./cli/global-args.js";
import { formatError } from "./errors.js";

// Command modules create their loggers on import, so global options go first.
applyGlobalArgs(scanGlobalArgs(process.argv.slice(2)));

try {
	const { runCli } = await import("./cli/main.js");
	await runCli();
} catch (err) {
	console.error(`Error: ${formatError(err)}`);
	process.exitCode = 1;
}
