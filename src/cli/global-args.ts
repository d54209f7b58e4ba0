import { setConfigPath } from "../config/path.js";
import { setVerbose } from "../globals.js";

export type GlobalArgs = {
	config?: string;
	verbose: boolean;
};

/**
 * Pull `--config` and `--verbose` out of raw argv. Commander parses them again
 * later; this pass exists so they are in effect before any module creates its logger.
 */
export function scanGlobalArgs(argv: readonly string[]): GlobalArgs {
	const result: GlobalArgs = { verbose: false };
	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === "--") break;
		if (arg === "-v" || arg === "--verbose") {
			result.verbose = true;
		} else if (arg === "-c" || arg === "--config") {
			const value = argv[i + 1];
			if (value !== undefined && !value.startsWith("-")) {
				result.config = value;
				i++;
			}
		} else if (arg.startsWith("--config=")) {
			result.config = arg.slice("--config=".length);
		}
	}
	return result;
}

export function applyGlobalArgs(args: GlobalArgs): void {
	if (args.config) {
		setConfigPath(args.config);
	}
	if (args.verbose) {
		setVerbose(true);
	}
}
