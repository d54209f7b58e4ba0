import { registerCodesCommand } from "../commands/codes.js";
import { registerInspectCommand } from "../commands/inspect.js";
import { registerRefreshCommand } from "../commands/refresh.js";
import { registerStatusCommand } from "../commands/status.js";
import { registerWatchCommand } from "../commands/watch.js";
import { closeLogger, getLogger } from "../logging.js";
import { applyGlobalArgs } from "./global-args.js";
import { createProgram } from "./program.js";

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
	const program = createProgram();

	registerWatchCommand(program);
	registerCodesCommand(program);
	registerRefreshCommand(program);
	registerInspectCommand(program);
	registerStatusCommand(program);

	program.hook("preAction", (thisCommand) => {
		const opts = thisCommand.opts<{ config?: string; verbose?: boolean }>();
		applyGlobalArgs({ config: opts.config, verbose: opts.verbose === true });
		// Initialize logger after config path is set
		getLogger();
	});

	try {
		await program.parseAsync([...argv]);
	} finally {
		// pino's file destination keeps a handle open
		closeLogger();
	}
}
