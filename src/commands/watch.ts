/**
 * `watch`: the terminal front end. Runs the refresh scheduler and redraws the
 * codes every tick until interrupted.
 */

import readline from "node:readline";
import type { Command } from "commander";
import { createOrchestrator } from "../automation/index.js";
import { renderView } from "../cli/render.js";
import { loadConfig } from "../config/config.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger } from "../logging.js";
import { RefreshScheduler } from "../scheduler/scheduler.js";

const logger = getChildLogger({ module: "cmd-watch" });

export type WatchOptions = {
	refresh?: boolean;
};

export function registerWatchCommand(program: Command): void {
	program
		.command("watch")
		.description("Show live codes, refreshing accounts from the authenticator app on start")
		.option("--no-refresh", "Do not launch the authenticator app on start")
		.action(async (opts: WatchOptions) => {
			installUnhandledRejectionHandler("watch");
			const config = loadConfig();

			const scheduler = new RefreshScheduler({
				...config.scheduler,
				refreshOnStart: opts.refresh !== false && config.scheduler.refreshOnStart,
				runner: createOrchestrator(config),
				onTick: (view) => {
					if (process.stdout.isTTY) {
						console.clear();
					}
					console.log(renderView(view).join("\n"));
				},
			});

			const rl = readline.createInterface({ input: process.stdin });
			rl.on("line", (line) => {
				if (line.trim().toLowerCase() === "r") {
					scheduler.requestManualRefresh();
				}
			});

			await new Promise<void>((resolve) => {
				let stopping = false;
				const shutdown = () => {
					if (stopping) return;
					stopping = true;
					rl.close();
					scheduler
						.stop()
						.catch((err: unknown) => {
							logger.error({ error: String(err) }, "scheduler stop failed");
						})
						.finally(resolve);
				};
				process.once("SIGINT", shutdown);
				process.once("SIGTERM", shutdown);
				scheduler.start();
			});
		});
}
