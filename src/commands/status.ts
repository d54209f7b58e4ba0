import fs from "node:fs";
import type { Command } from "commander";
import { MacProcessControl } from "../automation/process-control.js";
import { getConfigPath, loadConfig, resolveStorePath } from "../config/config.js";
import { formatError } from "../errors.js";
import { getChildLogger, getResolvedLoggerSettings } from "../logging.js";

const logger = getChildLogger({ module: "cmd-status" });

export type StatusOptions = {
	json?: boolean;
};

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show configuration, store location and app state")
		.option("--json", "Output as JSON")
		.action(async (opts: StatusOptions) => {
			try {
				const configPath = getConfigPath();
				const config = loadConfig();
				const storePath = resolveStorePath(config);

				let appRunning: boolean | "unknown" = "unknown";
				try {
					appRunning = await new MacProcessControl().isRunning(config.automation.targetProcess);
				} catch (err) {
					logger.debug({ error: formatError(err) }, "could not check app process");
				}

				const status = {
					config: {
						path: configPath,
						exists: fs.existsSync(configPath),
					},
					store: {
						path: storePath,
						exists: fs.existsSync(storePath),
						namespace: config.store.namespace,
					},
					automation: {
						hostApp: config.automation.hostApp,
						targetProcess: config.automation.targetProcess,
						appRunning,
						maxAttempts: config.automation.maxAttempts,
						populationTimeoutMs: config.automation.populationTimeoutMs,
					},
					logging: getResolvedLoggerSettings(),
				};

				if (opts.json) {
					console.log(JSON.stringify(status, null, 2));
					return;
				}

				console.log("=== otp-harvest status ===\n");

				console.log("Configuration:");
				console.log(`  Path: ${status.config.path}`);
				console.log(`  Exists: ${status.config.exists ? "yes" : "no"}`);
				console.log();

				console.log("Credential store:");
				console.log(`  Path: ${status.store.path}`);
				console.log(`  Exists: ${status.store.exists ? "yes" : "no"}`);
				console.log(`  Namespace: ${status.store.namespace}`);
				console.log();

				console.log("Automation:");
				console.log(`  Host: ${status.automation.hostApp}`);
				console.log(`  App process: ${status.automation.targetProcess}`);
				console.log(`  App running: ${String(status.automation.appRunning)}`);
				console.log(
					`  Retry policy: ${status.automation.maxAttempts} attempts, ${status.automation.populationTimeoutMs}ms each`,
				);
				console.log();

				console.log("Logging:");
				console.log(`  Level: ${status.logging.level}`);
				console.log(`  File: ${status.logging.file}`);
			} catch (err) {
				logger.error({ error: formatError(err) }, "status command failed");
				console.error(`Error: ${formatError(err)}`);
				process.exitCode = 1;
			}
		});
}
