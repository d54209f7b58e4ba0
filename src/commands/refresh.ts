/**
 * `refresh`: run one automation session (launch, wait, extract, close) and
 * report what happened.
 */

import type { Command } from "commander";
import { createOrchestrator } from "../automation/index.js";
import { loadConfig } from "../config/config.js";
import { formatError, isOtpHarvestError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { accountKey } from "../totp/types.js";

const logger = getChildLogger({ module: "cmd-refresh" });

export type RefreshOptions = {
	json?: boolean;
};

export function registerRefreshCommand(program: Command): void {
	program
		.command("refresh")
		.description("Open the authenticator app, harvest its accounts, then close it")
		.option("--json", "Output as JSON")
		.action(async (opts: RefreshOptions) => {
			const orchestrator = createOrchestrator(loadConfig());
			const outcome = await orchestrator.run({
				onTransition: (session) => {
					if (!opts.json) {
						console.log(`  ${session.state}${session.attempt > 0 ? ` (attempt ${session.attempt})` : ""}`);
					}
				},
			});

			if (opts.json) {
				console.log(
					JSON.stringify(
						outcome.ok
							? { ok: true, attempts: outcome.attempts, accounts: outcome.accounts.map(accountKey) }
							: {
									ok: false,
									attempts: outcome.attempts,
									reason: isOtpHarvestError(outcome.error) ? outcome.error.code : "Unknown",
									message: outcome.error.message,
								},
						null,
						2,
					),
				);
			} else if (outcome.ok) {
				console.log(`\nHarvested ${outcome.accounts.length} account(s):`);
				for (const account of outcome.accounts) {
					console.log(`  ${accountKey(account)}`);
				}
			} else {
				console.error(`\nRefresh failed: ${formatError(outcome.error)}`);
			}

			if (!outcome.ok) {
				logger.error({ error: formatError(outcome.error) }, "refresh command failed");
				process.exitCode = 1;
			}
		});
}
