import type { Command } from "commander";
import { snapshotLine } from "../cli/render.js";
import { loadConfig, resolveStorePath } from "../config/config.js";
import { formatError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { loadAccounts } from "../store/reader.js";
import { generateCode, secondsRemaining } from "../totp/engine.js";
import { TOTP_PERIOD } from "../totp/types.js";

const logger = getChildLogger({ module: "cmd-codes" });

export type CodesOptions = {
	json?: boolean;
};

export function registerCodesCommand(program: Command): void {
	program
		.command("codes")
		.description("Print current codes straight from the credential store (no automation)")
		.option("--json", "Output as JSON")
		.action((opts: CodesOptions) => {
			try {
				const config = loadConfig();
				const accounts = loadAccounts(resolveStorePath(config), { namespace: config.store.namespace });
				const now = Date.now();
				const snapshots = accounts.map((account) => ({ account, ...generateCode(account, now) }));

				if (opts.json) {
					const rows = snapshots.map((s) => ({
						label: s.account.label,
						issuer: s.account.issuer ?? null,
						code: s.code,
						windowStart: s.windowStart,
						windowEnd: s.windowEnd,
					}));
					console.log(JSON.stringify(rows, null, 2));
					return;
				}

				for (const snapshot of snapshots) {
					console.log(snapshotLine(snapshot));
				}
				console.log(`\nRefreshes in ${secondsRemaining(now, TOTP_PERIOD)}s`);
			} catch (err) {
				logger.error({ error: formatError(err) }, "codes command failed");
				console.error(`Error: ${formatError(err)}`);
				process.exitCode = 1;
			}
		});
}
