import type { Command } from "commander";
import { loadConfig, resolveStorePath } from "../config/config.js";
import { formatError } from "../errors.js";
import { inspectStore } from "../store/inspect.js";

export type InspectOptions = {
	json?: boolean;
};

export function registerInspectCommand(program: Command): void {
	program
		.command("inspect")
		.description("Show masked diagnostics for every record in the credential store")
		.option("--json", "Output as JSON")
		.action((opts: InspectOptions) => {
			try {
				const config = loadConfig();
				const storePath = resolveStorePath(config);
				const reports = inspectStore(storePath, { namespace: config.store.namespace });

				if (opts.json) {
					console.log(JSON.stringify(reports, null, 2));
					return;
				}

				console.log(`Store: ${storePath}`);
				console.log(`Records: ${reports.length}`);
				for (const report of reports) {
					console.log(`\n--- Record ${report.rowid} ---`);
					if (!report.ok) {
						console.log(`  Undecodable: ${report.reason}`);
						continue;
					}
					console.log(`  Label: ${report.label}`);
					for (const [key, value] of Object.entries(report.metadata)) {
						console.log(`  ${key}: ${value}`);
					}
					if (report.secrets.length === 0) {
						console.log("  No secret key present");
					}
					for (const secret of report.secrets) {
						console.log(`  [${secret.key}] ${secret.masked} (length ${secret.length})`);
						for (const candidate of secret.candidates) {
							console.log(
								`    ${candidate.encoding.padEnd(6)} ${String(candidate.byteLength).padStart(3)} bytes  code ${candidate.code}`,
							);
						}
					}
				}
			} catch (err) {
				console.error(`Error: ${formatError(err)}`);
				process.exitCode = 1;
			}
		});
}
