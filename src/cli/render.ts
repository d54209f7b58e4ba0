import chalk from "chalk";
import type { OrchestratorStatus, SchedulerView } from "../scheduler/scheduler.js";
import { formatCode } from "../totp/engine.js";
import type { CodeSnapshot } from "../totp/types.js";

export function snapshotLine(snapshot: CodeSnapshot): string {
	const { account } = snapshot;
	const name = account.issuer ? `${account.issuer} / ${account.label}` : account.label;
	return `${name}: ${formatCode(snapshot.code)}`;
}

export function statusLine(status: OrchestratorStatus): string {
	switch (status.kind) {
		case "idle":
			return "Accounts: up to date";
		case "running":
			return `Accounts: refreshing (${status.state})`;
		case "failed":
			return `Accounts: refresh failed (${status.reason})`;
	}
}

/**
 * Plain-text screen for one tick of the `watch` command.
 */
export function renderView(view: SchedulerView): string[] {
	const lines = [chalk.bold("TOTP Codes"), "=".repeat(40)];

	if (view.snapshots.length === 0) {
		lines.push(view.status.kind === "running" ? "Waiting for accounts..." : "No accounts found");
	} else {
		for (const snapshot of view.snapshots) {
			lines.push(snapshotLine(snapshot));
		}
	}

	lines.push("");
	lines.push(`Refreshes in ${view.secondsRemaining}s`);
	const status = statusLine(view.status);
	lines.push(view.status.kind === "failed" ? chalk.red(status) : chalk.dim(status));
	lines.push("");
	lines.push(chalk.dim("Press r + Enter to refresh accounts, Ctrl+C to exit"));
	return lines;
}
