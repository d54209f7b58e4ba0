/**
 * OS process control for the authenticator app and its host layer.
 *
 * These are single black-box calls with no retry of their own; all retry and
 * timeout policy lives in the orchestrator.
 */

import { OtpHarvestError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { type CommandResult, type CommandRunner, runCommand } from "./command-runner.js";

const logger = getChildLogger({ module: "process-control" });

export interface ProcessControl {
	/** True when a process whose command line matches `pattern` is alive. */
	isRunning(pattern: string): Promise<boolean>;

	/** Ask the OS to open an application by name. */
	launch(app: string): Promise<void>;

	/** Kill every process whose command line matches `pattern`. */
	terminate(pattern: string): Promise<void>;

	/** Ask an application to quit gracefully. */
	quit(app: string): Promise<void>;
}

/**
 * Escape a value for use inside an AppleScript string literal.
 */
export function appleScriptString(value: string): string {
	return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export class MacProcessControl implements ProcessControl {
	constructor(private readonly run: CommandRunner = runCommand) {}

	private async exec(cmd: string, args: readonly string[], what: string): Promise<CommandResult> {
		try {
			return await this.run(cmd, args);
		} catch (err) {
			throw new OtpHarvestError("ProcessControlFailed", `${what} failed: ${String(err)}`, {
				cause: err,
			});
		}
	}

	async isRunning(pattern: string): Promise<boolean> {
		const result = await this.exec("pgrep", ["-f", pattern], `pgrep ${pattern}`);
		// pgrep: 0 = match, 1 = no match, anything else = error
		if (result.code === 0) return true;
		if (result.code === 1) return false;
		throw new OtpHarvestError(
			"ProcessControlFailed",
			`pgrep ${pattern} exited with ${result.code}: ${result.stderr.trim()}`,
		);
	}

	async launch(app: string): Promise<void> {
		const result = await this.exec("open", ["-a", app], `open ${app}`);
		if (result.code !== 0) {
			throw new OtpHarvestError(
				"ProcessControlFailed",
				`open -a ${app} exited with ${result.code}: ${result.stderr.trim()}`,
			);
		}
		logger.debug({ app }, "launch requested");
	}

	async terminate(pattern: string): Promise<void> {
		const result = await this.exec("pkill", ["-f", pattern], `pkill ${pattern}`);
		// pkill exits 1 when nothing matched, which is fine for teardown
		if (result.code !== 0 && result.code !== 1) {
			throw new OtpHarvestError(
				"ProcessControlFailed",
				`pkill ${pattern} exited with ${result.code}: ${result.stderr.trim()}`,
			);
		}
		logger.debug({ pattern, matched: result.code === 0 }, "terminate requested");
	}

	async quit(app: string): Promise<void> {
		const script = `tell application ${appleScriptString(app)} to quit`;
		const result = await this.exec("osascript", ["-e", script], `quit ${app}`);
		if (result.code !== 0) {
			throw new OtpHarvestError(
				"ProcessControlFailed",
				`quitting ${app} exited with ${result.code}: ${result.stderr.trim()}`,
			);
		}
		logger.debug({ app }, "quit requested");
	}
}
