import { spawn } from "node:child_process";
import { TimeoutError } from "../infra/timeout.js";

export type CommandResult = {
	code: number | null;
	stdout: string;
	stderr: string;
};

export type CommandOptions = {
	/** Kill the child and reject after this many ms. */
	timeoutMs?: number;
};

/**
 * Runs an executable (no shell) and collects its output.
 * A non-zero exit resolves normally; callers decide what the code means.
 */
export type CommandRunner = (
	cmd: string,
	args: readonly string[],
	options?: CommandOptions,
) => Promise<CommandResult>;

const DEFAULT_TIMEOUT_MS = 10_000;

export const runCommand: CommandRunner = (cmd, args, options = {}) => {
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

	return new Promise((resolve, reject) => {
		let settled = false;
		const proc = spawn(cmd, [...args], {
			stdio: ["ignore", "pipe", "pipe"],
		});

		let stdout = "";
		let stderr = "";

		const timeoutId = setTimeout(() => {
			if (settled) return;
			settled = true;
			proc.kill("SIGKILL");
			reject(new TimeoutError(`${cmd} timed out after ${timeoutMs}ms`, timeoutMs));
		}, timeoutMs);
		timeoutId.unref();

		proc.stdout.on("data", (data: Buffer) => {
			stdout += data.toString();
		});

		proc.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		proc.on("error", (error) => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutId);
			reject(error);
		});

		proc.on("close", (code) => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutId);
			resolve({ code, stdout, stderr });
		});
	});
};
