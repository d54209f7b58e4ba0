import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import type { CommandResult, CommandRunner } from "../../src/automation/command-runner.js";
import { appleScriptString, MacProcessControl } from "../../src/automation/process-control.js";
import { isOtpHarvestError } from "../../src/errors.js";

function runnerReturning(code: number | null, stderr = "") {
	return vi.fn<CommandRunner>(async (): Promise<CommandResult> => ({ code, stdout: "", stderr }));
}

describe("appleScriptString", () => {
	it("quotes and escapes", () => {
		expect(appleScriptString("PlayCover")).toBe('"PlayCover"');
		expect(appleScriptString('a "b" \\c')).toBe('"a \\"b\\" \\\\c"');
	});
});

describe("MacProcessControl", () => {
	it("maps pgrep exit codes to running state", async () => {
		const running = runnerReturning(0);
		await expect(new MacProcessControl(running).isRunning("com.duosecurity.DuoMobile")).resolves.toBe(true);
		expect(running).toHaveBeenCalledWith("pgrep", ["-f", "com.duosecurity.DuoMobile"]);

		await expect(new MacProcessControl(runnerReturning(1)).isRunning("x")).resolves.toBe(false);
	});

	it("fails on other pgrep exit codes", async () => {
		const err = await new MacProcessControl(runnerReturning(2, "bad pattern\n"))
			.isRunning("x")
			.catch((e: unknown) => e);
		expect(isOtpHarvestError(err, "ProcessControlFailed")).toBe(true);
		expect(String(err)).toContain("bad pattern");
	});

	it("opens apps by name and fails on non-zero exit", async () => {
		const ok = runnerReturning(0);
		await new MacProcessControl(ok).launch("PlayCover");
		expect(ok).toHaveBeenCalledWith("open", ["-a", "PlayCover"]);

		const err = await new MacProcessControl(runnerReturning(1)).launch("Nope").catch((e: unknown) => e);
		expect(isOtpHarvestError(err, "ProcessControlFailed")).toBe(true);
	});

	it("treats pkill finding nothing as success", async () => {
		const none = runnerReturning(1);
		await expect(new MacProcessControl(none).terminate("com.duosecurity.DuoMobile")).resolves.toBeUndefined();
		expect(none).toHaveBeenCalledWith("pkill", ["-f", "com.duosecurity.DuoMobile"]);

		const err = await new MacProcessControl(runnerReturning(3)).terminate("x").catch((e: unknown) => e);
		expect(isOtpHarvestError(err, "ProcessControlFailed")).toBe(true);
	});

	it("quits through AppleScript", async () => {
		const run = runnerReturning(0);
		await new MacProcessControl(run).quit("PlayCover");
		expect(run).toHaveBeenCalledWith("osascript", ["-e", 'tell application "PlayCover" to quit']);
	});

	it("wraps runner failures", async () => {
		const run = vi.fn<CommandRunner>(async () => {
			throw new Error("spawn pgrep ENOENT");
		});
		const err = await new MacProcessControl(run).isRunning("x").catch((e: unknown) => e);
		expect(isOtpHarvestError(err, "ProcessControlFailed")).toBe(true);
		expect(err).toBeInstanceOf(Error);
		if (err instanceof Error) {
			expect(err.cause).toBeInstanceOf(Error);
		}
	});
});
