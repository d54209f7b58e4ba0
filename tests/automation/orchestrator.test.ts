import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import {
	AutomationOrchestrator,
	type OrchestratorState,
	type SessionHooks,
} from "../../src/automation/orchestrator.js";
import { isOtpHarvestError, OtpHarvestError } from "../../src/errors.js";
import type { Account } from "../../src/totp/types.js";
import {
	account,
	automationConfig,
	FakeClock,
	FakeProcessControl,
	FakeUiAutomation,
	ScriptedSource,
} from "../helpers/fakes.js";

const TARGET = "com.duosecurity.DuoMobile";
const HOST = "PlayCover";

const unavailable = () => new OtpHarvestError("StoreUnavailable", "not there yet");
const empty = () => new OtpHarvestError("NoAccountsFound", "nothing yet");

describe("AutomationOrchestrator", () => {
	let processControl: FakeProcessControl;
	let ui: FakeUiAutomation;
	let clock: FakeClock;
	let states: OrchestratorState[];
	let committed: Array<readonly Account[]>;
	let hooks: SessionHooks;

	function orchestrator(source: ScriptedSource, overrides: Record<string, number> = {}) {
		return new AutomationOrchestrator({
			source,
			processControl,
			ui,
			clock,
			config: automationConfig(overrides),
		});
	}

	beforeEach(() => {
		processControl = new FakeProcessControl();
		ui = new FakeUiAutomation();
		clock = new FakeClock();
		states = [];
		committed = [];
		hooks = {
			onTransition: (session) => states.push(session.state),
			commit: (accounts) => committed.push(accounts),
		};
	});

	it("launches, waits for population, extracts, then closes", async () => {
		const accounts = [account("Work"), account("Mail")];
		const source = new ScriptedSource([unavailable(), empty(), accounts]);

		const outcome = await orchestrator(source).run(hooks);

		expect(outcome).toMatchObject({ ok: true, attempts: 1, launched: true });
		expect(states).toEqual([
			"checking-running",
			"launching",
			"waiting-for-population",
			"extracting",
			"closing",
			"done",
		]);
		expect(processControl.calls).toEqual([
			`isRunning:${TARGET}`,
			`launch:${HOST}`,
			`terminate:${TARGET}`,
			`quit:${HOST}`,
		]);
		expect(ui.calls).toEqual([
			"wait:0",
			`focus:${HOST}`,
			"wait:0",
			`locate:${HOST}`,
			"double-click:100,200",
		]);
		// two failed polls, one successful poll, one canonical read
		expect(source.loads).toBe(4);
		expect(clock.sleeps).toEqual([1_000, 1_000]);
		expect(committed).toHaveLength(1);
		expect(committed[0].map((a) => a.label)).toEqual(["Work", "Mail"]);
		expect(Object.isFrozen(committed[0])).toBe(true);
	});

	it("skips the launch when the app is already running with a populated store", async () => {
		processControl.running = true;
		const source = new ScriptedSource([[account("Work")]]);

		const outcome = await orchestrator(source).run(hooks);

		expect(outcome).toMatchObject({ ok: true, attempts: 0, launched: false });
		expect(states).toEqual(["checking-running", "extracting", "closing", "done"]);
		expect(processControl.calls).toEqual([`isRunning:${TARGET}`, `terminate:${TARGET}`, `quit:${HOST}`]);
		expect(ui.calls).toEqual([]);
	});

	it("launches anyway when the running app has not populated the store", async () => {
		processControl.running = true;
		const source = new ScriptedSource([empty(), [account("Work")]]);

		const outcome = await orchestrator(source).run(hooks);

		expect(outcome).toMatchObject({ ok: true, attempts: 1 });
		expect(processControl.calls).toContain(`launch:${HOST}`);
	});

	it("retries up to maxAttempts, then fails with PopulationTimeout and still closes", async () => {
		const source = new ScriptedSource([empty()]);

		const outcome = await orchestrator(source, { maxAttempts: 2 }).run(hooks);

		expect(outcome.ok).toBe(false);
		if (outcome.ok) return;
		expect(isOtpHarvestError(outcome.error, "PopulationTimeout")).toBe(true);
		expect(outcome.attempts).toBe(2);
		expect(states).toEqual([
			"checking-running",
			"launching",
			"waiting-for-population",
			"retrying",
			"launching",
			"waiting-for-population",
			"closing",
			"failed",
		]);
		expect(processControl.calls.filter((c) => c.startsWith("launch:"))).toHaveLength(2);
		expect(processControl.calls.slice(-2)).toEqual([`terminate:${TARGET}`, `quit:${HOST}`]);
		expect(committed).toEqual([]);
	});

	it("bounds each wait by the population deadline", async () => {
		const source = new ScriptedSource([empty()]);

		await orchestrator(source, { maxAttempts: 1, populationTimeoutMs: 2_500 }).run(hooks);

		expect(clock.sleeps).toEqual([1_000, 1_000, 500]);
		expect(source.loads).toBe(4);
	});

	it("reports StoreUnavailable when the store never appears", async () => {
		const source = new ScriptedSource([unavailable()]);

		const outcome = await orchestrator(source, { maxAttempts: 1 }).run(hooks);

		expect(outcome.ok).toBe(false);
		if (outcome.ok) return;
		expect(isOtpHarvestError(outcome.error, "StoreUnavailable")).toBe(true);
		expect(processControl.calls.slice(-2)).toEqual([`terminate:${TARGET}`, `quit:${HOST}`]);
	});

	it("retries after a failed UI interaction", async () => {
		ui.locateFailures = [new OtpHarvestError("AutomationInteractionFailed", "tile not found"), null];
		const source = new ScriptedSource([[account("Work")]]);

		const outcome = await orchestrator(source).run(hooks);

		expect(outcome).toMatchObject({ ok: true, attempts: 2 });
		expect(states.slice(0, 4)).toEqual(["checking-running", "launching", "retrying", "launching"]);
	});

	it("wraps unexpected UI errors as AutomationInteractionFailed", async () => {
		ui.locateFailures = [new Error("osascript crashed")];
		const source = new ScriptedSource([[account("Work")]]);

		const outcome = await orchestrator(source, { maxAttempts: 1 }).run(hooks);

		expect(outcome.ok).toBe(false);
		if (outcome.ok) return;
		expect(isOtpHarvestError(outcome.error, "AutomationInteractionFailed")).toBe(true);
	});

	it("does not retry a failed launch request but still closes", async () => {
		processControl.failLaunch = new OtpHarvestError("ProcessControlFailed", "open failed");
		const source = new ScriptedSource([[account("Work")]]);

		const outcome = await orchestrator(source, { maxAttempts: 3 }).run(hooks);

		expect(outcome.ok).toBe(false);
		if (outcome.ok) return;
		expect(isOtpHarvestError(outcome.error, "ProcessControlFailed")).toBe(true);
		expect(outcome.attempts).toBe(1);
		expect(states.slice(-2)).toEqual(["closing", "failed"]);
		expect(processControl.calls.slice(-2)).toEqual([`terminate:${TARGET}`, `quit:${HOST}`]);
	});

	it("keeps a successful extraction when closing fails", async () => {
		processControl.failTerminate = new OtpHarvestError("ProcessControlFailed", "pkill failed");
		processControl.failQuit = new Error("osascript failed");
		const source = new ScriptedSource([[account("Work")]]);

		const outcome = await orchestrator(source).run(hooks);

		expect(outcome.ok).toBe(true);
		expect(states.slice(-2)).toEqual(["closing", "done"]);
		expect(processControl.calls.slice(-2)).toEqual([`terminate:${TARGET}`, `quit:${HOST}`]);
	});

	it("stops retrying once aborted and still closes", async () => {
		const controller = new AbortController();
		const source = new ScriptedSource([empty()]);

		const outcome = await orchestrator(source, { maxAttempts: 3 }).run({
			...hooks,
			onTransition: (session) => {
				states.push(session.state);
				if (session.state === "waiting-for-population") controller.abort();
			},
			signal: controller.signal,
		});

		expect(outcome.ok).toBe(false);
		if (outcome.ok) return;
		expect(outcome.error.name).toBe("AbortError");
		expect(outcome.attempts).toBe(1);
		expect(states).toEqual([
			"checking-running",
			"launching",
			"waiting-for-population",
			"closing",
			"failed",
		]);
		expect(processControl.calls).toEqual([
			`isRunning:${TARGET}`,
			`launch:${HOST}`,
			`terminate:${TARGET}`,
			`quit:${HOST}`,
		]);
		expect(source.loads).toBe(0);
	});

	it("does not launch when aborted before it starts", async () => {
		const controller = new AbortController();
		controller.abort();

		const outcome = await orchestrator(new ScriptedSource([[account("Work")]])).run({
			...hooks,
			signal: controller.signal,
		});

		expect(outcome).toMatchObject({ ok: false, attempts: 0, launched: false });
		expect(processControl.calls).toEqual([`terminate:${TARGET}`, `quit:${HOST}`]);
	});

	it("clears the session once finished", async () => {
		const runner = orchestrator(new ScriptedSource([[account("Work")]]));
		expect(runner.getSession()).toBeNull();

		await runner.run(hooks);

		expect(runner.getSession()).toBeNull();
	});
});
