import { Secret } from "otpauth";
import type { Clock } from "../../src/automation/orchestrator.js";
import type { ProcessControl } from "../../src/automation/process-control.js";
import type { InputAction, Point, UiAutomation } from "../../src/automation/ui-automation.js";
import { parseConfig } from "../../src/config/config.js";
import type { CredentialSource } from "../../src/store/source.js";
import { type Account, createAccount } from "../../src/totp/types.js";
import { throwIfAborted } from "../../src/utils.js";

export function account(label: string, secret = `${label}-secret`, issuer?: string): Account {
	return createAccount({ label, issuer, secret: Secret.fromUTF8(secret) });
}

/**
 * Clock whose sleep advances time instantly.
 */
export class FakeClock implements Clock {
	readonly sleeps: number[] = [];

	constructor(private current = 1_700_000_000_000) {}

	now(): number {
		return this.current;
	}

	async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		throwIfAborted(signal);
		this.sleeps.push(ms);
		this.current += ms;
	}
}

export class FakeProcessControl implements ProcessControl {
	readonly calls: string[] = [];
	running = false;
	failLaunch: Error | null = null;
	failTerminate: Error | null = null;
	failQuit: Error | null = null;

	async isRunning(pattern: string): Promise<boolean> {
		this.calls.push(`isRunning:${pattern}`);
		return this.running;
	}

	async launch(app: string): Promise<void> {
		this.calls.push(`launch:${app}`);
		if (this.failLaunch) throw this.failLaunch;
	}

	async terminate(pattern: string): Promise<void> {
		this.calls.push(`terminate:${pattern}`);
		if (this.failTerminate) throw this.failTerminate;
	}

	async quit(app: string): Promise<void> {
		this.calls.push(`quit:${app}`);
		if (this.failQuit) throw this.failQuit;
	}
}

export class FakeUiAutomation implements UiAutomation {
	readonly calls: string[] = [];
	tile: Point = { x: 100, y: 200 };
	/** Errors thrown by successive locateElement calls; null means succeed. */
	locateFailures: Array<Error | null> = [];

	async focusWindow(app: string): Promise<void> {
		this.calls.push(`focus:${app}`);
	}

	async locateElement(app: string): Promise<Point> {
		this.calls.push(`locate:${app}`);
		const failure = this.locateFailures.shift();
		if (failure) throw failure;
		return this.tile;
	}

	async sendInput(action: InputAction): Promise<void> {
		this.calls.push(
			action.kind === "double-click" ? `double-click:${action.at.x},${action.at.y}` : `key:${action.key}`,
		);
	}

	async wait(ms: number): Promise<void> {
		this.calls.push(`wait:${ms}`);
	}
}

/**
 * Source that replays a script of results, repeating the last one.
 */
export class ScriptedSource implements CredentialSource {
	readonly description = "scripted";
	loads = 0;

	constructor(private readonly script: Array<Account[] | Error>) {}

	async load(): Promise<Account[]> {
		const step = this.script[Math.min(this.loads, this.script.length - 1)];
		this.loads++;
		if (step instanceof Error) throw step;
		return step;
	}
}

export function automationConfig(
	overrides: Record<string, number | string> = {},
): ReturnType<typeof parseConfig>["automation"] {
	return parseConfig({
		automation: {
			maxAttempts: 2,
			populationTimeoutMs: 3_000,
			pollIntervalMs: 1_000,
			retryBackoffMs: 0,
			launchSettleMs: 0,
			focusSettleMs: 0,
			...overrides,
		},
	}).automation;
}
