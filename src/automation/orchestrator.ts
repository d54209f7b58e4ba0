/**
 * Automation orchestrator.
 *
 * Drives one session against the external authenticator app:
 *
 *   idle → checking-running → launching → waiting-for-population
 *        → extracting → closing → done
 *
 * with `retrying` between a failed wait and the next launch attempt, and
 * `failed` as the terminal state for anything that cannot be recovered.
 * Closing runs after every session that got past idle, including failed ones,
 * so the app and its host are never left running. Aborting the session's
 * signal cuts short any launch attempt or poll and goes straight to closing.
 */

import type { AutomationConfig } from "../config/config.js";
import { isOtpHarvestError, OtpHarvestError } from "../errors.js";
import { computeRetryDelay, type RetryConfig, resolveRetryConfig } from "../infra/retry.js";
import { withTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import type { CredentialSource } from "../store/source.js";
import type { Account } from "../totp/types.js";
import { sleepWithAbort, throwIfAborted } from "../utils.js";
import type { ProcessControl } from "./process-control.js";
import type { UiAutomation } from "./ui-automation.js";

const logger = getChildLogger({ module: "orchestrator" });

export type OrchestratorState =
	| "idle"
	| "checking-running"
	| "launching"
	| "waiting-for-population"
	| "extracting"
	| "retrying"
	| "closing"
	| "done"
	| "failed";

export type AutomationSession = {
	state: OrchestratorState;
	/** Epoch ms of the current launch attempt (session start before the first launch). */
	startedAt: number;
	/** Epoch ms after which waiting for population gives up. */
	deadline: number;
	/** Launch attempts made so far; 0 when the app was already running. */
	attempt: number;
};

export type SessionHooks = {
	/** Receives the canonical account set as soon as it is extracted. */
	commit?: (accounts: readonly Account[]) => void;
	onTransition?: (session: Readonly<AutomationSession>, from: OrchestratorState) => void;
	/** Cancels retries and polling; the closing step still runs. */
	signal?: AbortSignal;
};

export type OrchestratorOutcome =
	| { ok: true; accounts: readonly Account[]; attempts: number; launched: boolean }
	| { ok: false; error: Error; attempts: number; launched: boolean };

/**
 * What the scheduler needs from an orchestrator.
 */
export interface SessionRunner {
	run(hooks?: SessionHooks): Promise<OrchestratorOutcome>;
}

export type Clock = {
	now(): number;
	/** Rejects with an AbortError as soon as `signal` aborts. */
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
};

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep: sleepWithAbort,
};

export type OrchestratorConfig = Pick<
	AutomationConfig,
	| "hostApp"
	| "targetProcess"
	| "maxAttempts"
	| "populationTimeoutMs"
	| "pollIntervalMs"
	| "retryBackoffMs"
	| "launchSettleMs"
	| "focusSettleMs"
	| "closeTimeoutMs"
>;

export type OrchestratorDeps = {
	source: CredentialSource;
	processControl: ProcessControl;
	ui: UiAutomation;
	config: OrchestratorConfig;
	clock?: Clock;
};

type ProbeResult = { ok: true; accounts: Account[] } | { ok: false; error: OtpHarvestError };

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/** Store states that can still change while the app populates it. */
function isPendingStoreError(err: unknown): err is OtpHarvestError {
	return isOtpHarvestError(err, "StoreUnavailable") || isOtpHarvestError(err, "NoAccountsFound");
}

export class AutomationOrchestrator implements SessionRunner {
	private readonly clock: Clock;
	private readonly retryConfig: RetryConfig;
	private session: AutomationSession | null = null;

	constructor(private readonly deps: OrchestratorDeps) {
		this.clock = deps.clock ?? systemClock;
		this.retryConfig = resolveRetryConfig({
			baseDelayMs: deps.config.retryBackoffMs,
			maxDelayMs: deps.config.retryBackoffMs * 4,
		});
	}

	/**
	 * Copy of the active session, or null when idle.
	 */
	getSession(): Readonly<AutomationSession> | null {
		return this.session ? { ...this.session } : null;
	}

	async run(hooks: SessionHooks = {}): Promise<OrchestratorOutcome> {
		if (this.session) {
			throw new Error("an automation session is already active");
		}

		const startedAt = this.clock.now();
		const session: AutomationSession = { state: "idle", startedAt, deadline: startedAt, attempt: 0 };
		this.session = session;

		let accounts: readonly Account[] | null = null;
		let error: Error | null = null;

		try {
			this.transition(session, "checking-running", hooks);
			throwIfAborted(hooks.signal);
			if (await this.deps.processControl.isRunning(this.deps.config.targetProcess)) {
				const probe = await this.probe();
				throwIfAborted(hooks.signal);
				if (probe.ok) {
					logger.info("app already running with a populated store; skipping launch");
					this.transition(session, "extracting", hooks);
					accounts = await this.extract(hooks);
				}
			}
			if (!accounts) {
				accounts = await this.launchAndExtract(session, hooks);
			}
		} catch (err) {
			error = toError(err);
		}

		await this.close(session, hooks);

		const attempts = session.attempt;
		const launched = attempts > 0;
		try {
			if (error || !accounts) {
				const failure = error ?? new Error("session ended without accounts");
				this.transition(session, "failed", hooks);
				logger.warn({ attempts, error: String(failure) }, "automation session failed");
				return { ok: false, error: failure, attempts, launched };
			}
			this.transition(session, "done", hooks);
			logger.info({ attempts, accounts: accounts.length }, "automation session complete");
			return { ok: true, accounts, attempts, launched };
		} finally {
			this.session = null;
		}
	}

	private transition(session: AutomationSession, next: OrchestratorState, hooks: SessionHooks): void {
		const from = session.state;
		session.state = next;
		logger.debug({ from, to: next, attempt: session.attempt }, "orchestrator transition");
		hooks.onTransition?.({ ...session }, from);
	}

	private async launchAndExtract(
		session: AutomationSession,
		hooks: SessionHooks,
	): Promise<readonly Account[]> {
		const { maxAttempts, populationTimeoutMs } = this.deps.config;
		const { signal } = hooks;
		let lastError: OtpHarvestError | null = null;

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			throwIfAborted(signal);
			if (attempt > 1) {
				this.transition(session, "retrying", hooks);
				const delayMs = computeRetryDelay(this.retryConfig, attempt - 1);
				logger.warn(
					{ attempt, maxAttempts, delayMs, reason: lastError?.code },
					"re-issuing launch sequence",
				);
				if (delayMs > 0) {
					await this.clock.sleep(delayMs, signal);
				}
			}

			session.attempt = attempt;
			session.startedAt = this.clock.now();
			session.deadline = session.startedAt + populationTimeoutMs;
			this.transition(session, "launching", hooks);

			try {
				await this.launchSequence();
			} catch (err) {
				if (isOtpHarvestError(err, "AutomationInteractionFailed")) {
					lastError = err;
					continue;
				}
				throw err;
			}
			throwIfAborted(signal);

			this.transition(session, "waiting-for-population", hooks);
			const timeout = await this.waitForPopulation(session.deadline, signal);
			if (timeout) {
				lastError = timeout;
				continue;
			}

			this.transition(session, "extracting", hooks);
			try {
				return await this.extract(hooks);
			} catch (err) {
				if (isPendingStoreError(err)) {
					lastError = err;
					continue;
				}
				throw err;
			}
		}

		throw (
			lastError ??
			new OtpHarvestError("PopulationTimeout", `no accounts after ${maxAttempts} attempts`)
		);
	}

	/**
	 * Open the host, then open the app from inside the host's window.
	 */
	private async launchSequence(): Promise<void> {
		const { processControl, ui, config } = this.deps;

		await processControl.launch(config.hostApp);
		try {
			await ui.wait(config.launchSettleMs);
			await ui.focusWindow(config.hostApp);
			await ui.wait(config.focusSettleMs);
			const tile = await ui.locateElement(config.hostApp);
			await ui.sendInput({ kind: "double-click", at: tile });
		} catch (err) {
			if (isOtpHarvestError(err)) throw err;
			throw new OtpHarvestError("AutomationInteractionFailed", `launch interaction failed: ${String(err)}`, {
				cause: err,
			});
		}
	}

	private async probe(): Promise<ProbeResult> {
		try {
			const accounts = await this.deps.source.load();
			if (accounts.length > 0) {
				return { ok: true, accounts };
			}
			return {
				ok: false,
				error: new OtpHarvestError("NoAccountsFound", "credential source returned no accounts"),
			};
		} catch (err) {
			if (isPendingStoreError(err)) {
				return { ok: false, error: err };
			}
			throw err;
		}
	}

	/**
	 * Poll the source until it yields accounts. Returns null once populated, or
	 * the error to record when the deadline passes first.
	 */
	private async waitForPopulation(
		deadline: number,
		signal?: AbortSignal,
	): Promise<OtpHarvestError | null> {
		const { pollIntervalMs, populationTimeoutMs } = this.deps.config;

		for (;;) {
			throwIfAborted(signal);
			const probe = await this.probe();
			if (probe.ok) {
				return null;
			}

			const remaining = deadline - this.clock.now();
			if (remaining <= 0) {
				// A store that never appeared is reported as such; an empty one is a timeout.
				if (probe.error.code === "StoreUnavailable") {
					return new OtpHarvestError(
						"StoreUnavailable",
						`credential store still unavailable after ${populationTimeoutMs}ms`,
						{ cause: probe.error },
					);
				}
				return new OtpHarvestError(
					"PopulationTimeout",
					`no accounts appeared within ${populationTimeoutMs}ms`,
					{ cause: probe.error },
				);
			}
			await this.clock.sleep(Math.min(pollIntervalMs, remaining), signal);
		}
	}

	private async extract(hooks: SessionHooks): Promise<readonly Account[]> {
		const loaded = await this.deps.source.load();
		if (loaded.length === 0) {
			throw new OtpHarvestError("NoAccountsFound", "credential source returned no accounts");
		}
		const accounts = Object.freeze([...loaded]);
		hooks.commit?.(accounts);
		logger.info({ accounts: accounts.length }, "accounts extracted");
		return accounts;
	}

	private async close(session: AutomationSession, hooks: SessionHooks): Promise<void> {
		const { processControl, config } = this.deps;
		this.transition(session, "closing", hooks);
		await this.bestEffort(() => processControl.terminate(config.targetProcess), "terminate app");
		await this.bestEffort(() => processControl.quit(config.hostApp), "quit host");
	}

	private async bestEffort(fn: () => Promise<void>, label: string): Promise<void> {
		try {
			await withTimeout(fn(), this.deps.config.closeTimeoutMs, label);
		} catch (err) {
			logger.warn({ step: label, error: String(err) }, "close step failed; continuing");
		}
	}
}
