/**
 * Refresh scheduler.
 *
 * Owns the committed account set, recomputes one code snapshot per account
 * every tick, and starts automation sessions (once at startup, then on
 * request) through a single-slot guard. This is the whole surface the
 * presentation layer talks to.
 */

import type { SchedulerConfig } from "../config/config.js";
import { formatError, isOtpHarvestError, type OtpHarvestErrorCode } from "../errors.js";
import { TimeoutError, withTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import type { OrchestratorState, SessionRunner } from "../automation/orchestrator.js";
import { generateCode, secondsRemaining } from "../totp/engine.js";
import { type Account, accountKey, type CodeSnapshot, TOTP_PERIOD } from "../totp/types.js";
import { SessionGuard } from "./session-guard.js";

const logger = getChildLogger({ module: "scheduler" });

export type OrchestratorStatus =
	| { kind: "idle" }
	| { kind: "running"; state: OrchestratorState }
	| { kind: "failed"; reason: OtpHarvestErrorCode | "Unknown"; message: string };

export type SchedulerView = {
	snapshots: readonly CodeSnapshot[];
	secondsRemaining: number;
	status: OrchestratorStatus;
};

export type RefreshSchedulerOptions = Partial<SchedulerConfig> & {
	runner: SessionRunner;
	/** Accounts to show before the first session completes. */
	initialAccounts?: readonly Account[];
	/** Called after every tick with the fresh view. */
	onTick?: (view: SchedulerView) => void;
	now?: () => number;
};

const DEFAULT_TICK_INTERVAL_MS = 1_000;
const DEFAULT_SHUTDOWN_GRACE_MS = 3_000;

export class RefreshScheduler {
	private readonly guard = new SessionGuard();
	private readonly now: () => number;
	private readonly tickIntervalMs: number;
	private readonly shutdownGraceMs: number;
	private readonly refreshOnStart: boolean;

	private accounts: readonly Account[];
	private snapshots: readonly CodeSnapshot[] = [];
	private remaining = TOTP_PERIOD;
	private status: OrchestratorStatus = { kind: "idle" };
	private timer: ReturnType<typeof setInterval> | null = null;
	private sessionAbort: AbortController | null = null;
	private startupTriggered = false;

	constructor(private readonly options: RefreshSchedulerOptions) {
		this.now = options.now ?? (() => Date.now());
		this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
		this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
		this.refreshOnStart = options.refreshOnStart ?? true;
		this.accounts = Object.freeze([...(options.initialAccounts ?? [])]);
	}

	start(): void {
		if (this.timer) return;
		this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
		this.tick();
	}

	/**
	 * Stop ticking and abort an in-flight session. The session is given up to
	 * `graceMs` to finish its closing step; after that the returned promise
	 * resolves anyway.
	 */
	async stop(opts: { graceMs?: number } = {}): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		this.sessionAbort?.abort();
		if (!this.guard.isActive()) return;

		const graceMs = opts.graceMs ?? this.shutdownGraceMs;
		try {
			await withTimeout(this.guard.whenIdle(), graceMs, "automation session shutdown");
		} catch (err) {
			if (!(err instanceof TimeoutError)) throw err;
			logger.warn({ graceMs }, "automation session still running at shutdown; not waiting");
		}
	}

	getSnapshots(): readonly CodeSnapshot[] {
		return this.snapshots;
	}

	getAccounts(): readonly Account[] {
		return this.accounts;
	}

	getSecondsRemaining(): number {
		return this.remaining;
	}

	getOrchestratorStatus(): OrchestratorStatus {
		return this.status;
	}

	isRunning(): boolean {
		return this.timer !== null;
	}

	/**
	 * Start an automation session. Returns false (and does nothing) when one is
	 * already active.
	 */
	requestManualRefresh(): boolean {
		const started = this.guard.tryRun(() => this.runSession());
		if (!started) {
			logger.debug("refresh requested while a session is active; ignoring");
		}
		return started;
	}

	private async runSession(): Promise<void> {
		const controller = new AbortController();
		this.sessionAbort = controller;
		this.status = { kind: "running", state: "idle" };
		try {
			const outcome = await this.options.runner.run({
				commit: (accounts) => this.commit(accounts),
				onTransition: (session) => {
					this.status = { kind: "running", state: session.state };
				},
				signal: controller.signal,
			});
			if (outcome.ok) {
				this.commit(outcome.accounts);
				this.status = { kind: "idle" };
			} else {
				this.status = failureStatus(outcome.error);
			}
		} catch (err) {
			this.status = failureStatus(err);
		} finally {
			this.sessionAbort = null;
		}
		if (controller.signal.aborted && this.status.kind === "failed") {
			logger.info({ keptAccounts: this.accounts.length }, "refresh cancelled by shutdown");
			this.status = { kind: "idle" };
			return;
		}
		if (this.status.kind === "failed") {
			logger.warn(
				{ reason: this.status.reason, keptAccounts: this.accounts.length },
				"refresh failed; keeping previous accounts",
			);
		}
	}

	private commit(accounts: readonly Account[]): void {
		if (accounts === this.accounts) return;
		this.accounts = Object.isFrozen(accounts) ? accounts : Object.freeze([...accounts]);
		logger.info({ accounts: this.accounts.map(accountKey) }, "account set replaced");
		this.recompute();
	}

	private recompute(): void {
		const now = this.now();
		const snapshots: CodeSnapshot[] = [];
		for (const account of this.accounts) {
			try {
				snapshots.push(Object.freeze({ account, ...generateCode(account, now) }));
			} catch (err) {
				logger.warn({ account: accountKey(account), error: formatError(err) }, "code generation failed");
			}
		}
		this.snapshots = Object.freeze(snapshots);
		this.remaining = secondsRemaining(now, TOTP_PERIOD);
	}

	private tick(): void {
		this.recompute();

		if (this.refreshOnStart && !this.startupTriggered) {
			this.startupTriggered = true;
			this.requestManualRefresh();
		}

		if (this.options.onTick) {
			try {
				this.options.onTick({
					snapshots: this.snapshots,
					secondsRemaining: this.remaining,
					status: this.status,
				});
			} catch (err) {
				logger.error({ error: formatError(err) }, "tick listener failed");
			}
		}
	}
}

function failureStatus(err: unknown): OrchestratorStatus {
	return {
		kind: "failed",
		reason: isOtpHarvestError(err) ? err.code : "Unknown",
		message: formatError(err),
	};
}
