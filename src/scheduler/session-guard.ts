import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "session-guard" });

/**
 * Single-slot guard: at most one automation session at a time.
 * A request while the slot is taken is dropped, not queued.
 */
export class SessionGuard {
	private active: Promise<void> | null = null;

	isActive(): boolean {
		return this.active !== null;
	}

	/**
	 * Start `task` if the slot is free. Returns false when it was dropped.
	 */
	tryRun(task: () => Promise<void>): boolean {
		if (this.active) {
			return false;
		}
		this.active = task()
			.catch((err: unknown) => {
				logger.error({ error: String(err) }, "guarded session rejected");
			})
			.finally(() => {
				this.active = null;
			});
		return true;
	}

	/**
	 * Resolves once the current session (if any) has finished.
	 */
	async whenIdle(): Promise<void> {
		if (this.active) {
			await this.active;
		}
	}
}
