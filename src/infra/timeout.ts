/**
 * Timeout utilities for async operations.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

/**
 * Race a promise against a timeout. Rejects with TimeoutError if the
 * timeout fires first.
 *
 * IMPORTANT: The original promise is NOT cancelled — only the race is resolved.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label?: string): Promise<T> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return promise;
	}

	return new Promise<T>((resolve, reject) => {
		let settled = false;

		const timer = setTimeout(() => {
			if (!settled) {
				settled = true;
				reject(
					new TimeoutError(`${label ?? "operation"} timed out after ${timeoutMs}ms`, timeoutMs),
				);
			}
		}, timeoutMs);

		// Prevent the timer from keeping the process alive
		if (typeof timer === "object" && "unref" in timer) {
			timer.unref();
		}

		promise.then(
			(value) => {
				if (!settled) {
					settled = true;
					clearTimeout(timer);
					resolve(value);
				}
			},
			(err) => {
				if (!settled) {
					settled = true;
					clearTimeout(timer);
					reject(err);
				}
			},
		);
	});
}
