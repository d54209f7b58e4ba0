export type RetryConfig = {
	/** Maximum number of attempts (including the first). Must be >= 1. */
	maxAttempts: number;
	/** Base delay in milliseconds before the first retry. */
	baseDelayMs: number;
	/** Maximum delay cap in milliseconds. */
	maxDelayMs: number;
	/** Exponential backoff factor. Default: 2. */
	factor: number;
	/** Jitter factor (0–1). Randomizes delay by ±jitter. Default: 0.25. */
	jitter: number;
};

const DEFAULT_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 1000,
	maxDelayMs: 30_000,
	factor: 2,
	jitter: 0.25,
};

export function resolveRetryConfig(opts?: Partial<RetryConfig>): RetryConfig {
	return {
		maxAttempts: Math.max(1, opts?.maxAttempts ?? DEFAULT_CONFIG.maxAttempts),
		baseDelayMs: Math.max(0, opts?.baseDelayMs ?? DEFAULT_CONFIG.baseDelayMs),
		maxDelayMs: Math.max(0, opts?.maxDelayMs ?? DEFAULT_CONFIG.maxDelayMs),
		factor: Math.max(1, opts?.factor ?? DEFAULT_CONFIG.factor),
		jitter: Math.min(1, Math.max(0, opts?.jitter ?? DEFAULT_CONFIG.jitter)),
	};
}

/**
 * Compute backoff delay for a given attempt (1-based).
 */
export function computeRetryDelay(config: RetryConfig, attempt: number): number {
	const base = config.baseDelayMs * config.factor ** (attempt - 1);
	const capped = Math.min(base, config.maxDelayMs);
	const jitterRange = capped * config.jitter;
	const jitter = (Math.random() - 0.5) * 2 * jitterRange;
	return Math.max(0, Math.round(capped + jitter));
}
