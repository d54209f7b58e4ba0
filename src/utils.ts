import os from "node:os";
import path from "node:path";

export function sleep(ms: number): Promise<void> {
	return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export class AbortError extends Error {
	constructor(message = "Aborted") {
		super(message);
		this.name = "AbortError";
	}
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new AbortError();
	}
}

/**
 * Sleep with optional abort signal.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new AbortError());
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new AbortError());
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

/**
 * Mask a secret for display, keeping only a few characters at each end.
 */
export function maskSecret(value: string, visible = 3): string {
	if (value.length <= visible * 2) return "*".repeat(value.length);
	return `${value.slice(0, visible)}...${value.slice(-visible)}`;
}

export const CONFIG_DIR = process.env.OTP_HARVEST_DATA_DIR || path.join(os.homedir(), ".otp-harvest");
