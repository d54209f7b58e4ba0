/**
 * Time-step one-time-password generation (RFC 6238 over RFC 4226).
 *
 * Everything here is pure: identical (secret, now, period, digits) always
 * yields the same code and window, so countdowns stay consistent within a tick.
 */

import { HOTP } from "otpauth";
import { OtpHarvestError } from "../errors.js";
import type { Account } from "./types.js";

export type CodeWindow = {
	/** Zero-padded code, `account.digits` wide. */
	code: string;
	/** Unix seconds; the code is valid for `windowStart <= now < windowEnd`. */
	windowStart: number;
	windowEnd: number;
};

function toUnixSeconds(now: Date | number): number {
	const ms = typeof now === "number" ? now : now.getTime();
	return Math.floor(ms / 1000);
}

/**
 * Time-step counter for a moment in time: floor(unixSeconds / period).
 */
export function timeCounter(now: Date | number, period: number): number {
	return Math.floor(toUnixSeconds(now) / period);
}

export function generateCode(account: Account, now: Date | number): CodeWindow {
	if (account.secret.bytes.length === 0) {
		throw new OtpHarvestError("InvalidSecret", `account "${account.label}" has an empty secret`);
	}

	const counter = timeCounter(now, account.period);
	const code = HOTP.generate({
		secret: account.secret,
		algorithm: account.algorithm,
		digits: account.digits,
		counter,
	});

	const windowStart = counter * account.period;
	return { code, windowStart, windowEnd: windowStart + account.period };
}

/**
 * Whole seconds left before the current window rolls over (1..period).
 */
export function secondsRemaining(now: Date | number, period: number): number {
	return period - (toUnixSeconds(now) % period);
}

/**
 * Split a code into two groups for display: "123456" -> "123 456".
 */
export function formatCode(code: string): string {
	if (code.length < 2) return code;
	const mid = Math.floor(code.length / 2);
	return `${code.slice(0, mid)} ${code.slice(mid)}`;
}
