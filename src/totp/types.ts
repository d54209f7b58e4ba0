import type { Secret } from "otpauth";

export const TOTP_DIGITS = 6;
export const TOTP_PERIOD = 30;
export const TOTP_ALGORITHM = "SHA1";

/**
 * One authenticator account read from the credential store.
 * Frozen on creation; a reload replaces the whole set.
 */
export type Account = Readonly<{
	label: string;
	issuer?: string;
	/** Shared key; raw UTF-8 bytes of the stored string, not base32. */
	secret: Secret;
	digits: typeof TOTP_DIGITS;
	period: typeof TOTP_PERIOD;
	algorithm: typeof TOTP_ALGORITHM;
}>;

export type CodeSnapshot = Readonly<{
	account: Account;
	code: string;
	windowStart: number;
	windowEnd: number;
}>;

export function createAccount(params: { label: string; issuer?: string; secret: Secret }): Account {
	return Object.freeze({
		label: params.label,
		...(params.issuer ? { issuer: params.issuer } : {}),
		secret: params.secret,
		digits: TOTP_DIGITS,
		period: TOTP_PERIOD,
		algorithm: TOTP_ALGORITHM,
	});
}

/**
 * Identity of an account: label plus issuer.
 */
export function accountKey(account: Account): string {
	return account.issuer ? `${account.issuer}:${account.label}` : account.label;
}
