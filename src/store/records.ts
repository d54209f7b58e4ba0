import { Secret } from "otpauth";
import { z } from "zod";
import { type Account, createAccount } from "../totp/types.js";

/**
 * Keys that may carry the shared secret, newest first.
 */
export const SECRET_KEYS = ["otpSecretKeyNew", "otpSecretKey"] as const;

const RecordPayloadSchema = z
	.object({
		displayLabel: z.unknown(),
		accountName: z.unknown(),
		serviceTypeLabel: z.unknown(),
		issuer: z.unknown(),
		otpSecretKeyNew: z.string().optional(),
		otpSecretKey: z.string().optional(),
	})
	.passthrough();

export type RecordPayload = z.infer<typeof RecordPayloadSchema>;

export type RawRecordValue = string | Buffer | null;

export type DecodeResult = { ok: true; account: Account } | { ok: false; reason: string };

/**
 * First value that is a non-empty string. Display fields of other types are
 * ignored rather than failing the record.
 */
export function firstText(...values: unknown[]): string | undefined {
	for (const value of values) {
		if (typeof value === "string" && value.length > 0) return value;
	}
	return undefined;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode the stored value (TEXT or BLOB) into a JSON payload.
 */
export function parseRecordPayload(
	value: RawRecordValue,
): { ok: true; payload: RecordPayload } | { ok: false; reason: string } {
	if (value === null) {
		return { ok: false, reason: "empty value" };
	}

	let text: string;
	try {
		text = typeof value === "string" ? value : utf8.decode(value);
	} catch {
		return { ok: false, reason: "value is not valid UTF-8" };
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch {
		return { ok: false, reason: "value is not JSON" };
	}

	const parsed = RecordPayloadSchema.safeParse(json);
	if (!parsed.success) {
		return { ok: false, reason: "value is not an account object" };
	}
	return { ok: true, payload: parsed.data };
}

export function decodeRecord(value: RawRecordValue): DecodeResult {
	const parsed = parseRecordPayload(value);
	if (!parsed.ok) return parsed;

	const { payload } = parsed;
	// An empty string counts as absent, so the older key is still tried.
	const secret = payload.otpSecretKeyNew || payload.otpSecretKey;
	if (!secret) {
		return { ok: false, reason: "no secret key in record" };
	}

	return {
		ok: true,
		account: createAccount({
			label: firstText(payload.displayLabel, payload.accountName) ?? "Unknown",
			issuer: firstText(payload.serviceTypeLabel, payload.issuer),
			secret: Secret.fromUTF8(secret),
		}),
	};
}
