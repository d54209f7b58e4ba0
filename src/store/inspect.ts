/**
 * Per-record diagnostics for the `inspect` command.
 *
 * Shows which secret keys each record carries and the code every plausible
 * encoding of the secret would produce right now, so a mismatch against the
 * authenticator app can be traced to the decoding step. Secrets are masked.
 */

import { Secret } from "otpauth";
import { generateCode } from "../totp/engine.js";
import { createAccount } from "../totp/types.js";
import { maskSecret } from "../utils.js";
import { firstText, parseRecordPayload, SECRET_KEYS } from "./records.js";
import { type ReadOptions, readStoreRecords } from "./reader.js";

export type SecretEncoding = "raw" | "hex" | "base32" | "base64";

export type DecodingCandidate = {
	encoding: SecretEncoding;
	byteLength: number;
	code: string;
};

export type SecretKeyReport = {
	key: string;
	masked: string;
	length: number;
	candidates: DecodingCandidate[];
};

export type RecordReport =
	| {
			rowid: number;
			ok: true;
			label: string;
			metadata: Record<string, string | number | boolean>;
			secrets: SecretKeyReport[];
	  }
	| { rowid: number; ok: false; reason: string };

const METADATA_KEYS = ["otpType", "otpDigits", "otpPeriod", "otpAlgorithm"];

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;
const BASE32_PATTERN = /^[A-Z2-7]+=*$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Every encoding the stored string could plausibly be in. Raw UTF-8 is always
 * a candidate and is the one that matches the authenticator app.
 */
export function secretCandidates(value: string): Array<{ encoding: SecretEncoding; secret: Secret }> {
	const candidates: Array<{ encoding: SecretEncoding; secret: Secret }> = [
		{ encoding: "raw", secret: Secret.fromUTF8(value) },
	];

	if (HEX_PATTERN.test(value)) {
		candidates.push({ encoding: "hex", secret: Secret.fromHex(value) });
	}
	const upper = value.toUpperCase();
	if (BASE32_PATTERN.test(upper)) {
		candidates.push({ encoding: "base32", secret: Secret.fromBase32(upper) });
	}
	if (BASE64_PATTERN.test(value)) {
		const decoded = Buffer.from(value, "base64");
		if (decoded.length > 0) {
			candidates.push({ encoding: "base64", secret: Secret.fromLatin1(decoded.toString("latin1")) });
		}
	}
	return candidates;
}

function reportSecret(key: string, value: string, now: Date | number): SecretKeyReport {
	const candidates = secretCandidates(value)
		.filter((candidate) => candidate.secret.bytes.length > 0)
		.map(({ encoding, secret }) => ({
			encoding,
			byteLength: secret.bytes.length,
			code: generateCode(createAccount({ label: key, secret }), now).code,
		}));
	return { key, masked: maskSecret(value), length: value.length, candidates };
}

export function inspectStore(
	storePath: string,
	options: ReadOptions & { now?: Date | number } = {},
): RecordReport[] {
	const now = options.now ?? Date.now();
	return readStoreRecords(storePath, options).map((record): RecordReport => {
		const parsed = parseRecordPayload(record.value);
		if (!parsed.ok) {
			return { rowid: record.rowid, ok: false, reason: parsed.reason };
		}

		const { payload } = parsed;
		const metadata: Record<string, string | number | boolean> = {};
		for (const key of METADATA_KEYS) {
			const value = payload[key];
			if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
				metadata[key] = value;
			}
		}

		const secrets: SecretKeyReport[] = [];
		for (const key of SECRET_KEYS) {
			const value = payload[key];
			if (value) {
				secrets.push(reportSecret(key, value, now));
			}
		}

		return {
			rowid: record.rowid,
			ok: true,
			label: firstText(payload.displayLabel, payload.accountName) ?? "Unknown",
			metadata,
			secrets,
		};
	});
}
