/**
 * Credential store reader.
 *
 * The store is the SQLite keychain emulation file the host compatibility layer
 * keeps for the authenticator app. Each `genp` row in the app's access group
 * holds a JSON document with the account label and its shared secret.
 *
 * The store is opened read-only for a single read and closed straight after.
 */

import fs from "node:fs";
import Database from "better-sqlite3";
import { DEFAULT_STORE_NAMESPACE } from "../config/config.js";
import { OtpHarvestError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import type { Account } from "../totp/types.js";
import { decodeRecord, type RawRecordValue } from "./records.js";

const logger = getChildLogger({ module: "store-reader" });

export const RECORD_TABLE = "genp";

export type StoreRecord = {
	rowid: number;
	value: RawRecordValue;
};

export type ReadOptions = {
	/** Access group whose records belong to the target app. */
	namespace?: string;
};

type RecordRow = {
	record_id: number;
	v_Data: RawRecordValue;
};

function openStore(storePath: string): Database.Database {
	if (!fs.existsSync(storePath)) {
		throw new OtpHarvestError("StoreUnavailable", `credential store not found: ${storePath}`);
	}
	try {
		return new Database(storePath, { readonly: true, fileMustExist: true });
	} catch (err) {
		throw new OtpHarvestError("StoreUnavailable", `cannot open credential store: ${storePath}`, {
			cause: err,
		});
	}
}

/**
 * Read the raw records of the target namespace in store order.
 * A store without the record table has no records.
 */
export function readStoreRecords(storePath: string, options: ReadOptions = {}): StoreRecord[] {
	const namespace = options.namespace ?? DEFAULT_STORE_NAMESPACE;
	const db = openStore(storePath);
	try {
		const table = db
			.prepare<[string], { name: string }>(
				"SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
			)
			.get(RECORD_TABLE);
		if (!table) {
			return [];
		}

		const rows = db
			.prepare<[string], RecordRow>(
				`SELECT rowid AS record_id, v_Data FROM ${RECORD_TABLE} WHERE agrp = ? ORDER BY rowid`,
			)
			.all(namespace);
		return rows.map((row) => ({ rowid: row.record_id, value: row.v_Data }));
	} catch (err) {
		throw new OtpHarvestError("StoreUnavailable", `cannot read credential store: ${storePath}`, {
			cause: err,
		});
	} finally {
		db.close();
	}
}

/**
 * Load every decodable account from the store, in record order.
 *
 * Records that fail to decode are skipped and counted. Throws
 * `StoreUnavailable` when the store cannot be opened and `NoAccountsFound`
 * when no record decodes.
 */
export function loadAccounts(storePath: string, options: ReadOptions = {}): Account[] {
	const records = readStoreRecords(storePath, options);

	const accounts: Account[] = [];
	let skipped = 0;
	for (const record of records) {
		const decoded = decodeRecord(record.value);
		if (decoded.ok) {
			accounts.push(decoded.account);
		} else {
			skipped++;
			logger.debug({ rowid: record.rowid, reason: decoded.reason }, "skipping undecodable record");
		}
	}

	if (accounts.length === 0) {
		throw new OtpHarvestError(
			"NoAccountsFound",
			`no usable accounts in credential store (${records.length} records, ${skipped} undecodable)`,
		);
	}

	if (skipped > 0) {
		logger.warn({ loaded: accounts.length, skipped }, "some credential records could not be decoded");
	} else {
		logger.debug({ loaded: accounts.length }, "loaded accounts from credential store");
	}

	return accounts;
}
