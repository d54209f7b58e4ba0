import type { Account } from "../totp/types.js";
import { loadAccounts, type ReadOptions } from "./reader.js";

/**
 * Anything that can produce the current account set.
 * The orchestrator and scheduler only see this, so tests can swap in a fake.
 */
export interface CredentialSource {
	readonly description: string;

	/** Resolves with at least one account, or rejects with an OtpHarvestError. */
	load(): Promise<Account[]>;
}

export class SqliteCredentialSource implements CredentialSource {
	readonly description: string;

	constructor(
		private readonly storePath: string,
		private readonly options: ReadOptions = {},
	) {
		this.description = `sqlite:${storePath}`;
	}

	async load(): Promise<Account[]> {
		return loadAccounts(this.storePath, this.options);
	}
}
