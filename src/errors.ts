/**
 * Error taxonomy shared by the store reader, the code engine and the
 * automation layer. Callers branch on `code`, never on message text.
 */

export type OtpHarvestErrorCode =
	| "StoreUnavailable"
	| "NoAccountsFound"
	| "InvalidSecret"
	| "AutomationInteractionFailed"
	| "PopulationTimeout"
	| "ProcessControlFailed";

export class OtpHarvestError extends Error {
	constructor(
		public readonly code: OtpHarvestErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "OtpHarvestError";
	}
}

export function isOtpHarvestError(err: unknown, code?: OtpHarvestErrorCode): err is OtpHarvestError {
	if (!(err instanceof OtpHarvestError)) return false;
	return code === undefined || err.code === code;
}

/**
 * Format any thrown value for logs and terminal output, truncated to `maxLength`.
 */
export function formatError(err: unknown, maxLength = 500): string {
	let text: string;
	if (err instanceof Error) {
		text = isOtpHarvestError(err) ? `${err.code}: ${err.message}` : `${err.name}: ${err.message}`;
	} else {
		text = String(err);
	}
	return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
