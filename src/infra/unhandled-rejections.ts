/**
 * Process-level unhandled rejection handler.
 *
 * A stray rejection must not take down the tick loop, so nothing here exits:
 * - AbortError → suppress (expected during shutdown)
 * - known harvest errors → warn
 * - anything else → error
 */

import { formatError, isOtpHarvestError } from "../errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "abort" | "harvest" | "unknown";

export function categorize(err: unknown): RejectionCategory {
	if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
		return "abort";
	}
	if (isOtpHarvestError(err)) return "harvest";
	return "unknown";
}

/**
 * Install the unhandled rejection handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatError(reason);

		switch (category) {
			case "abort":
				logger.debug({ process: processLabel }, `suppressed abort rejection: ${formatted}`);
				break;
			case "harvest":
				logger.warn({ process: processLabel, category }, `unhandled harvest error: ${formatted}`);
				break;
			default:
				logger.error({ process: processLabel, category }, `unhandled rejection: ${formatted}`);
				break;
		}
	});

	logger.debug({ process: processLabel }, "unhandled rejection handler installed");
}
