import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		fatal: vi.fn(),
	}),
}));

import { OtpHarvestError } from "../../src/errors.js";
import { TimeoutError } from "../../src/infra/timeout.js";
import { categorize } from "../../src/infra/unhandled-rejections.js";

describe("infra/unhandled-rejections categorize", () => {
	it("classifies abort and timeout errors", () => {
		const abort = new Error("This operation was aborted");
		abort.name = "AbortError";
		expect(categorize(abort)).toBe("abort");
		expect(categorize(new TimeoutError("quit host timed out after 5000ms", 5000))).toBe("abort");
	});

	it("classifies harvest errors", () => {
		expect(categorize(new OtpHarvestError("StoreUnavailable", "gone"))).toBe("harvest");
	});

	it("falls back to unknown for unmatched errors", () => {
		expect(categorize(new Error("unexpected runtime failure"))).toBe("unknown");
		expect(categorize("plain string")).toBe("unknown");
	});
});
