import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { SessionGuard } from "../../src/scheduler/session-guard.js";

function deferred() {
	let resolve: () => void = () => {};
	let reject: (err: Error) => void = () => {};
	const promise = new Promise<void>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

describe("SessionGuard", () => {
	it("drops a second task while one is active", async () => {
		const guard = new SessionGuard();
		const first = deferred();
		const second = vi.fn(async () => {});

		expect(guard.tryRun(() => first.promise)).toBe(true);
		expect(guard.isActive()).toBe(true);
		expect(guard.tryRun(second)).toBe(false);
		expect(second).not.toHaveBeenCalled();

		first.resolve();
		await guard.whenIdle();
		expect(guard.isActive()).toBe(false);
		expect(guard.tryRun(second)).toBe(true);
		await guard.whenIdle();
		expect(second).toHaveBeenCalledTimes(1);
	});

	it("frees the slot when a task rejects", async () => {
		const guard = new SessionGuard();
		const task = deferred();
		guard.tryRun(() => task.promise);

		task.reject(new Error("boom"));
		await expect(guard.whenIdle()).resolves.toBeUndefined();
		expect(guard.isActive()).toBe(false);
	});

	it("is idle immediately when nothing runs", async () => {
		await expect(new SessionGuard().whenIdle()).resolves.toBeUndefined();
	});
});
