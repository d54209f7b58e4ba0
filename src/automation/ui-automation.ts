/**
 * Scripted UI interaction with the host layer's window.
 *
 * The authenticator app only comes up with enabled accounts when it is opened
 * from its host's library window, so the launch has to go through focus +
 * double-click rather than a plain `open`. Each step is one capability method
 * so the state machine can be driven by a fake.
 */

import { OtpHarvestError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { sleep } from "../utils.js";
import { type CommandRunner, runCommand } from "./command-runner.js";
import { appleScriptString } from "./process-control.js";

const logger = getChildLogger({ module: "ui-automation" });

export type Point = { x: number; y: number };

export type InputAction =
	| { kind: "double-click"; at: Point }
	| { kind: "keypress"; key: string };

export interface UiAutomation {
	/** Bring an application's window to the front. */
	focusWindow(app: string): Promise<void>;

	/** Screen position of the target app's tile in the host window. */
	locateElement(app: string): Promise<Point>;

	sendInput(action: InputAction): Promise<void>;

	wait(ms: number): Promise<void>;
}

/**
 * AppleScript returning "x,y" of the first tile in the host's app library, or "error".
 */
export function locateScript(app: string): string {
	return `tell application "System Events"
	tell process ${appleScriptString(app)}
		try
			set tile to UI element 1 of scroll area 1 of group 2 of splitter group 1 of group 1 of window 1
			set {xPos, yPos} to position of tile
			set {xSize, ySize} to size of tile
			set centerX to (xPos + (xSize / 2)) as integer
			set centerY to (yPos + (ySize / 2)) as integer
			return (centerX as text) & "," & (centerY as text)
		on error
			return "error"
		end try
	end tell
end tell`;
}

export function parsePoint(output: string): Point | null {
	const match = /^\s*(-?\d+)\s*,\s*(-?\d+)\s*$/.exec(output);
	if (!match) return null;
	return { x: Number(match[1]), y: Number(match[2]) };
}

/**
 * cliclick argument for an input action.
 */
export function cliclickArg(action: InputAction): string {
	switch (action.kind) {
		case "double-click":
			return `dc:${action.at.x},${action.at.y}`;
		case "keypress":
			return `kp:${action.key}`;
	}
}

/**
 * macOS implementation: osascript for focus and element lookup, cliclick for input.
 */
export class MacUiAutomation implements UiAutomation {
	constructor(private readonly run: CommandRunner = runCommand) {}

	private async exec(cmd: string, args: readonly string[], step: string): Promise<string> {
		let result: Awaited<ReturnType<CommandRunner>>;
		try {
			result = await this.run(cmd, args);
		} catch (err) {
			throw new OtpHarvestError("AutomationInteractionFailed", `${step} failed: ${String(err)}`, {
				cause: err,
			});
		}
		if (result.code !== 0) {
			throw new OtpHarvestError(
				"AutomationInteractionFailed",
				`${step} exited with ${result.code}: ${result.stderr.trim()}`,
			);
		}
		return result.stdout;
	}

	async focusWindow(app: string): Promise<void> {
		await this.exec("osascript", ["-e", `tell application ${appleScriptString(app)} to activate`], "focus");
		logger.debug({ app }, "window focused");
	}

	async locateElement(app: string): Promise<Point> {
		const output = await this.exec("osascript", ["-e", locateScript(app)], "locate");
		const point = parsePoint(output);
		if (!point) {
			throw new OtpHarvestError(
				"AutomationInteractionFailed",
				`could not locate the app tile in ${app} (got "${output.trim()}")`,
			);
		}
		return point;
	}

	async sendInput(action: InputAction): Promise<void> {
		await this.exec("cliclick", [cliclickArg(action)], action.kind);
		logger.debug({ action: action.kind }, "input sent");
	}

	async wait(ms: number): Promise<void> {
		await sleep(ms);
	}
}
