import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { expandHome } from "../utils.js";
import { resolveConfigPath } from "./path.js";

export const DEFAULT_STORE_PATH =
	"~/Library/Containers/io.playcover.PlayCover/PlayChain/com.duosecurity.DuoMobile.db";
export const DEFAULT_STORE_NAMESPACE = "group.com.duosecurity.duomobile";

// Credential store location and record namespace
const StoreConfigSchema = z.object({
	path: z.string().min(1).default(DEFAULT_STORE_PATH),
	namespace: z.string().min(1).default(DEFAULT_STORE_NAMESPACE),
});

// Launch/teardown of the external application and the retry policy around it
const AutomationConfigSchema = z.object({
	hostApp: z.string().min(1).default("PlayCover"),
	targetProcess: z.string().min(1).default("com.duosecurity.DuoMobile"),
	maxAttempts: z.number().int().min(1).max(10).default(3),
	populationTimeoutMs: z.number().int().positive().default(25_000),
	pollIntervalMs: z.number().int().positive().default(1_000),
	retryBackoffMs: z.number().int().nonnegative().default(2_000),
	launchSettleMs: z.number().int().nonnegative().default(1_000),
	focusSettleMs: z.number().int().nonnegative().default(500),
	closeTimeoutMs: z.number().int().positive().default(5_000),
});

const SchedulerConfigSchema = z.object({
	tickIntervalMs: z.number().int().min(100).default(1_000),
	shutdownGraceMs: z.number().int().nonnegative().default(3_000),
	refreshOnStart: z.boolean().default(true),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const OtpHarvestConfigSchema = z.object({
	store: StoreConfigSchema.default({}),
	automation: AutomationConfigSchema.default({}),
	scheduler: SchedulerConfigSchema.default({}),
	logging: LoggingConfigSchema.optional(),
});

export type OtpHarvestConfig = z.infer<typeof OtpHarvestConfigSchema>;
export type AutomationConfig = z.infer<typeof AutomationConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

let cachedConfig: OtpHarvestConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Parse a raw config object, filling in defaults.
 * Throws with the failing field paths when validation fails.
 */
export function parseConfig(raw: unknown): OtpHarvestConfig {
	const result = OtpHarvestConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		const details = result.error.errors
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new Error(`invalid configuration: ${details}`);
	}
	return result.data;
}

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): OtpHarvestConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = err instanceof Error && "code" in err ? err.code : undefined;
		if (code === "ENOENT" || code === "EACCES") {
			// No readable config file - use defaults
			return parseConfig({});
		}
		throw err;
	}
}

/**
 * Absolute path of the credential store, with `~` expanded.
 */
export function resolveStorePath(config: OtpHarvestConfig = loadConfig()): string {
	return expandHome(config.store.path);
}

/**
 * Get the current config file path being used.
 */
export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
