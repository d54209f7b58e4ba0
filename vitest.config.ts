import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		env: {
			// Keep logs and config lookups out of the real home directory
			OTP_HARVEST_DATA_DIR: path.join(os.tmpdir(), "otp-harvest-test"),
			OTP_HARVEST_LOG_LEVEL: "silent",
		},
	},
});
