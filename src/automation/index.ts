import { type OtpHarvestConfig, resolveStorePath } from "../config/config.js";
import { SqliteCredentialSource } from "../store/source.js";
import { AutomationOrchestrator } from "./orchestrator.js";
import { MacProcessControl } from "./process-control.js";
import { MacUiAutomation } from "./ui-automation.js";

/**
 * Orchestrator wired to the real store, process control and UI automation.
 */
export function createOrchestrator(config: OtpHarvestConfig): AutomationOrchestrator {
	return new AutomationOrchestrator({
		source: new SqliteCredentialSource(resolveStorePath(config), { namespace: config.store.namespace }),
		processControl: new MacProcessControl(),
		ui: new MacUiAutomation(),
		config: config.automation,
	});
}
