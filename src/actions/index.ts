import { downloadArtifactAction, flattenAction, uploadArtifactAction } from "./artifacts.js";
import { checkoutAction } from "./checkout.js";
import { ActionRegistry } from "./registry.js";
import { RELEASE_ACTION_ALIASES, releaseAction } from "./release.js";
import { setupGoAction, setupNodeAction, setupPythonAction } from "./setup-tool.js";

export function createDefaultActionRegistry(aliases: Record<string, string> = {}): ActionRegistry {
	const registry = new ActionRegistry()
		.register(checkoutAction)
		.register(setupPythonAction)
		.register(setupNodeAction)
		.register(setupGoAction)
		.register(uploadArtifactAction)
		.register(downloadArtifactAction)
		.register(flattenAction)
		.register(releaseAction, RELEASE_ACTION_ALIASES);
	for (const [from, to] of Object.entries(aliases)) {
		registry.alias(from, to);
	}
	return registry;
}

export { ActionRegistry } from "./registry.js";
export type { ActionHandler, ActionResult, ActionRunContext } from "./registry.js";
