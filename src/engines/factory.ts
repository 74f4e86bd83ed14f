import type { EngineAdapter } from "../core/engine.js";
import { LocalAdapter } from "./local/local-adapter.js";

type EngineAdapterConstructor = new () => EngineAdapter;

const ENGINE_REGISTRY: Record<string, EngineAdapterConstructor> = {
	local: LocalAdapter,
};

export function createEngineAdapter(engineId: string): EngineAdapter {
	const normalized = engineId.trim().toLowerCase();
	const ctor = ENGINE_REGISTRY[normalized];
	if (!ctor) {
		throw new Error(
			`Unsupported engine "${engineId}". Available engines: ${Object.keys(ENGINE_REGISTRY).join(", ")}`,
		);
	}
	return new ctor();
}
