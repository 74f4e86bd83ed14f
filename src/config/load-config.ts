import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigSchema, type RunlaneConfig } from "./schema.js";

export type ConfigLoadResult = {
	config: RunlaneConfig;
	path?: string;
};

export const DEFAULT_CONFIG_PATH = ".runlane.yml";

export function loadConfig(repoRoot: string): ConfigLoadResult {
	const configPath = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	if (!fs.existsSync(configPath)) {
		return { config: ConfigSchema.parse({}), path: undefined };
	}

	const raw = fs.readFileSync(configPath, "utf-8");
	const parsed: unknown = YAML.parse(raw);
	const result = ConfigSchema.safeParse(parsed ?? {});
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid ${DEFAULT_CONFIG_PATH}: ${issues}`);
	}
	return { config: result.data, path: configPath };
}
