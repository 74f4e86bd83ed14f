import fs from "node:fs";
import { ensureWithinBase } from "../utils/path-safety.js";

export type RunInputs = {
	env: Record<string, string>;
	vars: Record<string, string>;
	secrets: Record<string, string>;
};

export type InputResult = ({ ok: true } & RunInputs) | { ok: false; error: string };

export type InputConfig = {
	env: Record<string, string>;
	vars: Record<string, string>;
	secrets: Record<string, string>;
	envFile?: string;
	varsFile?: string;
	secretsFile?: string;
};

/**
 * Merges the `KEY=value` files named in the config with the inline maps (inline wins).
 * `GITHUB_TOKEN` from the process environment becomes a secret unless one is configured.
 */
export function resolveRunInputs(
	repoRoot: string,
	config: InputConfig,
	processEnv: NodeJS.ProcessEnv = process.env,
): InputResult {
	const loaded: Partial<RunInputs> = {};
	const sources = [
		["env", config.envFile, config.env],
		["vars", config.varsFile, config.vars],
		["secrets", config.secretsFile, config.secrets],
	] as const;

	for (const [label, file, inline] of sources) {
		const fromFile = file ? readKeyValueFile(repoRoot, label, file) : { ok: true as const, values: {} };
		if (!fromFile.ok) {
			return fromFile;
		}
		loaded[label] = { ...fromFile.values, ...inline };
	}

	const secrets = { ...(loaded.secrets ?? {}) };
	if (!secrets.GITHUB_TOKEN && processEnv.GITHUB_TOKEN) {
		secrets.GITHUB_TOKEN = processEnv.GITHUB_TOKEN;
	}

	return { ok: true, env: loaded.env ?? {}, vars: loaded.vars ?? {}, secrets };
}

type ReadResult = { ok: true; values: Record<string, string> } | { ok: false; error: string };

function readKeyValueFile(repoRoot: string, label: string, file: string): ReadResult {
	const resolved = ensureWithinBase(repoRoot, file, `${label} file`);
	if (!fs.existsSync(resolved)) {
		return { ok: false, error: `Configured ${label} file not found: ${file}` };
	}
	try {
		return { ok: true, values: parseKeyValues(fs.readFileSync(resolved, "utf-8")) };
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		return { ok: false, error: `Invalid ${label} file ${file}: ${message}` };
	}
}

export function parseKeyValues(content: string): Record<string, string> {
	const values: Record<string, string> = {};
	for (const [index, rawLine] of content.split(/\r?\n/).entries()) {
		const line = rawLine.trim();
		if (!line || line.startsWith("#")) {
			continue;
		}
		const match = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=\s*(.*)$/.exec(line);
		if (!match) {
			throw new Error(`line ${index + 1} is not KEY=value`);
		}
		values[match[1]] = unquote(match[2]);
	}
	return values;
}

function unquote(value: string): string {
	if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
		return value.slice(1, -1).replace(/\\n/g, "\n").replace(/\\"/g, '"');
	}
	if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
		return value.slice(1, -1);
	}
	return value;
}
