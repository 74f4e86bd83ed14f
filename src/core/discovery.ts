import fs from "node:fs";
import path from "node:path";
import { parseWorkflow } from "./parser.js";
import type { Workflow } from "./types.js";

export const WORKFLOWS_DIR = path.join(".github", "workflows");

export function findWorkflowFiles(repoRoot: string): string[] {
	const workflowsDir = path.join(repoRoot, WORKFLOWS_DIR);
	if (!fs.existsSync(workflowsDir)) {
		return [];
	}

	return fs
		.readdirSync(workflowsDir)
		.filter((file) => file.endsWith(".yml") || file.endsWith(".yaml"))
		.sort()
		.map((file) => path.join(workflowsDir, file));
}

export function discoverWorkflows(repoRoot: string): Workflow[] {
	return findWorkflowFiles(repoRoot).map((workflowPath) => parseWorkflow(workflowPath));
}
