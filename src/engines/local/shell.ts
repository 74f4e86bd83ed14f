export type ShellCommand = {
	command: string;
	args: string[];
};

type ShellTemplate = {
	args: string[];
	extension: string;
};

const SCRIPT = "{0}";

const TEMPLATES: Record<string, ShellTemplate> = {
	bash: { args: ["bash", "--noprofile", "--norc", "-eo", "pipefail", SCRIPT], extension: ".sh" },
	sh: { args: ["sh", "-e", SCRIPT], extension: ".sh" },
	pwsh: { args: ["pwsh", "-command", `. '${SCRIPT}'`], extension: ".ps1" },
	powershell: { args: ["powershell", "-command", `. '${SCRIPT}'`], extension: ".ps1" },
	python: { args: ["python", SCRIPT], extension: ".py" },
	cmd: { args: ["cmd", "/D", "/E:ON", "/V:OFF", "/S", "/C", `CALL "${SCRIPT}"`], extension: ".cmd" },
};

export function defaultShell(platform: NodeJS.Platform = process.platform): string {
	return platform === "win32" ? "pwsh" : "bash";
}

export function scriptExtension(shell: string): string {
	return TEMPLATES[shell]?.extension ?? "";
}

/** Expands a shell name or a custom `command {0}` template around the script path. */
export function buildShellCommand(shell: string, scriptPath: string): ShellCommand {
	const template = TEMPLATES[shell];
	const parts = template ? template.args : splitCustomShell(shell);
	const [command, ...rest] = parts.map((part) => part.split(SCRIPT).join(scriptPath));
	if (!command) {
		throw new Error(`Invalid shell: ${JSON.stringify(shell)}`);
	}
	return { command, args: rest };
}

function splitCustomShell(shell: string): string[] {
	const parts = shell.trim().split(/\s+/).filter(Boolean);
	if (!shell.includes(SCRIPT)) {
		throw new Error(`Custom shell must contain ${SCRIPT}: ${shell}`);
	}
	return parts;
}
