import fs from "node:fs";

export type CliCommand = "run" | "init" | "cleanup";

export type CliOptions = {
	command: CliCommand;
	workflow?: string;
	jobs?: string[];
	all?: boolean;
	json?: boolean;
	event?: string;
	branch?: string;
	eventPath?: string;
	matrix?: string[];
	preset?: string;
	runNumber?: number;
	keepWorkspaces?: boolean;
	keep?: number;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

export const DEFAULT_KEEP_RUNS = 10;

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args.shift();
		if (command === "run" || command === "init" || command === "cleanup") {
			options.command = command;
		} else if (command) {
			options.errors?.push(`Unknown command: ${command}`);
		}
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--workflow":
				options.workflow = takeValue("--workflow", args, options);
				break;
			case "--job":
				{
					const value = takeValue("--job", args, options);
					if (value) {
						options.jobs = value.split(",").filter(Boolean);
					}
				}
				break;
			case "--all":
				options.all = true;
				break;
			case "--event":
				options.event = takeValue("--event", args, options);
				break;
			case "--branch":
				options.branch = takeValue("--branch", args, options);
				break;
			case "--event-path":
				options.eventPath = takeValue("--event-path", args, options);
				break;
			case "--matrix":
				{
					const value = takeValue("--matrix", args, options);
					if (value) {
						options.matrix = [...(options.matrix ?? []), value];
					}
				}
				break;
			case "--preset":
				options.preset = takeValue("--preset", args, options);
				break;
			case "--run-number":
				options.runNumber = takeInteger("--run-number", args, options, 1);
				break;
			case "--keep-workspaces":
				options.keepWorkspaces = true;
				break;
			case "--keep":
				options.keep = takeInteger("--keep", args, options, 0);
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`runlane <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                   Run workflows (default)\n`);
	process.stdout.write(`  init                  Add .runlane to .gitignore\n`);
	process.stdout.write(`  cleanup               Remove old run directories\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  --workflow <file>     Workflow file name or id\n`);
	process.stdout.write(`  --job <ids>           Comma-separated job ids\n`);
	process.stdout.write(`  --all                 Run all jobs\n`);
	process.stdout.write(
		`  --event <name>        Event name (push, pull_request, workflow_dispatch)\n`,
	);
	process.stdout.write(`  --branch <name>       Pushed branch, or base branch for pull requests\n`);
	process.stdout.write(`  --event-path <file>   JSON payload path\n`);
	process.stdout.write(`  --matrix <k:v>        Matrix filter (repeatable)\n`);
	process.stdout.write(`  --preset <name>       Preset id\n`);
	process.stdout.write(`  --run-number <n>      Use this run number instead of the next one\n`);
	process.stdout.write(`  --keep-workspaces     Keep context workspaces after the run\n`);
	process.stdout.write(`  --keep <n>            For cleanup, number of runs to keep (default ${DEFAULT_KEEP_RUNS})\n`);
	process.stdout.write(`  --json                Print JSON summary\n`);
	process.stdout.write(`  -h, --help            Show help\n`);
	process.stdout.write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "0.0.0";
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}

function takeInteger(flag: string, args: string[], options: CliOptions, min: number): number | undefined {
	const value = takeValue(flag, args, options);
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < min) {
		options.errors?.push(`Invalid value for ${flag}: ${value} (expected an integer >= ${min})`);
		return undefined;
	}
	return parsed;
}
