import { spawn } from "node:child_process";

export type CommandOptions = {
	cwd: string;
	env?: NodeJS.ProcessEnv;
	signal?: AbortSignal;
	onStdout?: (text: string) => void;
	onStderr?: (text: string) => void;
};

export type CommandResult = {
	exitCode: number;
	stdout: string;
	stderr: string;
};

export type CommandRunner = (
	command: string,
	args: string[],
	options: CommandOptions,
) => Promise<CommandResult>;

export const EXIT_CANCELED = 130;
export const EXIT_NOT_FOUND = 127;

export const runCommand: CommandRunner = (command, args, options) =>
	new Promise((resolve) => {
		let stdout = "";
		let stderr = "";
		let settled = false;
		const finish = (exitCode: number): void => {
			if (settled) {
				return;
			}
			settled = true;
			resolve({ exitCode, stdout, stderr });
		};

		if (options.signal?.aborted) {
			finish(EXIT_CANCELED);
			return;
		}

		const child = spawn(command, args, {
			cwd: options.cwd,
			env: options.env ?? process.env,
			signal: options.signal,
			windowsHide: true,
		});

		child.stdout.on("data", (chunk: Buffer) => {
			const text = chunk.toString();
			stdout += text;
			options.onStdout?.(text);
		});

		child.stderr.on("data", (chunk: Buffer) => {
			const text = chunk.toString();
			stderr += text;
			options.onStderr?.(text);
		});

		child.on("error", (error: NodeJS.ErrnoException) => {
			if (options.signal?.aborted) {
				finish(EXIT_CANCELED);
				return;
			}
			const message = `${command}: ${error.message}\n`;
			stderr += message;
			options.onStderr?.(message);
			finish(error.code === "ENOENT" ? EXIT_NOT_FOUND : 1);
		});

		child.on("close", (code: number | null) => {
			finish(options.signal?.aborted ? EXIT_CANCELED : (code ?? 1));
		});
	});
