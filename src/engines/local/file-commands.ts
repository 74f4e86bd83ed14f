import fs from "node:fs";

const HEREDOC = /^([A-Za-z_][A-Za-z0-9_-]*)<<(.+)$/;
const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_-]*)=(.*)$/;

/**
 * Parses the `GITHUB_ENV` / `GITHUB_OUTPUT` format: `KEY=value` lines and
 * `KEY<<DELIMITER` blocks closed by a line holding only the delimiter.
 */
export function parseFileCommand(content: string): Record<string, string> {
	const values: Record<string, string> = {};
	const lines = content.split(/\r?\n/);

	for (let index = 0; index < lines.length; index += 1) {
		const line = lines[index];
		if (line.trim().length === 0) {
			continue;
		}
		const heredoc = HEREDOC.exec(line);
		if (heredoc) {
			const [, key, delimiter] = heredoc;
			const body: string[] = [];
			let closed = false;
			for (index += 1; index < lines.length; index += 1) {
				if (lines[index] === delimiter) {
					closed = true;
					break;
				}
				body.push(lines[index]);
			}
			if (!closed) {
				throw new Error(`Matching delimiter not found: ${delimiter}`);
			}
			values[key] = body.join("\n");
			continue;
		}
		const assignment = ASSIGNMENT.exec(line);
		if (!assignment) {
			throw new Error(`Invalid file command line: ${line}`);
		}
		values[assignment[1]] = assignment[2];
	}

	return values;
}

export function readFileCommand(filePath: string): Record<string, string> {
	if (!fs.existsSync(filePath)) {
		return {};
	}
	return parseFileCommand(fs.readFileSync(filePath, "utf-8"));
}
