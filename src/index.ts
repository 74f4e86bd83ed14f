#!/usr/bin/env node
import { errorMessage } from "./core/errors.js";
import { runCli } from "./cli/run-cli.js";

runCli()
	.then((exitCode) => {
		process.exitCode = exitCode;
	})
	.catch((error: unknown) => {
		process.stderr.write(`runlane: ${errorMessage(error)}\n`);
		process.exitCode = 1;
	});
