#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { errorMessage } from "./errors.js";

createProgram()
	.parseAsync()
	.catch((error: unknown) => {
		process.stderr.write(`${errorMessage(error)}\n`);
		process.exitCode = 1;
	});
