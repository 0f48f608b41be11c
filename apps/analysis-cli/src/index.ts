#!/usr/bin/env tsx

import process from "node:process";
import { runCli } from "./cli";

runCli(process.argv.slice(2)).catch((error: unknown) => {
	console.error(
		"Analysis failed:",
		error instanceof Error ? error.message : String(error)
	);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
