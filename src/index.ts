#!/usr/bin/env node

import { main } from "./cli/main.js";

main().catch((err) => {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
	process.exitCode = 1;
});
