#!/usr/bin/env node
import * as p from "@clack/prompts";
import { parseArgs, resolveConfig, USAGE, type RecreateArgs } from "./shared/config.js";
import { runCommand } from "./shared/command.js";
import { copyTree } from "./shared/copy-tree.js";
import { runRecreate } from "./recreate/index.js";

const VERSION = "0.1.0";

const main = async (): Promise<void> => {
	let args: RecreateArgs;
	try {
		args = parseArgs(process.argv);
	} catch (err) {
		p.log.error(err instanceof Error ? err.message : String(err));
		console.log(USAGE);
		process.exit(1);
	}

	if (args.help) {
		console.log(USAGE);
		return;
	}
	if (args.version) {
		console.log(VERSION);
		return;
	}

	p.intro(`kpt-recreate v${VERSION}`);
	await runRecreate(resolveConfig(args), { runCommand, copyTree });
	p.outro("Done!");
};

main().catch((err) => {
	p.log.error(err instanceof Error ? err.message : String(err));
	process.exit(1);
});
