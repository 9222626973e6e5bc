import * as p from "@clack/prompts";
import color from "picocolors";
import type { CommandRunner } from "../shared/command.js";
import type { CopyTree } from "../shared/copy-tree.js";
import type { RecreateConfig } from "../shared/schemas.js";
import type { RecreateSummary } from "../shared/types.js";
import { recreatePackages } from "./recreate.js";

export interface RecreateCollaborators {
	runCommand: CommandRunner;
	copyTree: CopyTree;
}

export const runRecreate = async (
	config: RecreateConfig,
	{ runCommand, copyTree }: RecreateCollaborators,
): Promise<RecreateSummary> => {
	p.log.info(`Recreating kpt packages from ${color.cyan(config.dir)}`);

	const summary = await recreatePackages(
		{ dir: config.dir, outDir: config.outDir, dryRun: config.dryRun },
		{ runCommand, copyTree, kptBinary: config.kptBinary },
	);

	const count = summary.recreated.length;
	const noun = count === 1 ? "package" : "packages";
	if (config.dryRun) {
		p.log.success(`Dry run: ${count} ${noun} would be recreated in ${color.cyan(summary.root)}`);
	} else if (count === 0) {
		p.log.warn(`No Kptfiles found in ${summary.root}`);
	} else {
		p.log.success(`Recreated ${count} ${noun} in ${color.cyan(summary.root)}`);
	}
	return summary;
};
