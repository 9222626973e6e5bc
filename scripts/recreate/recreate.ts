import { rm } from "node:fs/promises";
import { resolve } from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";
import { formatCommand, CommandError, type Command, type CommandRunner } from "../shared/command.js";
import { stageTree, type CopyTree } from "../shared/copy-tree.js";
import { FetchError, IOError, RecreateError } from "../shared/errors.js";
import { readManifest } from "../shared/manifest.js";
import { discoverManifests } from "../shared/scanner.js";
import type {
	FetchExpression,
	ManifestLocation,
	RecreateOptions,
	RecreateRequest,
	RecreateSummary,
	UpstreamReference,
} from "../shared/types.js";

const GIT_SUFFIX = ".git";
/** Upstream directories are repo paths, always `/`-separated */
const REPO_PATH_SEPARATOR = "/";
const DEFAULT_KPT_BINARY = "kpt";

export interface RecreateLog {
	info: (message: string) => void;
	step: (message: string) => void;
	message: (message: string) => void;
}

const clackLog: RecreateLog = {
	info: (message) => p.log.info(message),
	step: (message) => p.log.step(message),
	message: (message) => p.log.message(message),
};

export const normalizeRepoUrl = (url: string): string => {
	if (url.endsWith(GIT_SUFFIX)) return url;
	return url.replace(/\/+$/, "") + GIT_SUFFIX;
};

export const normalizeDirectory = (directory: string): string =>
	directory.startsWith(REPO_PATH_SEPARATOR) ? directory : REPO_PATH_SEPARATOR + directory;

/** `<repo>.git/<directory>@<commit>` */
export const buildFetchExpression = (ref: UpstreamReference): FetchExpression =>
	`${normalizeRepoUrl(ref.repo)}${normalizeDirectory(ref.directory)}@${ref.commit}`;

export const buildRecreateRequest = (
	location: ManifestLocation,
	ref: UpstreamReference,
	workingRoot: string,
): RecreateRequest => ({
	expression: buildFetchExpression(ref),
	destination: location.relativeDir,
	workingRoot,
});

export const toFetchCommand = (request: RecreateRequest, kptBinary: string = DEFAULT_KPT_BINARY): Command => ({
	name: kptBinary,
	args: ["pkg", "get", request.expression, request.destination],
	dir: request.workingRoot,
});

export interface RecreatorDeps {
	runCommand: CommandRunner;
	kptBinary?: string;
	/** Plan only: no deletion, no fetch */
	dryRun?: boolean;
	log?: RecreateLog;
}

/**
 * Deletes and re-fetches each Kptfile-managed package under a staged root.
 * One package at a time, in walk order; the first failure stops the run.
 */
export class Recreator {
	private readonly runCommand: CommandRunner;
	private readonly kptBinary: string;
	private readonly dryRun: boolean;
	private readonly log: RecreateLog;

	constructor(deps: RecreatorDeps) {
		this.runCommand = deps.runCommand;
		this.kptBinary = deps.kptBinary ?? DEFAULT_KPT_BINARY;
		this.dryRun = deps.dryRun ?? false;
		this.log = deps.log ?? clackLog;
	}

	async recreate(root: string): Promise<RecreateSummary> {
		const workingRoot = resolve(root);
		// Every location comes from this one walk; packages restored by a parent's fetch are not re-walked.
		const locations = await discoverManifests(workingRoot);
		this.log.info(`Found ${locations.length} ${locations.length === 1 ? "Kptfile" : "Kptfiles"} in ${workingRoot}`);
		const recreated: RecreateRequest[] = [];

		for (const location of locations) {
			recreated.push(await this.recreateOne(location, workingRoot));
		}
		return { root: workingRoot, recreated };
	}

	private async recreateOne(location: ManifestLocation, workingRoot: string): Promise<RecreateRequest> {
		const ref = await readManifest(location.filePath);
		const request = buildRecreateRequest(location, ref, workingRoot);
		const command = toFetchCommand(request, this.kptBinary);

		if (this.dryRun) {
			this.log.message(`${color.dim("would run")} ${formatCommand(command)}`);
			return request;
		}

		try {
			await rm(location.containingDir, { recursive: true, force: true });
		} catch (err) {
			throw new IOError(`failed to remove kpt directory ${location.containingDir}`, location.containingDir, {
				cause: err,
			});
		}

		this.log.step(`about to run ${color.cyan(formatCommand(command))} in dir ${color.cyan(command.dir)}`);
		let output: string;
		try {
			output = await this.runCommand(command);
		} catch (err) {
			const failedOutput = err instanceof CommandError ? err.output : "";
			if (failedOutput) this.log.message(failedOutput);
			throw new FetchError(
				`failed to run kpt command for ${request.destination} (${request.expression})`,
				request.expression,
				request.destination,
				failedOutput,
				{ cause: err },
			);
		}
		if (output) this.log.message(output);
		return request;
	}
}

export interface RecreatePackagesDeps extends RecreatorDeps {
	copyTree: CopyTree;
}

/** Stage the input tree, then recreate every package in the staged copy */
export const recreatePackages = async (
	options: RecreateOptions,
	deps: RecreatePackagesDeps,
): Promise<RecreateSummary> => {
	const dir = resolve(options.dir || ".");
	const { copyTree, ...recreatorDeps } = deps;
	const root = await stageTree(dir, options.outDir, copyTree);
	const recreator = new Recreator({ ...recreatorDeps, dryRun: options.dryRun ?? deps.dryRun });
	try {
		return await recreator.recreate(root);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new RecreateError(`failed to recreate kpt packages in dir ${root}: ${message}`, root, { cause: err });
	}
};
