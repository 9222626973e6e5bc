import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface Command {
	name: string;
	args: string[];
	/** Working directory */
	dir: string;
}

/** Resolves with the command's output. Rejects with a CommandError on failure. */
export type CommandRunner = (command: Command) => Promise<string>;

export class CommandError extends Error {
	constructor(
		message: string,
		public readonly output: string,
		public readonly exitCode: number | null,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "CommandError";
	}
}

export const formatCommand = (command: Command): string => [command.name, ...command.args].join(" ");

const joinOutput = (stdout: unknown, stderr: unknown): string =>
	[stdout, stderr]
		.map((s) => (typeof s === "string" ? s : Buffer.isBuffer(s) ? s.toString("utf-8") : ""))
		.filter((s) => s.length > 0)
		.join("")
		.trimEnd();

/** Run without a shell; stdout and stderr are joined into one text. */
export const runCommand: CommandRunner = async (command) => {
	try {
		const { stdout, stderr } = await execFileAsync(command.name, command.args, {
			cwd: command.dir,
			maxBuffer: 64 * 1024 * 1024,
		});
		return joinOutput(stdout, stderr);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		const failed: object = typeof err === "object" && err !== null ? err : {};
		throw new CommandError(
			`failed to run ${formatCommand(command)}: ${message}`,
			joinOutput("stdout" in failed ? failed.stdout : undefined, "stderr" in failed ? failed.stderr : undefined),
			"code" in failed && typeof failed.code === "number" ? failed.code : null,
			{ cause: err },
		);
	}
};
