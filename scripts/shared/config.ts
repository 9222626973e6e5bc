import { recreateConfigSchema, type RecreateConfig } from "./schemas.js";

export const USAGE = `Usage: kpt-recreate [options]

Recreates the kpt packages in the given directory

Options:
  -d, --dir <dir>      the directory to recursively look for Kptfiles (default: .)
  -o, --out-dir <dir>  the output directory to generate the output (default: a new temp dir)
      --dry-run        print the kpt commands without deleting or fetching anything
  -h, --help           show this help
  -v, --version        show the version

Environment:
  KPT_BIN              kpt binary to run (default: kpt)`;

export interface RecreateArgs {
	dir?: string;
	outDir?: string;
	dryRun?: boolean;
	help?: boolean;
	version?: boolean;
}

/** Parse process.argv (node and script path included). Throws on unknown flags or missing values. */
export const parseArgs = (argv: string[]): RecreateArgs => {
	const args: RecreateArgs = {};
	const takeValue = (flag: string, value: string | undefined): string => {
		if (value === undefined || value.startsWith("-")) {
			throw new Error(`${flag} requires a value`);
		}
		return value;
	};

	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === undefined) continue;
		const eq = arg.indexOf("=");
		const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
		const inline = flag === arg ? undefined : arg.slice(eq + 1);
		const value = (): string => inline ?? takeValue(flag, argv[++i]);

		if (flag === "--dir" || flag === "-d") {
			args.dir = value();
		} else if (flag === "--out-dir" || flag === "-o") {
			args.outDir = value();
		} else if (flag === "--dry-run") {
			args.dryRun = true;
		} else if (flag === "--help" || flag === "-h") {
			args.help = true;
		} else if (flag === "--version" || flag === "-v") {
			args.version = true;
		} else {
			throw new Error(`unknown argument: ${arg}`);
		}
	}
	return args;
};

/** Merge parsed CLI flags with the environment. `KPT_BIN` overrides the kpt binary. */
export const resolveConfig = (args: RecreateArgs, env: NodeJS.ProcessEnv = process.env): RecreateConfig => {
	const parsed = recreateConfigSchema.safeParse({
		dir: args.dir ?? ".",
		outDir: args.outDir,
		dryRun: args.dryRun ?? false,
		kptBinary: env["KPT_BIN"] ?? "kpt",
	});
	if (!parsed.success) {
		throw new Error(parsed.error.issues.map((i) => i.message).join("; "));
	}
	return parsed.data;
};
