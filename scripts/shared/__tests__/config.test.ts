import { describe, expect, it } from "vitest";
import { parseArgs, resolveConfig } from "../config.js";

const argv = (...args: string[]): string[] => ["node", "kpt-recreate", ...args];

describe("parseArgs", () => {
	it("returns no options for an empty command line", () => {
		expect(parseArgs(argv())).toEqual({});
	});

	it("reads long and short directory flags", () => {
		expect(parseArgs(argv("--dir", "config", "-o", "/tmp/out"))).toEqual({ dir: "config", outDir: "/tmp/out" });
		expect(parseArgs(argv("-d", "config", "--out-dir", "/tmp/out"))).toEqual({ dir: "config", outDir: "/tmp/out" });
	});

	it("accepts --flag=value", () => {
		expect(parseArgs(argv("--dir=config", "--out-dir=out"))).toEqual({ dir: "config", outDir: "out" });
	});

	it("reads boolean flags", () => {
		expect(parseArgs(argv("--dry-run", "-h", "-v"))).toEqual({ dryRun: true, help: true, version: true });
	});

	it("rejects a value flag without a value", () => {
		expect(() => parseArgs(argv("--dir"))).toThrow("--dir requires a value");
		expect(() => parseArgs(argv("-o", "--dry-run"))).toThrow("-o requires a value");
	});

	it("rejects unknown arguments", () => {
		expect(() => parseArgs(argv("--force"))).toThrow("unknown argument: --force");
		expect(() => parseArgs(argv("extra"))).toThrow("unknown argument: extra");
	});
});

describe("resolveConfig", () => {
	it("defaults to the current directory and the kpt on PATH", () => {
		expect(resolveConfig({}, {})).toEqual({ dir: ".", outDir: undefined, dryRun: false, kptBinary: "kpt" });
	});

	it("takes the kpt binary from KPT_BIN", () => {
		expect(resolveConfig({ dir: "pkgs", dryRun: true }, { KPT_BIN: "/opt/kpt/bin/kpt" })).toEqual({
			dir: "pkgs",
			outDir: undefined,
			dryRun: true,
			kptBinary: "/opt/kpt/bin/kpt",
		});
	});

	it("rejects an empty directory", () => {
		expect(() => resolveConfig({ dir: "" }, {})).toThrow("--dir must not be empty");
	});
});
