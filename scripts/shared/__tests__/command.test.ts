import { tmpdir } from "node:os";
import { describe, expect, it } from "vitest";
import { CommandError, formatCommand, runCommand } from "../command.js";

describe("formatCommand", () => {
	it("joins the binary and its arguments", () => {
		expect(
			formatCommand({ name: "kpt", args: ["pkg", "get", "https://example.com/repo.git/pkg@v1", "a"], dir: "/tmp" }),
		).toBe("kpt pkg get https://example.com/repo.git/pkg@v1 a");
	});
});

describe("runCommand", () => {
	it("resolves with the command output", async () => {
		const output = await runCommand({
			name: process.execPath,
			args: ["-e", "process.stdout.write('fetched\\n')"],
			dir: tmpdir(),
		});
		expect(output).toBe("fetched");
	});

	it("runs in the given working directory", async () => {
		const output = await runCommand({
			name: process.execPath,
			args: ["-e", "process.stdout.write(process.cwd())"],
			dir: process.cwd(),
		});
		expect(output).toBe(process.cwd());
	});

	it("rejects with CommandError carrying output and exit code", async () => {
		const result = runCommand({
			name: process.execPath,
			args: ["-e", "process.stderr.write('error: no such ref'); process.exit(3)"],
			dir: tmpdir(),
		});
		await expect(result).rejects.toBeInstanceOf(CommandError);
		await expect(result).rejects.toMatchObject({ output: "error: no such ref", exitCode: 3 });
	});
});
