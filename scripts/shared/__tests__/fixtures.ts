import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { UpstreamReference } from "../types.js";

/** Kptfile text in the shape `kpt pkg get` writes. Omitted upstream fields are left out of the YAML. */
export const kptfileYaml = (name: string, upstream: Partial<UpstreamReference>): string => {
	const git = Object.entries(upstream)
		.map(([key, value]) => `    ${key}: ${JSON.stringify(value)}\n`)
		.join("");
	return (
		"apiVersion: kpt.dev/v1alpha1\n" +
		"kind: Kptfile\n" +
		"metadata:\n" +
		`  name: ${name}\n` +
		"upstream:\n" +
		"  type: git\n" +
		"  git:\n" +
		git
	);
};

export const writeKptfile = async (dir: string, upstream: Partial<UpstreamReference>): Promise<string> => {
	await mkdir(dir, { recursive: true });
	const path = join(dir, "Kptfile");
	await writeFile(path, kptfileYaml("pkg", upstream), "utf-8");
	return path;
};

export const makeTempDir = (prefix: string): Promise<string> => mkdtemp(join(tmpdir(), `kpt-recreate-test-${prefix}-`));
