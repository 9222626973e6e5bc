import { chmod, lstat, mkdir, mkdtemp, readdir, readFile, readlink, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, relative, resolve, isAbsolute } from "node:path";
import { IOError } from "./errors.js";

/** Copies the tree at src into dst, overwriting. */
export type CopyTree = (src: string, dst: string) => Promise<void>;

/** Recursively copy src/rel into dest/rel (single walk). */
const copyRecursive = async (src: string, dest: string, rel: string): Promise<void> => {
	const srcPath = join(src, rel);
	const destPath = join(dest, rel);
	const s = await lstat(srcPath);
	if (s.isDirectory()) {
		await mkdir(destPath, { recursive: true });
		const entries = await readdir(srcPath, { withFileTypes: true });
		for (const e of entries) {
			await copyRecursive(src, dest, join(rel, e.name));
		}
	} else if (s.isSymbolicLink()) {
		await rm(destPath, { recursive: true, force: true });
		await symlink(await readlink(srcPath), destPath);
	} else {
		const data = await readFile(srcPath);
		await writeFile(destPath, data);
		await chmod(destPath, s.mode & 0o7777);
	}
};

/**
 * Copy the whole tree at src into dst, overwriting whatever is already there.
 * Nothing is excluded. A failed copy is not rolled back.
 */
export const copyTree: CopyTree = async (src, dst) => {
	const info = await lstat(src).catch(() => null);
	if (!info?.isDirectory()) {
		throw new IOError(`source directory ${src} does not exist`, src);
	}
	try {
		await copyRecursive(src, dst, "");
	} catch (err) {
		throw new IOError(`failed to copy ${src} to ${dst}`, dst, { cause: err });
	}
};

const isInside = (parent: string, child: string): boolean => {
	const rel = relative(parent, child);
	return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
};

/**
 * Produce the working copy every destructive step runs against.
 * No outDir: a fresh temp directory. outDir equal to dir: recreate in place, no copy.
 */
export const stageTree = async (dir: string, outDir: string | undefined, copy: CopyTree): Promise<string> => {
	const source = resolve(dir);
	let target: string;
	if (outDir) {
		target = resolve(outDir);
	} else {
		try {
			target = await mkdtemp(join(tmpdir(), "kpt-recreate-"));
		} catch (err) {
			throw new IOError("failed to create temp dir", tmpdir(), { cause: err });
		}
	}

	if (target === source) return source;
	if (isInside(source, target)) {
		throw new IOError(`output directory ${target} must not be inside ${source}`, target);
	}

	await copy(source, target);
	return target;
};
