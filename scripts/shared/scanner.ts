import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { dirname, join, relative, resolve } from "node:path";
import { IOError } from "./errors.js";
import { MANIFEST_FILENAME } from "./manifest.js";
import type { ManifestLocation } from "./types.js";

/** Code-unit order, independent of locale */
const byName = (a: Dirent, b: Dirent): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

const readEntries = async (dir: string): Promise<Dirent[]> => {
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries.sort(byName);
	} catch (err) {
		throw new IOError(`failed to read directory ${dir}`, dir, { cause: err });
	}
};

export const toManifestLocation = (root: string, filePath: string): ManifestLocation => {
	const containingDir = dirname(filePath);
	return {
		filePath,
		containingDir,
		relativeDir: relative(root, containingDir) || ".",
		parentDir: dirname(containingDir),
	};
};

/**
 * Recursively walk `root`, yielding every regular file named exactly Kptfile.
 * Pre-order: a directory's own Kptfile comes before anything in its subdirectories,
 * which are visited in sorted order. Symlinks are not followed.
 * Any unreadable directory aborts the walk.
 */
export async function* walkManifests(root: string): AsyncGenerator<ManifestLocation> {
	const absRoot = resolve(root);

	const visit = async function* (dir: string): AsyncGenerator<ManifestLocation> {
		const entries = await readEntries(dir);

		const manifest = entries.find((e) => e.isFile() && e.name === MANIFEST_FILENAME);
		if (manifest) {
			yield toManifestLocation(absRoot, join(dir, manifest.name));
		}

		for (const entry of entries) {
			if (entry.isDirectory()) {
				yield* visit(join(dir, entry.name));
			}
		}
	};

	yield* visit(absRoot);
}

/** Run the walk to completion. Locations come back in walk order. */
export const discoverManifests = async (root: string): Promise<ManifestLocation[]> => {
	const locations: ManifestLocation[] = [];
	for await (const location of walkManifests(root)) {
		locations.push(location);
	}
	return locations;
};
