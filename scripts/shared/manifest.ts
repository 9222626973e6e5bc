import { readFile } from "node:fs/promises";
import { load } from "js-yaml";
import { kptfileSchema } from "./schemas.js";
import { MissingFieldError, ParseError, type UpstreamField } from "./errors.js";
import type { UpstreamReference } from "./types.js";

export const MANIFEST_FILENAME = "Kptfile";

const formatIssuePath = (path: (string | number)[]): string => (path.length > 0 ? path.join(".") : "(root)");

/** Parse Kptfile text into its upstream reference. `filePath` is only used for error context. */
export const parseManifest = (raw: string, filePath: string): UpstreamReference => {
	let doc: unknown;
	try {
		doc = load(raw, { filename: filePath }) ?? {};
	} catch (err) {
		throw new ParseError(`failed to parse ${filePath}`, filePath, { cause: err });
	}

	const parsed = kptfileSchema.safeParse(doc);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const detail = issue ? `${formatIssuePath(issue.path)}: ${issue.message}` : parsed.error.message;
		throw new ParseError(`invalid Kptfile ${filePath} (${detail})`, filePath, { cause: parsed.error });
	}

	const git = parsed.data.upstream?.git;
	const required = (field: UpstreamField): string => {
		const value = git?.[field];
		if (!value) throw new MissingFieldError(field, filePath);
		return value;
	};

	return {
		repo: required("repo"),
		directory: required("directory"),
		commit: required("commit"),
	};
};

/** Read a Kptfile and extract `upstream.git.{repo,directory,commit}` */
export const readManifest = async (filePath: string): Promise<UpstreamReference> => {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf-8");
	} catch (err) {
		throw new ParseError(`failed to read file ${filePath}`, filePath, { cause: err });
	}
	return parseManifest(raw, filePath);
};
