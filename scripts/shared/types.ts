/** Upstream source a subpackage was fetched from, as declared in its Kptfile */
export interface UpstreamReference {
	/** Git remote, e.g. https://github.com/org/repo */
	repo: string;
	/** Path of the package inside the repo */
	directory: string;
	/** Commit, tag or branch the package is pinned to */
	commit: string;
}

/** Where a discovered Kptfile sits in the staged tree */
export interface ManifestLocation {
	/** Absolute path to the Kptfile */
	filePath: string;
	/** Absolute path of the directory holding the Kptfile */
	containingDir: string;
	/** containingDir relative to the tree root ("." for the root itself) */
	relativeDir: string;
	/** Directory one level above containingDir */
	parentDir: string;
}

/** `<repo>.git/<directory>@<commit>`, the package argument of `kpt pkg get` */
export type FetchExpression = string;

/** Everything needed for one `kpt pkg get` invocation */
export interface RecreateRequest {
	expression: FetchExpression;
	/** Destination passed to the fetch tool, relative to workingRoot */
	destination: string;
	/** Tree root the fetch tool runs in */
	workingRoot: string;
}

export interface RecreateSummary {
	/** Staged tree the recreation ran against */
	root: string;
	/** Requests issued, in walk order */
	recreated: RecreateRequest[];
}

/** Options for a full recreate run */
export interface RecreateOptions {
	/** Input tree (default ".") */
	dir?: string;
	/** Staging directory. Omitted means a fresh temp directory. */
	outDir?: string;
	/** Log the plan without deleting or fetching anything */
	dryRun?: boolean;
}
