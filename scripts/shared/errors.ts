export class RecreateError extends Error {
	constructor(
		message: string,
		public readonly path?: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "RecreateError";
	}
}

/** Filesystem read, write, delete, copy or walk failure */
export class IOError extends RecreateError {
	constructor(message: string, path: string, options?: ErrorOptions) {
		super(message, path, options);
		this.name = "IOError";
	}
}

/** Kptfile could not be read or is not a valid YAML mapping */
export class ParseError extends RecreateError {
	constructor(message: string, path: string, options?: ErrorOptions) {
		super(message, path, options);
		this.name = "ParseError";
	}
}

export type UpstreamField = "repo" | "directory" | "commit";

export class MissingFieldError extends RecreateError {
	constructor(
		public readonly field: UpstreamField,
		path: string,
	) {
		super(`no upstream.git.${field} in ${path}`, path);
		this.name = "MissingFieldError";
	}
}

/** `kpt pkg get` reported failure */
export class FetchError extends RecreateError {
	constructor(
		message: string,
		public readonly expression: string,
		public readonly destination: string,
		public readonly output: string,
		options?: ErrorOptions,
	) {
		super(message, destination, options);
		this.name = "FetchError";
	}
}
