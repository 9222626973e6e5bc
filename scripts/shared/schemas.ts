import { z } from "zod";

/** Optional string that tolerates an explicit YAML null (`commit:` with no value) */
const optionalString = z.string().nullish();

/**
 * Kptfile fields read for recreation. Everything is optional here so that an
 * absent field surfaces as a named MissingFieldError, not a generic schema failure.
 */
export const kptfileSchema = z
	.object({
		upstream: z
			.object({
				git: z
					.object({
						repo: optionalString,
						directory: optionalString,
						commit: optionalString,
					})
					.passthrough()
					.nullish(),
			})
			.passthrough()
			.nullish(),
	})
	.passthrough();

/** Resolved run configuration (CLI flags merged with environment) */
export const recreateConfigSchema = z.object({
	dir: z.string().min(1, "--dir must not be empty"),
	outDir: z.string().min(1, "--out-dir must not be empty").optional(),
	dryRun: z.boolean(),
	kptBinary: z.string().min(1, "KPT_BIN must not be empty"),
});

export type RecreateConfig = z.infer<typeof recreateConfigSchema>;
