/**
 * Factory configuration.
 * Zod schema for flyweight factory settings. Hosts pass a plain object;
 * the library reads no files and no environment.
 */

import { z, type ZodError } from "zod";
import { LOG_LEVELS } from "./logger.ts";

export const FlyweightConfigSchema = z.object({
	/** Label used in log lines */
	name: z.string().min(1).default("flyweight"),
	logLevel: z.enum(LOG_LEVELS).default("warn"),
	/** "sha256" replaces the canonical context text with its digest */
	keyEncoding: z.enum(["canonical", "sha256"]).default("canonical"),
});

export type FlyweightConfig = z.infer<typeof FlyweightConfigSchema>;

export class ConfigError extends Error {
	constructor(
		public readonly source: string,
		public readonly issues: string[],
		options?: { cause?: unknown },
	) {
		super(`Invalid flyweight config (${source}):\n${issues.join("\n")}`, options);
		this.name = "ConfigError";
	}
}

/** One `  - path: message` line per schema issue. */
function describeIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
		return `  - ${where}${issue.message}`;
	});
}

/**
 * Validate a raw config object, filling defaults.
 *
 * @param source - label for error messages (e.g. where the host got the object)
 * @throws ConfigError listing every schema issue
 */
export function parseFlyweightConfig(raw: unknown, source = "<inline>"): FlyweightConfig {
	const result = FlyweightConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigError(source, describeIssues(result.error), { cause: result.error });
	}
	return result.data;
}
