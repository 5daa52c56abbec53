import { z } from "zod";
import { LOG_LEVELS, logger, setLogLevel } from "./logger";

export const ConfigSchema = z.object({
	PORT: z.coerce.number().default(3000),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	POSITION_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(): Config {
	const result = ConfigSchema.safeParse(process.env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	setLogLevel(result.data.LOG_LEVEL);
	return result.data;
}
