import pino from "pino";
import type { Config } from "./config";

export function createLogger(config: Pick<Config, "LOG_LEVEL">) {
	return pino({
		name: "avatar-cache",
		level: config.LOG_LEVEL,
		transport:
			process.env.NODE_ENV !== "production"
				? { target: "pino-pretty", options: { colorize: true, minimumLevel: config.LOG_LEVEL } }
				: undefined,
	});
}

export type Logger = ReturnType<typeof createLogger>;
