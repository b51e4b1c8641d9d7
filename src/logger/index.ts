import pino, { LevelWithSilent } from "pino";
import { NodeEnv, readNodeEnv } from "../config/env";

const LEVELS: Record<NodeEnv, LevelWithSilent> = {
    test: "silent",
    development: "debug",
    production: "info",
};

export function createLogger(env: NodeEnv = readNodeEnv()) {
    return pino({
        name: "city-weather-dashboard",
        level: LEVELS[env],
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid },
        transport: env === "development"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "yyyy-mm-dd HH:MM:ss",
                    ignore: "pid,hostname",
                },
            }
            : undefined,
    });
}

export const logger = createLogger();

export type Logger = typeof logger;
