import pino from "pino";
import type { AppConfig } from "./config.js";

export type Logger = pino.Logger;

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
    return pino({
        level: config.NODE_ENV === "test" ? "silent" : config.LOG_LEVEL,
        base: { service: "venue-booking-server" },
        redact: ["email", "phone", "*.email", "*.phone", "req.headers.authorization"],
    });
}
