import { z } from "zod";

const envSchema = z
    .object({
        NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
        PORT: z.coerce.number().int().positive().default(3001),
        HOST: z.string().min(1).default("0.0.0.0"),
        LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
        CORS_ORIGIN: z.string().optional(),
        STORE_DRIVER: z.enum(["firestore", "memory"]).default("firestore"),
        GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
        FIREBASE_STORAGE_BUCKET: z.string().optional(),
        LOCK_DRIVER: z.enum(["memory", "redis"]).default("memory"),
        REDIS_URL: z.string().url().optional(),
        LOCK_TTL_MS: z.coerce.number().int().positive().default(10000),
        LOCK_WAIT_MS: z.coerce.number().int().positive().default(5000),
        MEDIA_MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
        MEDIA_MAX_VIDEO_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
    })
    .superRefine((env, ctx) => {
        if (env.LOCK_DRIVER === "redis" && !env.REDIS_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["REDIS_URL"],
                message: "REDIS_URL is required when LOCK_DRIVER=redis",
            });
        }
    });

export type AppConfig = z.output<typeof envSchema>;

export class ConfigError extends Error {
    constructor(readonly fieldErrors: Record<string, string[] | undefined>) {
        super("Invalid environment configuration");
        this.name = "ConfigError";
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.flatten().fieldErrors);
    }
    return parsed.data;
}

// "true" reflects the request origin; anything else is a comma-separated allow list.
export function corsOrigin(config: AppConfig): boolean | string[] {
    if (!config.CORS_ORIGIN || config.CORS_ORIGIN === "true") return true;
    return config.CORS_ORIGIN.split(",").map((origin) => origin.trim()).filter(Boolean);
}
