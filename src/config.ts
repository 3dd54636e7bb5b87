import { z } from "zod";
import type { LogLevel } from "./lib/logger";

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    UPLOAD_DIR: z.string().min(1).default("uploads/"),
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(5),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface AppConfig {
    port: number;
    uploadDir: string;
    maxUploadBytes: number;
    cacheTtlSeconds: number;
    rateLimit: {
        max: number;
        windowMs: number;
    };
    logLevel: LogLevel;
}

/**
 * Read service settings from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid configuration: ${issues}`);
    }

    const parsed = result.data;
    return {
        port: parsed.PORT,
        uploadDir: parsed.UPLOAD_DIR,
        maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
        cacheTtlSeconds: parsed.CACHE_TTL_SECONDS,
        rateLimit: {
            max: parsed.RATE_LIMIT_MAX,
            windowMs: parsed.RATE_LIMIT_WINDOW_MS,
        },
        logLevel: parsed.LOG_LEVEL,
    };
}
