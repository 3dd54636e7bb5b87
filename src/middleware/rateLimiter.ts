import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";

export interface RateLimitOptions {
    max: number;
    windowMs: number;
}

/**
 * Per-client limit on the parse routes.
 */
export function createParseRateLimiter(options: RateLimitOptions): RequestHandler {
    return rateLimit({
        windowMs: options.windowMs,
        limit: options.max,
        standardHeaders: "draft-7",
        legacyHeaders: false,
        message: {
            success: false,
            error: "rate_limited",
            message: "Too many requests, please try again later.",
        },
    });
}
