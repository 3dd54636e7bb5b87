import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
    it("applies defaults", () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            uploadDir: "uploads/",
            maxUploadBytes: 10 * 1024 * 1024,
            cacheTtlSeconds: 86400,
            rateLimit: { max: 5, windowMs: 60000 },
            logLevel: "info",
        });
    });

    it("reads overrides from the environment", () => {
        const config = loadConfig({ PORT: "8080", RATE_LIMIT_MAX: "20", LOG_LEVEL: "debug" });
        expect(config.port).toBe(8080);
        expect(config.rateLimit.max).toBe(20);
        expect(config.logLevel).toBe("debug");
    });

    it("rejects invalid values", () => {
        expect(() => loadConfig({ PORT: "abc" })).toThrow(/^Invalid configuration: PORT: /);
        expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
    });
});
