import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import pdfParse from "pdf-parse";
import request from "supertest";
import { createApp } from "./app";
import { MemoryResultCache } from "./cache/resultCache";
import type { AppConfig } from "./config";
import { ResumeParserService } from "./parsers/resumeParser";

const CV_TEXT =
    "John Doe\njohn@x.com\n\nEXPERIENCE\nSoftware Engineer at Acme Corp\nJan 2020 - Present\n- Built things\n\nSKILLS\nPython, Go, SQL";

const uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), "cv-uploads-"));

function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        port: 0,
        uploadDir,
        maxUploadBytes: 1024 * 1024,
        cacheTtlSeconds: 60,
        rateLimit: { max: 100, windowMs: 60_000 },
        logLevel: "silent",
        ...overrides,
    };
}

function buildApp(overrides: Partial<AppConfig> = {}) {
    const parser = new ResumeParserService({ cache: new MemoryResultCache() });
    return createApp({ config: testConfig(overrides), parser });
}

afterAll(() => {
    fs.rmSync(uploadDir, { recursive: true, force: true });
});

describe("GET /health", () => {
    it("reports the service as up", async () => {
        const response = await request(buildApp()).get("/health");
        expect(response.status).toBe(200);
        expect(response.body).toEqual({ status: "ok", message: "CV parsing service running" });
    });
});

describe("POST /parse-text", () => {
    it("parses the text and caches the record", async () => {
        const app = buildApp();

        const first = await request(app).post("/parse-text").send({ text: CV_TEXT });
        expect(first.status).toBe(200);
        expect(first.body.success).toBe(true);
        expect(first.body.cached).toBe(false);
        expect(first.body.data.contact).toEqual({ name: "John Doe", email: "john@x.com" });
        expect(first.body.data.experience[0].employer).toBe("Acme Corp");

        const second = await request(app).post("/parse-text").send({ text: CV_TEXT });
        expect(second.body.cached).toBe(true);
        expect(second.body.data).toEqual(first.body.data);
    });

    it("rejects a body without text", async () => {
        const response = await request(buildApp()).post("/parse-text").send({});
        expect(response.status).toBe(400);
        expect(response.body).toEqual({ success: false, error: "invalid_request", message: "text is required" });
    });

    it("rejects malformed JSON", async () => {
        const response = await request(buildApp())
            .post("/parse-text")
            .set("Content-Type", "application/json")
            .send("{not json");
        expect(response.status).toBe(400);
        expect(response.body.error).toBe("invalid_request");
    });
});

describe("POST /parse-cv", () => {
    beforeEach(() => {
        vi.mocked(pdfParse).mockReset();
    });

    it("parses an uploaded text file", async () => {
        const response = await request(buildApp()).post("/parse-cv").attach("resume", Buffer.from(CV_TEXT), "cv.txt");

        expect(response.status).toBe(200);
        expect(response.body.success).toBe(true);
        expect(response.body.filename).toBe("cv.txt");
        expect(response.body.cached).toBe(false);
        expect(response.body.data.skills).toEqual([{ category: "General", skills: ["Python", "Go", "SQL"] }]);
    });

    it("parses an uploaded PDF", async () => {
        vi.mocked(pdfParse).mockResolvedValueOnce({
            numpages: 1,
            numrender: 1,
            info: {},
            metadata: null,
            version: "v1.10.100",
            text: CV_TEXT,
        });

        const response = await request(buildApp()).post("/parse-cv").attach("resume", Buffer.from("%PDF-1.4"), "cv.pdf");

        expect(response.status).toBe(200);
        expect(response.body.data.contact.name).toBe("John Doe");
    });

    it("answers 400 without a file", async () => {
        const response = await request(buildApp()).post("/parse-cv");
        expect(response.status).toBe(400);
        expect(response.body).toEqual({ success: false, error: "invalid_request", message: "No file uploaded" });
    });

    it("answers 415 for unsupported types", async () => {
        const response = await request(buildApp()).post("/parse-cv").attach("resume", Buffer.from("png"), "photo.png");
        expect(response.status).toBe(415);
        expect(response.body).toEqual({
            success: false,
            error: "unsupported_file_type",
            message: 'Invalid file type "image/png". Only PDF, DOCX and plain text allowed.',
        });
    });

    it("answers 413 for oversized files", async () => {
        const response = await request(buildApp({ maxUploadBytes: 16 }))
            .post("/parse-cv")
            .attach("resume", Buffer.from(CV_TEXT), "cv.txt");
        expect(response.status).toBe(413);
        expect(response.body).toEqual({ success: false, error: "file_too_large", message: "File too large" });
    });

    it("answers 422 when the document cannot be decoded", async () => {
        vi.mocked(pdfParse).mockRejectedValueOnce(new Error("bad xref"));

        const response = await request(buildApp()).post("/parse-cv").attach("resume", Buffer.from("%PDF-1.4"), "cv.pdf");

        expect(response.status).toBe(422);
        expect(response.body).toEqual({
            success: false,
            error: "decode_failed",
            message: "Could not read application/pdf document: bad xref",
        });
    });
});

describe("rate limiting", () => {
    it("answers 429 once the limit is spent", async () => {
        const app = buildApp({ rateLimit: { max: 2, windowMs: 60_000 } });

        await request(app).post("/parse-text").send({ text: "a" }).expect(200);
        await request(app).post("/parse-text").send({ text: "b" }).expect(200);
        const response = await request(app).post("/parse-text").send({ text: "c" });

        expect(response.status).toBe(429);
        expect(response.body).toEqual({
            success: false,
            error: "rate_limited",
            message: "Too many requests, please try again later.",
        });
    });

    it("leaves the health check unlimited", async () => {
        const app = buildApp({ rateLimit: { max: 1, windowMs: 60_000 } });

        await request(app).get("/health").expect(200);
        await request(app).get("/health").expect(200);
    });
});
