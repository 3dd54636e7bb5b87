import express from "express";
import type { Express } from "express";
import cors from "cors";
import multer from "multer";
import fs from "fs";
import { z } from "zod";
import type { AppConfig } from "./config";
import { RequestValidationError, UnsupportedFileTypeError } from "./lib/errors";
import { createLogger } from "./lib/logger";
import { errorHandler } from "./middleware/errorHandler";
import { createParseRateLimiter } from "./middleware/rateLimiter";
import { SUPPORTED_MIME_TYPES } from "./parsers/documentText";
import type { ResumeParserService } from "./parsers/resumeParser";

const logger = createLogger("http");

const ParseTextBody = z.object({
    text: z.string({ required_error: "text is required" }),
});

export interface AppDependencies {
    config: AppConfig;
    parser: ResumeParserService;
}

async function removeUpload(filePath: string): Promise<void> {
    try {
        await fs.promises.unlink(filePath);
    } catch (error) {
        logger.warn(`Could not remove upload ${filePath}:`, error);
    }
}

/**
 * Build the HTTP app. Kept separate from `listen` so tests can drive it
 * in-process.
 */
export function createApp({ config, parser }: AppDependencies): Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: "1mb" }));

    // File upload configuration
    const upload = multer({
        dest: config.uploadDir,
        limits: {
            fileSize: config.maxUploadBytes,
        },
        fileFilter: (req, file, cb) => {
            if (SUPPORTED_MIME_TYPES.includes(file.mimetype)) {
                cb(null, true);
            } else {
                cb(new UnsupportedFileTypeError(file.mimetype));
            }
        },
    });

    const parseLimiter = createParseRateLimiter(config.rateLimit);

    // Routes

    app.get("/", (req, res) => {
        res.json({
            service: "cv-structure-parser",
            endpoints: ["GET /health", "POST /parse-cv", "POST /parse-text"],
        });
    });

    app.get("/health", (req, res) => {
        res.json({ status: "ok", message: "CV parsing service running" });
    });

    app.post("/parse-cv", parseLimiter, upload.single("resume"), async (req, res, next) => {
        const file = req.file;
        if (!file) {
            next(new RequestValidationError("No file uploaded"));
            return;
        }

        try {
            const buffer = await fs.promises.readFile(file.path);
            const outcome = await parser.parseDocument({
                buffer,
                mimeType: file.mimetype,
                originalName: file.originalname,
            });

            if (!outcome.success) {
                res.status(422).json({
                    success: false,
                    error: outcome.failure.reason,
                    message: outcome.failure.message,
                });
                return;
            }

            res.json({
                success: true,
                filename: file.originalname,
                cached: outcome.cached,
                data: outcome.data,
            });
        } catch (error) {
            next(error);
        } finally {
            await removeUpload(file.path);
        }
    });

    app.post("/parse-text", parseLimiter, async (req, res, next) => {
        const body = ParseTextBody.safeParse(req.body);
        if (!body.success) {
            next(new RequestValidationError(body.error.issues.map((issue) => issue.message).join("; ")));
            return;
        }

        try {
            const outcome = await parser.parseText(body.data.text);
            if (!outcome.success) {
                res.status(422).json({ success: false, error: outcome.failure.reason, message: outcome.failure.message });
                return;
            }
            res.json({ success: true, cached: outcome.cached, data: outcome.data });
        } catch (error) {
            next(error);
        }
    });

    app.use(errorHandler);

    return app;
}
