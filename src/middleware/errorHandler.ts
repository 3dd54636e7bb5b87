import type { ErrorRequestHandler } from "express";
import { MulterError } from "multer";
import { AppError } from "../lib/errors";
import { createLogger } from "../lib/logger";

const logger = createLogger("http");

function multerStatus(error: MulterError): number {
    return error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
}

/**
 * Last middleware in the chain: every error leaves as
 * `{ success: false, error, message }`.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    if (error instanceof AppError) {
        if (error.statusCode >= 500) logger.error(`${req.method} ${req.path} failed:`, error);
        res.status(error.statusCode).json({ success: false, error: error.code, message: error.message });
        return;
    }

    if (error instanceof MulterError) {
        res.status(multerStatus(error)).json({
            success: false,
            error: error.code === "LIMIT_FILE_SIZE" ? "file_too_large" : "invalid_upload",
            message: error.message,
        });
        return;
    }

    if (error instanceof SyntaxError) {
        res.status(400).json({ success: false, error: "invalid_request", message: "Malformed JSON body" });
        return;
    }

    logger.error(`${req.method} ${req.path} failed:`, error);
    res.status(500).json({
        success: false,
        error: "internal_error",
        message: "Failed to parse resume",
    });
};
