/**
 * Base class for errors that map onto an HTTP response.
 */
export class AppError extends Error {
    constructor(
        message: string,
        readonly statusCode: number,
        readonly code: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UnsupportedFileTypeError extends AppError {
    constructor(mimeType: string) {
        super(
            `Invalid file type "${mimeType}". Only PDF, DOCX and plain text allowed.`,
            415,
            "unsupported_file_type"
        );
    }
}

/**
 * Text extraction failed before the pipeline ever ran.
 */
export class DocumentDecodeError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 422, "decode_failed", { cause });
    }
}

export class RequestValidationError extends AppError {
    constructor(message: string) {
        super(message, 400, "invalid_request");
    }
}

/**
 * A broken internal guarantee of the extraction pipeline. Always a bug.
 */
export class PipelineInvariantError extends AppError {
    constructor(message: string) {
        super(message, 500, "pipeline_invariant");
    }
}
