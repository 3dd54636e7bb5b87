import { describe, expect, it } from "vitest";
import { AppError, DocumentDecodeError, UnsupportedFileTypeError } from "./errors";

describe("AppError subclasses", () => {
    it("carry status, code and name", () => {
        const error = new UnsupportedFileTypeError("image/png");
        expect(error).toBeInstanceOf(AppError);
        expect(error.statusCode).toBe(415);
        expect(error.code).toBe("unsupported_file_type");
        expect(error.name).toBe("UnsupportedFileTypeError");
    });

    it("keep the decoder error as the cause", () => {
        const cause = new Error("bad xref");
        const error = new DocumentDecodeError("Could not read application/pdf document: bad xref", cause);
        expect(error.statusCode).toBe(422);
        expect(error.cause).toBe(cause);
    });
});
