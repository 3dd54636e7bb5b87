import pdfParse from "pdf-parse";
import mammoth from "mammoth";
import { DocumentDecodeError, UnsupportedFileTypeError } from "../lib/errors";

export const PDF_MIME_TYPE = "application/pdf";
export const DOCX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";
export const TEXT_MIME_TYPE = "text/plain";

export const SUPPORTED_MIME_TYPES: readonly string[] = [PDF_MIME_TYPE, DOCX_MIME_TYPE, TEXT_MIME_TYPE];

export type DocumentTextExtractor = (buffer: Buffer, mimeType: string) => Promise<string>;

/**
 * Parse PDF buffer
 */
async function parsePDF(buffer: Buffer): Promise<string> {
    const data = await pdfParse(buffer);
    return data.text;
}

/**
 * Parse DOCX buffer
 */
async function parseDOCX(buffer: Buffer): Promise<string> {
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
}

function decoderFor(mimeType: string): (buffer: Buffer) => Promise<string> {
    switch (mimeType) {
        case PDF_MIME_TYPE:
            return parsePDF;
        case DOCX_MIME_TYPE:
            return parseDOCX;
        case TEXT_MIME_TYPE:
            return async (buffer) => buffer.toString("utf8");
        default:
            throw new UnsupportedFileTypeError(mimeType);
    }
}

/**
 * Get the plain text of an uploaded document. Decoder failures surface as
 * `DocumentDecodeError` so callers can tell them apart from an empty CV.
 */
export const extractDocumentText: DocumentTextExtractor = async (buffer, mimeType) => {
    const decode = decoderFor(mimeType);
    try {
        return await decode(buffer);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new DocumentDecodeError(`Could not read ${mimeType} document: ${reason}`, error);
    }
};
