import { cacheKey } from "../cache/resultCache";
import type { ResultCache } from "../cache/resultCache";
import { extractDataFromText } from "../extractors/dataExtractor";
import { DocumentDecodeError } from "../lib/errors";
import { fingerprint } from "../lib/fingerprint";
import { createLogger } from "../lib/logger";
import type { CVRecord, ParseOutcome } from "../types/resume";
import { extractDocumentText } from "./documentText";
import type { DocumentTextExtractor } from "./documentText";

const logger = createLogger("parser");

export interface DocumentUpload {
    buffer: Buffer;
    mimeType: string;
    originalName?: string;
}

export interface ResumeParserOptions {
    cache: ResultCache;
    extractText?: DocumentTextExtractor;
}

/**
 * Fronts the extraction pipeline with a result cache. Concurrent requests for
 * the same document share one computation.
 */
export class ResumeParserService {
    private readonly cache: ResultCache;
    private readonly extractText: DocumentTextExtractor;
    private readonly inFlight = new Map<string, Promise<CVRecord>>();

    constructor(options: ResumeParserOptions) {
        this.cache = options.cache;
        this.extractText = options.extractText ?? extractDocumentText;
    }

    /**
     * Parse an uploaded document. Unsupported types throw; decoder failures
     * come back as an unsuccessful outcome.
     */
    async parseDocument(upload: DocumentUpload): Promise<ParseOutcome> {
        const id = fingerprint(upload.buffer);
        logger.info(`Parsing ${upload.originalName ?? "document"} (${upload.mimeType}, ${upload.buffer.length} bytes)`);

        try {
            return await this.resolve(id, async () => {
                const text = await this.extractText(upload.buffer, upload.mimeType);
                return extractDataFromText(text);
            });
        } catch (error) {
            if (error instanceof DocumentDecodeError) {
                logger.warn(`Decode failed for ${id.slice(0, 12)}: ${error.message}`);
                return { success: false, failure: { reason: "decode_failed", message: error.message } };
            }
            throw error;
        }
    }

    /**
     * Parse text that is already plain.
     */
    async parseText(text: string): Promise<ParseOutcome> {
        const id = fingerprint(text);
        logger.info(`Parsing ${text.length} characters of text`);
        return this.resolve(id, async () => extractDataFromText(text));
    }

    private async resolve(id: string, compute: () => Promise<CVRecord>): Promise<ParseOutcome> {
        const key = cacheKey(id);

        const cached = await this.cache.get(key);
        if (cached) {
            logger.debug(`Cache hit for ${id.slice(0, 12)}`);
            return { success: true, data: cached, fingerprint: id, cached: true };
        }

        let pending = this.inFlight.get(key);
        if (!pending) {
            pending = this.compute(key, compute);
            this.inFlight.set(key, pending);
        }

        const data = await pending;
        return { success: true, data: structuredClone(data), fingerprint: id, cached: false };
    }

    private async compute(key: string, compute: () => Promise<CVRecord>): Promise<CVRecord> {
        try {
            const record = await compute();
            await this.cache.set(key, record);
            return record;
        } finally {
            this.inFlight.delete(key);
        }
    }
}
