import { createHash } from "crypto";
import { describe, expect, it, vi } from "vitest";
import { MemoryResultCache } from "../cache/resultCache";
import { DocumentDecodeError, UnsupportedFileTypeError } from "../lib/errors";
import type { DocumentTextExtractor } from "./documentText";
import { ResumeParserService } from "./resumeParser";

const CV_TEXT = "John Doe\njohn@x.com\n\nSKILLS\nPython, Go, SQL";

function sha256(content: string): string {
    return createHash("sha256").update(content).digest("hex");
}

function serviceWith(extractText: DocumentTextExtractor) {
    return new ResumeParserService({ cache: new MemoryResultCache(), extractText });
}

describe("ResumeParserService", () => {
    it("parses text and serves repeats from the cache", async () => {
        const service = serviceWith(vi.fn<DocumentTextExtractor>());

        const first = await service.parseText(CV_TEXT);
        const second = await service.parseText(CV_TEXT);

        expect(first).toMatchObject({ success: true, cached: false, fingerprint: sha256(CV_TEXT) });
        expect(second).toMatchObject({ success: true, cached: true, fingerprint: sha256(CV_TEXT) });
        if (!first.success || !second.success) return;
        expect(second.data).toEqual(first.data);
        expect(first.data.contact).toEqual({ name: "John Doe", email: "john@x.com" });
    });

    it("decodes documents through the text extractor", async () => {
        const extractText = vi.fn<DocumentTextExtractor>().mockResolvedValue(CV_TEXT);
        const service = serviceWith(extractText);

        const outcome = await service.parseDocument({ buffer: Buffer.from("%PDF"), mimeType: "application/pdf" });

        expect(extractText).toHaveBeenCalledWith(Buffer.from("%PDF"), "application/pdf");
        expect(outcome.success).toBe(true);
        if (!outcome.success) return;
        expect(outcome.data.skills).toEqual([{ category: "General", skills: ["Python", "Go", "SQL"] }]);
    });

    it("shares one computation between concurrent requests", async () => {
        const extractText = vi.fn<DocumentTextExtractor>().mockResolvedValue(CV_TEXT);
        const service = serviceWith(extractText);
        const upload = { buffer: Buffer.from("same bytes"), mimeType: "text/plain" };

        const [a, b] = await Promise.all([service.parseDocument(upload), service.parseDocument(upload)]);

        expect(extractText).toHaveBeenCalledTimes(1);
        expect(a).toEqual(b);
    });

    it("reports decode failures as an unsuccessful outcome", async () => {
        const extractText = vi
            .fn<DocumentTextExtractor>()
            .mockRejectedValue(new DocumentDecodeError("Could not read application/pdf document: bad xref"));
        const service = serviceWith(extractText);

        await expect(service.parseDocument({ buffer: Buffer.from("%PDF"), mimeType: "application/pdf" })).resolves.toEqual({
            success: false,
            failure: { reason: "decode_failed", message: "Could not read application/pdf document: bad xref" },
        });
    });

    it("does not cache failures", async () => {
        const extractText = vi
            .fn<DocumentTextExtractor>()
            .mockRejectedValueOnce(new DocumentDecodeError("Could not read text/plain document: broken"))
            .mockResolvedValueOnce(CV_TEXT);
        const service = serviceWith(extractText);
        const upload = { buffer: Buffer.from("retry me"), mimeType: "text/plain" };

        expect((await service.parseDocument(upload)).success).toBe(false);
        await expect(service.parseDocument(upload)).resolves.toMatchObject({ success: true, cached: false });
    });

    it("lets unsupported types propagate", async () => {
        const extractText = vi.fn<DocumentTextExtractor>().mockRejectedValue(new UnsupportedFileTypeError("image/png"));
        const service = serviceWith(extractText);

        await expect(service.parseDocument({ buffer: Buffer.from(""), mimeType: "image/png" })).rejects.toBeInstanceOf(
            UnsupportedFileTypeError
        );
    });
});
