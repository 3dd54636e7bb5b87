import { createHash } from "crypto";

/** SHA-256 hex digest of the document bytes, or of UTF-8 text. */
export function fingerprint(content: Buffer | string): string {
    return createHash("sha256").update(content).digest("hex");
}
