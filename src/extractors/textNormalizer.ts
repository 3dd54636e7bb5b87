import { BULLET_PREFIX, isBlank, isLineContinuation } from "./heuristics";

/** Ordered, cleaned lines ready for segmentation. */
export type NormalizedText = readonly string[];

// Control characters except \t and \n, plus zero-width marks and the BOM.
const INVISIBLE_CHARACTERS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F\u200B-\u200D\u2060\uFEFF]/g;

// Glyph bullets, including the private-use code points PDF symbol fonts emit.
const GLYPH_BULLET = /^[\u2022\u25CF\u25AA\u25A0\u25A1\u25E6\u25CB\u25C6\u25C7\u25BA\u25B8\u25B6\u2023\u2043\u2219\u00B7\u27A2\u27A4\u2713\u2714\uF0A7\uF0B7\uF076\uF0D8]\s*/;
const DASH_BULLET = /^[-*–—]\s+/;

function repairBullet(line: string): string {
    const glyph = line.match(GLYPH_BULLET) ?? line.match(DASH_BULLET);
    if (!glyph) return line;

    const rest = line.slice(glyph[0].length).trim();
    return rest ? BULLET_PREFIX + rest : "";
}

function cleanLine(line: string): string {
    const collapsed = line
        .replace(INVISIBLE_CHARACTERS, "")
        .replace(/[\t\f\v ]+/g, " ")
        .trim();
    return repairBullet(collapsed);
}

/**
 * Clean raw extracted text: fold Unicode compatibility forms, strip invisible
 * characters, normalise bullets and whitespace, rejoin lines the layout broke
 * mid-sentence and squeeze blank runs.
 */
export function normalizeText(rawText: string): NormalizedText {
    if (!rawText || isBlank(rawText)) return [];

    const cleaned = rawText
        .normalize("NFKC")
        .replace(/\r\n?/g, "\n")
        .split("\n")
        .map(cleanLine);

    const joined: string[] = [];
    for (const line of cleaned) {
        const previous = joined[joined.length - 1];
        if (previous !== undefined && isLineContinuation(previous, line)) {
            joined[joined.length - 1] = `${previous} ${line}`;
        } else {
            joined.push(line);
        }
    }

    const lines: string[] = [];
    for (const line of joined) {
        if (isBlank(line) && (lines.length === 0 || isBlank(lines[lines.length - 1]))) continue;
        lines.push(line);
    }
    while (lines.length > 0 && isBlank(lines[lines.length - 1])) lines.pop();

    return lines;
}
