import type { CertificationEntry, YearMonth } from "../types/resume";
import { findDateRange, parseDatePoint, removeDateText } from "./dateRange";
import type { DateMatch } from "./dateRange";
import { isBlank, stripBullet, tidyText } from "./heuristics";

const ISSUED_BY = /^(?:issued by|issuer|issuing organi[sz]ation|by)\s*:?\s*/i;
const NAME_ISSUER_SEPARATOR = /\s+\|\s+|\s+[-–—]\s+|,\s+|\s+by\s+/i;

function issuedOn(match: DateMatch): YearMonth | undefined {
    return match.range.kind === "resolved" ? match.range.start : parseDatePoint(match.range.text);
}

function isDateOnly(line: string): boolean {
    const match = findDateRange(line);
    return match !== undefined && tidyText(removeDateText(line, match)) === "";
}

/**
 * Name, issuer and date stacked over two or three lines rather than one
 * certification per line.
 */
export function isStackedBlock(lines: readonly string[]): boolean {
    if (lines.length < 2 || lines.length > 3) return false;
    const [first, second, third] = lines;
    if (ISSUED_BY.test(second)) return true;
    if (lines.length === 2) {
        return findDateRange(first) !== undefined && findDateRange(second) === undefined;
    }
    return findDateRange(first) === undefined && findDateRange(second) === undefined && isDateOnly(third);
}

/**
 * "AWS Certified Developer - Amazon Web Services (Mar 2021)" and friends.
 */
export function parseCertificationLine(line: string): CertificationEntry {
    const match = findDateRange(line);
    const text = tidyText(match ? removeDateText(line, match) : line);
    const [name, issuer] = text.split(NAME_ISSUER_SEPARATOR).map(tidyText);

    return {
        name: name || text || line,
        issuer: issuer || undefined,
        date: match?.range.text,
        issued: match ? issuedOn(match) : undefined,
    };
}

function parseStackedBlock(lines: readonly string[]): CertificationEntry {
    const [first, second] = lines;
    const dated = lines.map((line) => findDateRange(line)).find((match) => match !== undefined);
    const firstMatch = findDateRange(first);
    const name = tidyText(firstMatch ? removeDateText(first, firstMatch) : first);
    const secondMatch = findDateRange(second);
    const issuer = tidyText((secondMatch ? removeDateText(second, secondMatch) : second).replace(ISSUED_BY, ""));

    return {
        name: name || first,
        issuer: issuer || undefined,
        date: dated?.range.text,
        issued: dated ? issuedOn(dated) : undefined,
    };
}

function splitBlocks(lines: readonly string[]): string[][] {
    const blocks: string[][] = [[]];
    for (const line of lines) {
        if (isBlank(line)) {
            blocks.push([]);
        } else {
            blocks[blocks.length - 1].push(stripBullet(line));
        }
    }
    return blocks.filter((block) => block.length > 0);
}

export function extractCertifications(lines: readonly string[]): CertificationEntry[] {
    return splitBlocks(lines).flatMap((block) =>
        isStackedBlock(block) ? [parseStackedBlock(block)] : block.map(parseCertificationLine)
    );
}
