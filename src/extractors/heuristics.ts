/**
 * Tunable predicates shared by the pipeline stages. Each heuristic lives here
 * under its own name so it can be tested and adjusted on its own.
 */

import vocabulary from "./data/vocabulary.json";

export const BULLET_PREFIX = "- ";

/** Longest line, in words, still treated as an entry header. */
export const MAX_ENTRY_HEADER_WORDS = 12;

/** Section headings are short. */
export const MAX_HEADING_WORDS = 5;
export const MAX_HEADING_LENGTH = 50;

const ROLE_KEYWORDS = new Set(vocabulary.roleKeywords);
const ORGANIZATION_KEYWORDS = new Set(vocabulary.organizationKeywords);
const INSTITUTION_KEYWORDS = new Set(vocabulary.institutionKeywords);
const DEGREE_KEYWORDS = new Set(vocabulary.degreeKeywords);
const HEADING_KEYS = new Set([...Object.values(vocabulary.sectionHeadings).flat(), ...vocabulary.otherHeadings]);

export function isBlank(line: string): boolean {
    return line.trim().length === 0;
}

export function isBulletLine(line: string): boolean {
    return line.startsWith(BULLET_PREFIX);
}

export function stripBullet(line: string): string {
    return isBulletLine(line) ? line.slice(BULLET_PREFIX.length).trim() : line.trim();
}

export function endsWithTerminalPunctuation(line: string): boolean {
    return /[.!?:;]$/.test(line);
}

export function wordCount(line: string): number {
    return line.split(/\s+/).filter(Boolean).length;
}

/**
 * A line wrapped by the layout: the previous line stops mid-sentence and this
 * one carries on in lowercase. Emails, URLs and paths never continue a line,
 * and nothing continues a section heading.
 */
export function isLineContinuation(previous: string, next: string): boolean {
    if (isBlank(previous) || isBlank(next)) return false;
    if (endsWithTerminalPunctuation(previous)) return false;
    if (isKnownHeading(previous)) return false;
    if (!/^[a-z]/.test(next)) return false;

    const firstToken = next.split(" ")[0];
    return !/[@/]|\.[a-z]/i.test(firstToken);
}

/**
 * Short, digit-free, capitalised (or colon-terminated) line.
 */
export function hasHeadingShape(line: string): boolean {
    const text = stripBullet(line);
    if (text.length === 0 || text.length > MAX_HEADING_LENGTH) return false;
    if (wordCount(text) > MAX_HEADING_WORDS) return false;
    if (/\d/.test(text)) return false;
    if (/[.,;!?]$/.test(text)) return false;

    const firstLetter = text.match(/[A-Za-z]/);
    if (!firstLetter) return false;
    return firstLetter[0] === firstLetter[0].toUpperCase() || text.endsWith(":");
}

/** Lowercased heading text with bullets, edge punctuation and "&" folded away. */
export function normalizeHeading(line: string): string {
    return stripBullet(line)
        .toLowerCase()
        .replace(/&/g, " and ")
        .replace(/^[^a-z]+|[^a-z]+$/g, "")
        .replace(/\s+/g, " ");
}

/** Heading-shaped line whose text is a listed section heading. */
export function isKnownHeading(line: string): boolean {
    return hasHeadingShape(line) && HEADING_KEYS.has(normalizeHeading(line));
}

export function isAllCaps(line: string): boolean {
    return /[A-Z]/.test(line) && line === line.toUpperCase();
}

/**
 * Could this line open an entry (title, employer, degree ...) rather than
 * being a sentence of description?
 */
export function isEntryHeaderLine(line: string): boolean {
    if (isBlank(line) || isBulletLine(line)) return false;
    if (wordCount(line) > MAX_ENTRY_HEADER_WORDS) return false;
    return !/[.!?]$/.test(line);
}

function tokens(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[\s,()/|]+/)
        .filter(Boolean);
}

export function containsKeyword(text: string, keywords: ReadonlySet<string>): boolean {
    return tokens(text).some((token) => keywords.has(token) || keywords.has(token.replace(/\.+$/, "")));
}

export const looksLikeRole = (text: string): boolean => containsKeyword(text, ROLE_KEYWORDS);
export const looksLikeOrganization = (text: string): boolean => containsKeyword(text, ORGANIZATION_KEYWORDS);
export const looksLikeInstitution = (text: string): boolean => containsKeyword(text, INSTITUTION_KEYWORDS);
export const looksLikeDegree = (text: string): boolean => containsKeyword(text, DEGREE_KEYWORDS);

/**
 * Collapse whitespace and drop separators left dangling at either end.
 */
export function tidyText(text: string): string {
    return text
        .replace(/\s+/g, " ")
        .replace(/^[\s,;|·•–—-]+/, "")
        .replace(/[\s,;|·•–—-]+$/, "")
        .trim();
}

/** Case-folded, whitespace-collapsed comparison key. */
export function foldKey(text: string | undefined): string {
    return tidyText(text ?? "").toLowerCase();
}
