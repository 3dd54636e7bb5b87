/**
 * Experience, education and volunteering sections share one layout: blocks of
 * a header line or two, a date range, then detail lines. This module finds the
 * blocks and reads the header; the public extractors only differ in which
 * keywords orient the header and how the fields are named.
 */

import type { DateRange, EducationEntry, ExperienceEntry, VolunteeringEntry } from "../types/resume";
import { findDateRange, hasDateRange, removeDateText } from "./dateRange";
import type { DateMatch } from "./dateRange";
import {
    isBlank,
    isBulletLine,
    isEntryHeaderLine,
    looksLikeDegree,
    looksLikeInstitution,
    looksLikeOrganization,
    looksLikeRole,
    stripBullet,
    tidyText,
} from "./heuristics";

/** How many leading lines of a block are searched for its dates. */
export const DATE_SEARCH_LINES = 3;

/** How far ahead a dated entry header may sit above its date line. */
export const DATE_LOOKAHEAD_LINES = 2;

export interface HeaderParts {
    left: string;
    right?: string;
    location?: string;
    /** "Role at Organization" fixes the order; other separators do not. */
    ordered: boolean;
}

export interface OrientationRules {
    /** Role, title or degree. */
    isPrimary(text: string): boolean;
    /** Employer, institution or organization. */
    isSecondary(text: string): boolean;
}

export interface ParsedBlock {
    primary?: string;
    secondary?: string;
    location?: string;
    dateRange?: DateRange;
    details: string[];
}

const EXPERIENCE_RULES: OrientationRules = { isPrimary: looksLikeRole, isSecondary: looksLikeOrganization };
const EDUCATION_RULES: OrientationRules = { isPrimary: looksLikeDegree, isSecondary: looksLikeInstitution };
const VOLUNTEERING_RULES: OrientationRules = { isPrimary: looksLikeRole, isSecondary: looksLikeOrganization };

function nonEmpty(parts: string[]): string[] {
    return parts.map(tidyText).filter(Boolean);
}

function partsToHeader(parts: string[], ordered: boolean): HeaderParts {
    const [left, right, ...rest] = parts;
    return {
        left,
        right,
        location: rest.length > 0 ? rest.join(", ") : undefined,
        ordered,
    };
}

/**
 * Split "Role at Org, City", "Role | Org", "Org – Role" or "Role, Org, City".
 */
export function splitHeaderLine(line: string): HeaderParts {
    const text = tidyText(line);

    const at = text.match(/^(.+?)(?:\s+at\s+|\s*@\s*)(.+)$/i);
    if (at) {
        const rest = nonEmpty(at[2].split(/\s*[|,]\s*|\s+[–—-]\s+/));
        return partsToHeader([tidyText(at[1]), ...rest], true);
    }

    const separated = nonEmpty(text.split(/\s+[|•·]\s+|\s+[–—-]\s+/));
    if (separated.length >= 2) return partsToHeader(separated, false);

    const commas = nonEmpty(text.split(/\s*,\s*/));
    if (commas.length >= 2) return partsToHeader(commas, false);

    return { left: text, ordered: false };
}

/** Swap when the left side reads as the organization and the right as the role. */
export function shouldSwap(left: string, right: string, rules: OrientationRules): boolean {
    const leftPrimary = rules.isPrimary(left);
    if (rules.isSecondary(left) && !leftPrimary) return true;
    return !leftPrimary && rules.isPrimary(right) && !rules.isSecondary(right);
}

/**
 * Read the one or two header lines of a block into role, organization and
 * location.
 */
export function resolveHeader(lines: readonly string[], rules: OrientationRules): Omit<ParsedBlock, "details" | "dateRange"> {
    const [first, second] = lines;
    if (first === undefined) return {};

    const head = splitHeaderLine(first);
    let primary: string | undefined = head.left;
    let secondary = head.right;
    let location = head.location;

    if (secondary !== undefined && !head.ordered && shouldSwap(primary, secondary, rules)) {
        [primary, secondary] = [secondary, primary];
    }

    if (second !== undefined) {
        const next = splitHeaderLine(second);
        if (secondary === undefined) {
            secondary = next.left;
            location ??= nonEmpty([next.right ?? "", next.location ?? ""]).join(", ") || undefined;
            if (shouldSwap(primary, secondary, rules)) {
                [primary, secondary] = [secondary, primary];
            }
        } else {
            location ??= tidyText(second);
        }
    } else if (secondary === undefined && rules.isSecondary(primary) && !rules.isPrimary(primary)) {
        secondary = primary;
        primary = undefined;
    }

    return { primary, secondary, location };
}

/**
 * Does a new dated entry start at this line? True when the line, or one of the
 * next two header-like lines, carries a date range.
 */
export function startsDatedEntry(lines: readonly string[], index: number): boolean {
    for (let offset = 0; offset <= DATE_LOOKAHEAD_LINES; offset++) {
        const candidate = lines[index + offset];
        if (candidate === undefined || isBlank(candidate) || isBulletLine(candidate)) return false;
        if (hasDateRange(candidate)) return true;
        if (!isEntryHeaderLine(candidate)) return false;
    }
    return false;
}

/**
 * Split a section body into entry blocks at blank lines, at a header line that
 * follows bullets, and at a new dated header once the block has its dates.
 */
export function splitEntryBlocks(lines: readonly string[]): string[][] {
    const blocks: string[][] = [];
    let current: string[] = [];
    let currentHasDate = false;

    const flush = () => {
        if (current.length > 0) blocks.push(current);
        current = [];
        currentHasDate = false;
    };

    lines.forEach((line, index) => {
        if (isBlank(line)) {
            flush();
            return;
        }

        const previous = current[current.length - 1];
        const afterBullets = previous !== undefined && isBulletLine(previous) && isEntryHeaderLine(line);
        const nextDatedEntry = currentHasDate && startsDatedEntry(lines, index);
        if (afterBullets || nextDatedEntry) flush();

        current.push(line);
        if (!isBulletLine(line) && hasDateRange(line)) currentHasDate = true;
    });
    flush();

    return blocks;
}

function locateDate(block: readonly string[]): { index: number; match: DateMatch } | undefined {
    const candidates = block
        .slice(0, DATE_SEARCH_LINES)
        .map((line, index) => ({ line, index }))
        .filter(({ line }) => !isBulletLine(line));

    const ranged = candidates.find(({ line }) => hasDateRange(line)) ?? candidates.find(({ line }) => findDateRange(line));
    if (!ranged) return undefined;

    const match = findDateRange(ranged.line);
    return match ? { index: ranged.index, match } : undefined;
}

function hasSeparator(line: string): boolean {
    const parts = splitHeaderLine(line);
    return parts.right !== undefined;
}

/**
 * Take up to two header lines from the front of `lines`; the second only when
 * the first names just one thing.
 */
function leadingHeaderLines(lines: readonly string[]): string[] {
    const [first, second] = lines;
    if (first === undefined || !isEntryHeaderLine(first)) return [];
    if (second !== undefined && !hasSeparator(first) && isEntryHeaderLine(second) && lines.length > 2) {
        return [first, second];
    }
    return [first];
}

/**
 * Read one entry block. Unrecognised text stays in the details rather than
 * being dropped.
 */
export function parseEntryBlock(block: readonly string[], rules: OrientationRules): ParsedBlock {
    const dated = locateDate(block);
    let headerLines: string[];
    let detailsStart: number;
    let dateLineText: string | undefined;

    if (!dated) {
        headerLines = leadingHeaderLines(block);
        detailsStart = headerLines.length;
    } else {
        const remainder = tidyText(removeDateText(block[dated.index], dated.match));
        if (dated.index === 0) {
            if (remainder) {
                headerLines = [remainder];
                detailsStart = 1;
            } else {
                headerLines = leadingHeaderLines(block.slice(1));
                detailsStart = 1 + headerLines.length;
            }
        } else {
            headerLines = block.slice(0, dated.index).filter((line) => !isBulletLine(line));
            detailsStart = dated.index + 1;
            dateLineText = remainder || undefined;
        }
    }

    const header = resolveHeader(headerLines, rules);
    const details = block
        .slice(detailsStart)
        .concat(dated && dated.index > 0 ? block.slice(0, dated.index).filter(isBulletLine) : [])
        .map(stripBullet)
        .map(tidyText)
        .filter(Boolean);

    return {
        ...header,
        location: header.location ?? dateLineText,
        dateRange: dated?.match.range,
        details,
    };
}

function parseSection(lines: readonly string[], rules: OrientationRules): ParsedBlock[] {
    return splitEntryBlocks(lines).map((block) => parseEntryBlock(block, rules));
}

export function extractExperience(lines: readonly string[]): ExperienceEntry[] {
    return parseSection(lines, EXPERIENCE_RULES).map((block) => ({
        employer: block.secondary,
        title: block.primary,
        location: block.location,
        dateRange: block.dateRange,
        responsibilities: block.details,
    }));
}

/** "Bachelor of Science in Computer Science" → degree + field of study. */
export function splitDegree(degree: string | undefined): { degree?: string; fieldOfStudy?: string } {
    if (!degree) return {};
    const match = degree.match(/^(.+?)\s+in\s+(.+)$/i);
    return match ? { degree: tidyText(match[1]), fieldOfStudy: tidyText(match[2]) } : { degree };
}

export function extractEducation(lines: readonly string[]): EducationEntry[] {
    return parseSection(lines, EDUCATION_RULES).map((block) => ({
        institution: block.secondary,
        ...splitDegree(block.primary),
        location: block.location,
        dateRange: block.dateRange,
        details: block.details,
    }));
}

export function extractVolunteering(lines: readonly string[]): VolunteeringEntry[] {
    return parseSection(lines, VOLUNTEERING_RULES).map((block) => ({
        organization: block.secondary,
        role: block.primary,
        location: block.location,
        dateRange: block.dateRange,
        details: block.details,
    }));
}
