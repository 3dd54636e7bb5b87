import vocabulary from "./data/vocabulary.json";
import { PipelineInvariantError } from "../lib/errors";
import {
    hasHeadingShape,
    isAllCaps,
    isBlank,
    isBulletLine,
    looksLikeRole,
    normalizeHeading,
    stripBullet,
} from "./heuristics";
import type { NormalizedText } from "./textNormalizer";

export const SECTION_LABELS = [
    "CONTACT",
    "SUMMARY",
    "EXPERIENCE",
    "EDUCATION",
    "SKILLS",
    "PROJECTS",
    "CERTIFICATIONS",
    "VOLUNTEERING",
    "UNKNOWN",
] as const;

export type SectionLabel = (typeof SECTION_LABELS)[number];
export type HeadingLabel = Exclude<SectionLabel, "UNKNOWN">;

/** Earlier labels win when a heading matches several. */
export const LABEL_PRIORITY: readonly HeadingLabel[] = [
    "CONTACT",
    "EXPERIENCE",
    "EDUCATION",
    "SKILLS",
    "PROJECTS",
    "CERTIFICATIONS",
    "VOLUNTEERING",
    "SUMMARY",
];

/** Without any heading, only this many leading lines count as contact details. */
export const CONTACT_REGION_MAX_LINES = 15;

export interface Section {
    label: SectionLabel;
    heading?: string;
    /** First normalized line of the span (the heading, if any). */
    start: number;
    /** One past the last line of the span. */
    end: number;
    lines: string[];
}

export interface HeadingMatch {
    label: SectionLabel;
    /** Content that followed "Heading:" on the same line. */
    inline?: string;
}

const OTHER_HEADINGS = new Set(vocabulary.otherHeadings);

// "Role at Org", "Role, Org", "Org | Role": the shape of an entry header.
const ENTRY_SEPARATOR = /,|\s(?:at|@|[|•·–—-])\s/i;

function exactLabel(key: string): HeadingLabel | undefined {
    return LABEL_PRIORITY.find((label) => vocabulary.sectionHeadings[label].includes(key));
}

function phraseLabel(key: string, endingOnly = false): HeadingLabel | undefined {
    const padded = ` ${key} `;
    return LABEL_PRIORITY.find((label) =>
        vocabulary.sectionHeadings[label].some((synonym) =>
            endingOnly ? padded.endsWith(` ${synonym} `) : padded.includes(` ${synonym} `)
        )
    );
}

/**
 * A mixed-case line after a blank could as well open an entry. It only counts
 * as a heading when it ends in a synonym and reads like neither an entry
 * header nor a job title.
 */
function looksLikeMixedCaseHeading(line: string): boolean {
    return !ENTRY_SEPARATOR.test(line) && !looksLikeRole(line);
}

/**
 * Decide whether a line opens a section.
 *
 * @param afterBreak - the line starts the document or follows a blank line
 */
export function classifyHeading(line: string, afterBreak: boolean): HeadingMatch | undefined {
    if (isBlank(line) || isBulletLine(line)) return undefined;

    if (hasHeadingShape(line)) {
        const key = normalizeHeading(line);
        const exact = exactLabel(key);
        if (exact) return { label: exact };
        if (OTHER_HEADINGS.has(key)) return { label: "UNKNOWN" };

        let phrase: HeadingLabel | undefined;
        if (isAllCaps(line) || line.endsWith(":")) {
            phrase = phraseLabel(key);
        } else if (afterBreak && looksLikeMixedCaseHeading(line)) {
            phrase = phraseLabel(key, true);
        }
        if (phrase) return { label: phrase };
    }

    if (afterBreak) {
        const inline = line.match(/^([A-Za-z][A-Za-z &/]{1,40}?)\s*:\s*(\S.*)$/);
        if (inline) {
            const label = exactLabel(normalizeHeading(inline[1]));
            if (label) return { label, inline: inline[2].trim() };
        }
    }

    return undefined;
}

function trimBlankEdges(lines: string[]): string[] {
    let first = 0;
    let last = lines.length;
    while (first < last && isBlank(lines[first])) first++;
    while (last > first && isBlank(lines[last - 1])) last--;
    return lines.slice(first, last);
}

/**
 * Split normalized text into labeled, contiguous sections. Text before the
 * first heading is the implicit contact region.
 */
export function segmentSections(text: NormalizedText): Section[] {
    const headings: Array<{ index: number; match: HeadingMatch }> = [];
    let afterBreak = true;

    text.forEach((line, index) => {
        if (isBlank(line)) {
            afterBreak = true;
            return;
        }
        const match = classifyHeading(line, afterBreak);
        if (match) headings.push({ index, match });
        afterBreak = false;
    });

    const sections: Section[] = [];

    if (headings.length === 0) {
        if (text.length === 0) return sections;
        const contactEnd = Math.min(text.length, CONTACT_REGION_MAX_LINES);
        sections.push({ label: "CONTACT", start: 0, end: contactEnd, lines: trimBlankEdges(text.slice(0, contactEnd)) });
        if (contactEnd < text.length) {
            sections.push({ label: "UNKNOWN", start: contactEnd, end: text.length, lines: trimBlankEdges(text.slice(contactEnd)) });
        }
        return sections;
    }

    if (headings[0].index > 0) {
        const end = headings[0].index;
        sections.push({ label: "CONTACT", start: 0, end, lines: trimBlankEdges(text.slice(0, end)) });
    }

    headings.forEach(({ index, match }, position) => {
        const end = position + 1 < headings.length ? headings[position + 1].index : text.length;
        const body = text.slice(index + 1, end);
        sections.push({
            label: match.label,
            heading: match.inline === undefined ? stripBullet(text[index]).replace(/:$/, "") : text[index].split(":")[0].trim(),
            start: index,
            end,
            lines: trimBlankEdges(match.inline === undefined ? body : [match.inline, ...body]),
        });
    });

    return sections;
}

/**
 * Sections must tile the text: ordered, non-empty, non-overlapping and
 * covering every line. Anything else is a segmenter bug.
 */
export function assertSectionLayout(sections: readonly Section[], lineCount: number): void {
    let cursor = 0;
    for (const section of sections) {
        if (section.start !== cursor) {
            throw new PipelineInvariantError(
                `Section ${section.label} starts at line ${section.start}, expected ${cursor}`
            );
        }
        if (section.end <= section.start) {
            throw new PipelineInvariantError(`Section ${section.label} spans no lines (${section.start}-${section.end})`);
        }
        cursor = section.end;
    }
    if (sections.length > 0 && cursor !== lineCount) {
        throw new PipelineInvariantError(`Sections cover ${cursor} of ${lineCount} lines`);
    }
}
