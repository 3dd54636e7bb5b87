import type { DateRange, ProjectEntry } from "../types/resume";
import { findDateRange, removeDateText } from "./dateRange";
import { isBlank, isBulletLine, isEntryHeaderLine, stripBullet, tidyText, wordCount } from "./heuristics";

const TECHNOLOGY_LINE = /^(?:technologies|technology|tech stack|tech|stack|built with|tools|tools used)\s*:\s*(.+)$/i;
const URL_PATTERN = /(?:https?:\/\/|www\.)[^\s|,;()]+/i;
const NAME_WITH_DESCRIPTION = /^([^:]{2,60}):\s*(.*)$/;
const FIELD_LABEL = /^(?:link|links|url|demo|repo|repository|github|website|role|description)$/i;
const MAX_NAME_WORDS = 8;

function splitTechnologies(text: string): string[] {
    return text.split(/\s*[,|;/]\s*/).map(tidyText).filter(Boolean);
}

/** "Portfolio: A static site" with a short name before the colon. */
function namedLine(line: string): RegExpMatchArray | undefined {
    const match = line.match(NAME_WITH_DESCRIPTION);
    if (!match || match[2].startsWith("//") || TECHNOLOGY_LINE.test(line)) return undefined;
    if (FIELD_LABEL.test(match[1].trim())) return undefined;
    return wordCount(match[1]) <= MAX_NAME_WORDS ? match : undefined;
}

/**
 * Blocks split at blank lines, at a header after bullets, and at every
 * "Name: description" line.
 */
export function splitProjectBlocks(lines: readonly string[]): string[][] {
    const blocks: string[][] = [];
    let current: string[] = [];

    const flush = () => {
        if (current.length > 0) blocks.push(current);
        current = [];
    };

    for (const line of lines) {
        if (isBlank(line)) {
            flush();
            continue;
        }
        const previous = current[current.length - 1];
        const afterBullets = previous !== undefined && isBulletLine(previous) && isEntryHeaderLine(line);
        const startsNamed = current.length > 0 && !isBulletLine(line) && namedLine(line) !== undefined;
        if (afterBullets || startsNamed) flush();
        current.push(line);
    }
    flush();

    return blocks;
}

interface ProjectHeading {
    name: string;
    description?: string;
    technologies: string[];
    dateRange?: DateRange;
}

/**
 * First line of a project: name plus whatever rides along with it (a
 * description after a colon, technologies after a pipe or in parentheses, a
 * date range).
 */
export function parseProjectHeading(line: string): ProjectHeading {
    let text = stripBullet(line);
    let dateRange: DateRange | undefined;

    const date = findDateRange(text);
    if (date) {
        dateRange = date.range;
        text = tidyText(removeDateText(text, date));
    }

    const named = namedLine(text);
    if (named) {
        return { name: tidyText(named[1]), description: tidyText(named[2]) || undefined, technologies: [], dateRange };
    }

    const piped = text.split(/\s+\|\s+/);
    if (piped.length >= 2) {
        return { name: tidyText(piped[0]), technologies: splitTechnologies(piped.slice(1).join(",")), dateRange };
    }

    const parenthesised = text.match(/^(.+?)\s*\(([^()]+)\)$/);
    if (parenthesised && /[,/]/.test(parenthesised[2])) {
        return { name: tidyText(parenthesised[1]), technologies: splitTechnologies(parenthesised[2]), dateRange };
    }

    return { name: tidyText(text), technologies: [], dateRange };
}

export function parseProjectBlock(block: readonly string[]): ProjectEntry {
    const [first, ...rest] = block;
    const heading = parseProjectHeading(first);

    const technologies = [...heading.technologies];
    const description: string[] = heading.description ? [heading.description] : [];
    let url = first.match(URL_PATTERN)?.[0];

    for (const line of rest) {
        const text = stripBullet(line);
        const tech = text.match(TECHNOLOGY_LINE);
        if (tech) {
            technologies.push(...splitTechnologies(tech[1]));
            continue;
        }

        const link = text.match(URL_PATTERN);
        if (link && !url) url = link[0];
        if (link && tidyText(text.replace(URL_PATTERN, "").replace(/^(?:link|url|demo|repo|github)\s*:?/i, "")) === "") {
            continue;
        }

        description.push(tidyText(text));
    }

    const seen = new Set<string>();
    const uniqueTechnologies = technologies.filter((technology) => {
        const key = technology.toLowerCase();
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });

    return {
        name: heading.name.replace(URL_PATTERN, "").trim() || heading.name,
        description: description.filter(Boolean).join(" ") || undefined,
        technologies: uniqueTechnologies,
        url,
        dateRange: heading.dateRange,
    };
}

export function extractProjects(lines: readonly string[]): ProjectEntry[] {
    return splitProjectBlocks(lines).map(parseProjectBlock);
}
