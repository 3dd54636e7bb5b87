import type { ContactInfo } from "../types/resume";
import { hasDateRange } from "./dateRange";
import { isBlank, looksLikeRole, stripBullet, tidyText, wordCount } from "./heuristics";
import type { Section } from "./sectionSegmenter";

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE_PATTERN = /(?:\+\d{1,3}[\s.-]?)?(?:\(\d{1,4}\)[\s.-]?)?\d{2,4}(?:[\s.-]?\d{2,5}){1,4}/;
const LINKEDIN_PATTERN = /(?:https?:\/\/)?(?:[a-z]{2,3}\.)?linkedin\.com\/in\/[A-Za-z0-9_-]+\/?/i;
const GITHUB_PATTERN = /(?:https?:\/\/)?(?:www\.)?github\.com\/[A-Za-z0-9_-]+\/?/i;
const WEBSITE_PATTERN = /(?:https?:\/\/|www\.)[^\s|,;]+/i;
const LOCATION_PATTERN = /^[A-Z][A-Za-z.'-]+(?: [A-Z][A-Za-z.'-]+)*, ?[A-Z][A-Za-z.'-]+(?: [A-Z][A-Za-z.'-]+)*$/;
const LABELED_LOCATION = /^(?:location|address|based in)\s*:\s*(.+)$/i;
const FIELD_LABEL = /^(?:e-?mail|phone|mobile|tel|cell|linkedin|github|website|portfolio)\s*:\s*/i;

const MIN_PHONE_DIGITS = 8;
const MAX_PHONE_DIGITS = 15;
const MAX_NAME_WORDS = 6;

/** Split a contact line on the separators people put between fields. */
export function contactSegments(line: string): string[] {
    return stripBullet(line)
        .split(/\s+[|•·]\s+|\s+[-–—]\s+/)
        .map((segment) => segment.trim())
        .filter(Boolean);
}

export function findEmail(text: string): string | undefined {
    return text.match(EMAIL_PATTERN)?.[0];
}

/**
 * Phone numbers need 8-15 digits and must not be a date range in disguise.
 */
export function findPhone(text: string): string | undefined {
    const match = text
        .replace(EMAIL_PATTERN, " ")
        .replace(LINKEDIN_PATTERN, " ")
        .replace(GITHUB_PATTERN, " ")
        .replace(WEBSITE_PATTERN, " ")
        .match(PHONE_PATTERN);
    if (!match) return undefined;

    const candidate = match[0].trim();
    const digits = candidate.replace(/\D/g, "").length;
    if (digits < MIN_PHONE_DIGITS || digits > MAX_PHONE_DIGITS) return undefined;
    if (hasDateRange(candidate)) return undefined;
    return candidate;
}

export function findLinkedin(text: string): string | undefined {
    return text.match(LINKEDIN_PATTERN)?.[0];
}

export function findGithub(text: string): string | undefined {
    return text.match(GITHUB_PATTERN)?.[0];
}

export function findWebsite(text: string): string | undefined {
    const match = text.match(WEBSITE_PATTERN)?.[0];
    if (!match || LINKEDIN_PATTERN.test(match) || GITHUB_PATTERN.test(match)) return undefined;
    return match.replace(/[.)]+$/, "");
}

export function matchesContactPattern(text: string): boolean {
    return [findEmail, findPhone, findLinkedin, findGithub, findWebsite].some((find) => find(text) !== undefined);
}

/**
 * The name is the opening segment of a contact region, provided nothing else
 * claims it and it carries no digits.
 */
export function looksLikeName(segment: string): boolean {
    if (/\d/.test(segment) || segment.includes("@") || /https?:|www\./i.test(segment)) return false;
    if (FIELD_LABEL.test(segment) || LABELED_LOCATION.test(segment)) return false;
    if (wordCount(segment) > MAX_NAME_WORDS || /[.!?:;]$/.test(segment)) return false;
    return /[A-Za-z]/.test(segment) && !matchesContactPattern(segment);
}

export function findLocation(segment: string): string | undefined {
    const labeled = segment.match(LABELED_LOCATION);
    if (labeled) return tidyText(labeled[1]);
    if (looksLikeRole(segment)) return undefined;
    return LOCATION_PATTERN.test(segment) ? segment : undefined;
}

function firstMatch(lines: readonly string[], find: (text: string) => string | undefined): string | undefined {
    for (const line of lines) {
        const found = find(line);
        if (found !== undefined) return found;
    }
    return undefined;
}

/**
 * Pull contact details out of the contact sections. Email and profile links
 * fall back to the rest of the document when the contact region has none.
 */
export function extractContact(sections: readonly Section[]): ContactInfo {
    const contactSections = sections.filter((section) => section.label === "CONTACT");
    const contactLines = contactSections.flatMap((section) => section.lines).filter((line) => !isBlank(line));
    const otherLines = sections
        .filter((section) => section.label !== "CONTACT")
        .flatMap((section) => section.lines)
        .filter((line) => !isBlank(line));

    const contact: ContactInfo = {};

    let nameSegment: string | undefined;
    for (const section of contactSections) {
        const firstLine = section.lines.find((line) => !isBlank(line));
        const segment = firstLine ? contactSegments(firstLine)[0] : undefined;
        if (segment && looksLikeName(segment)) {
            nameSegment = segment;
            contact.name = tidyText(segment);
            break;
        }
    }

    const segments = contactLines.flatMap(contactSegments).filter((segment) => segment !== nameSegment);

    const title = segments.find(
        (segment) => looksLikeRole(segment) && !matchesContactPattern(segment) && wordCount(segment) <= 8
    );
    if (title) contact.title = tidyText(title);

    const location = firstMatch(segments, findLocation);
    if (location) contact.location = location;

    const email = firstMatch(contactLines, findEmail) ?? firstMatch(otherLines, findEmail);
    if (email) contact.email = email;

    const phone = firstMatch(segments, findPhone);
    if (phone) contact.phone = phone;

    const linkedin = firstMatch(contactLines, findLinkedin) ?? firstMatch(otherLines, findLinkedin);
    if (linkedin) contact.linkedin = linkedin;

    const github = firstMatch(contactLines, findGithub) ?? firstMatch(otherLines, findGithub);
    if (github) contact.github = github;

    const website = firstMatch(segments, findWebsite);
    if (website) contact.website = website;

    return contact;
}
