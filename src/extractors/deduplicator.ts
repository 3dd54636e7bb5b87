import type {
    CertificationEntry,
    DateRange,
    EducationEntry,
    ExperienceEntry,
    ProjectEntry,
    SkillGroup,
    VolunteeringEntry,
} from "../types/resume";
import { endIndex, startIndex } from "./dateRange";
import { foldKey, tidyText } from "./heuristics";

export interface DedupeStrategy<T> {
    /** Case-folded identity; an empty key never matches. */
    key(entry: T): string;
    /** Do two same-key entries describe the same thing in time? */
    sameEvent(a: T, b: T): boolean;
    /** Number of optional fields that are filled in. */
    completeness(entry: T): number;
    detailCount(entry: T): number;
    /** Keep `winner`, fill its gaps from `loser`, union the detail lists. */
    merge(winner: T, loser: T): T;
    /** Spell the identity fields of `merged` the way `first` did. */
    display(merged: T, first: T): T;
}

/**
 * Ranges overlap, or neither side has a resolved range.
 */
export function datesCompatible(a: DateRange | undefined, b: DateRange | undefined): boolean {
    const left = a?.kind === "resolved" ? a : undefined;
    const right = b?.kind === "resolved" ? b : undefined;
    if (!left && !right) return true;
    if (!left || !right) return false;
    return startIndex(left.start) <= endIndex(right.end) && startIndex(right.start) <= endIndex(left.end);
}

/** Union two text lists in order, comparing case- and whitespace-insensitively. */
export function unionText(first: readonly string[], second: readonly string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const item of [...first, ...second]) {
        const key = foldKey(item);
        if (!key || seen.has(key)) continue;
        seen.add(key);
        result.push(item);
    }
    return result;
}

function identity(...parts: Array<string | undefined>): string {
    const folded = parts.map(foldKey);
    return folded.some(Boolean) ? folded.join("|") : "";
}

function filled(...values: unknown[]): number {
    return values.filter((value) => value !== undefined && value !== "").length;
}

function tidyOptional(value: string | undefined): string | undefined {
    if (value === undefined) return undefined;
    return tidyText(value) || undefined;
}

function tidyList(values: readonly string[]): string[] {
    return values.map(tidyText).filter(Boolean);
}

/**
 * Collapse duplicates, keeping the more complete entry where the first
 * occurrence stood, under the first occurrence's spelling. Ties go to the
 * earlier entry.
 */
export function dedupeEntries<T>(entries: readonly T[], strategy: DedupeStrategy<T>): T[] {
    const result: T[] = [];

    for (const entry of entries) {
        const key = strategy.key(entry);
        const index = key
            ? result.findIndex((kept) => strategy.key(kept) === key && strategy.sameEvent(kept, entry))
            : -1;

        if (index === -1) {
            result.push(entry);
            continue;
        }

        const kept = result[index];
        const entryWins =
            strategy.completeness(entry) > strategy.completeness(kept) ||
            (strategy.completeness(entry) === strategy.completeness(kept) &&
                strategy.detailCount(entry) > strategy.detailCount(kept));
        const merged = entryWins ? strategy.merge(entry, kept) : strategy.merge(kept, entry);
        result[index] = strategy.display(merged, kept);
    }

    return result;
}

const experienceStrategy: DedupeStrategy<ExperienceEntry> = {
    key: (entry) => identity(entry.employer, entry.title),
    sameEvent: (a, b) => datesCompatible(a.dateRange, b.dateRange),
    completeness: (entry) => filled(entry.employer, entry.title, entry.location, entry.dateRange),
    detailCount: (entry) => entry.responsibilities.length,
    merge: (winner, loser) => ({
        employer: winner.employer ?? loser.employer,
        title: winner.title ?? loser.title,
        location: winner.location ?? loser.location,
        dateRange: winner.dateRange ?? loser.dateRange,
        responsibilities: unionText(winner.responsibilities, loser.responsibilities),
    }),
    display: (merged, first) => ({ ...merged, employer: first.employer ?? merged.employer, title: first.title ?? merged.title }),
};

const educationStrategy: DedupeStrategy<EducationEntry> = {
    key: (entry) => identity(entry.institution, entry.degree),
    sameEvent: (a, b) => datesCompatible(a.dateRange, b.dateRange),
    completeness: (entry) => filled(entry.institution, entry.degree, entry.fieldOfStudy, entry.location, entry.dateRange),
    detailCount: (entry) => entry.details.length,
    merge: (winner, loser) => ({
        institution: winner.institution ?? loser.institution,
        degree: winner.degree ?? loser.degree,
        fieldOfStudy: winner.fieldOfStudy ?? loser.fieldOfStudy,
        location: winner.location ?? loser.location,
        dateRange: winner.dateRange ?? loser.dateRange,
        details: unionText(winner.details, loser.details),
    }),
    display: (merged, first) => ({
        ...merged,
        institution: first.institution ?? merged.institution,
        degree: first.degree ?? merged.degree,
    }),
};

const volunteeringStrategy: DedupeStrategy<VolunteeringEntry> = {
    key: (entry) => identity(entry.organization, entry.role),
    sameEvent: (a, b) => datesCompatible(a.dateRange, b.dateRange),
    completeness: (entry) => filled(entry.organization, entry.role, entry.location, entry.dateRange),
    detailCount: (entry) => entry.details.length,
    merge: (winner, loser) => ({
        organization: winner.organization ?? loser.organization,
        role: winner.role ?? loser.role,
        location: winner.location ?? loser.location,
        dateRange: winner.dateRange ?? loser.dateRange,
        details: unionText(winner.details, loser.details),
    }),
    display: (merged, first) => ({
        ...merged,
        organization: first.organization ?? merged.organization,
        role: first.role ?? merged.role,
    }),
};

const projectStrategy: DedupeStrategy<ProjectEntry> = {
    key: (entry) => identity(entry.name),
    sameEvent: (a, b) => datesCompatible(a.dateRange, b.dateRange),
    completeness: (entry) => filled(entry.description, entry.url, entry.dateRange),
    detailCount: (entry) => entry.technologies.length,
    merge: (winner, loser) => ({
        name: winner.name,
        description: winner.description ?? loser.description,
        technologies: unionText(winner.technologies, loser.technologies),
        url: winner.url ?? loser.url,
        dateRange: winner.dateRange ?? loser.dateRange,
    }),
    display: (merged, first) => ({ ...merged, name: first.name }),
};

const certificationStrategy: DedupeStrategy<CertificationEntry> = {
    key: (entry) => identity(entry.name, entry.issuer),
    sameEvent: (a, b) => a.date === undefined || b.date === undefined || foldKey(a.date) === foldKey(b.date),
    completeness: (entry) => filled(entry.issuer, entry.date),
    detailCount: () => 0,
    merge: (winner, loser) => ({
        name: winner.name,
        issuer: winner.issuer ?? loser.issuer,
        date: winner.date ?? loser.date,
        issued: winner.issued ?? loser.issued,
    }),
    display: (merged, first) => ({ ...merged, name: first.name, issuer: first.issuer ?? merged.issuer }),
};

export function dedupeExperience(entries: readonly ExperienceEntry[]): ExperienceEntry[] {
    const tidied = entries.map((entry) => ({
        ...entry,
        employer: tidyOptional(entry.employer),
        title: tidyOptional(entry.title),
        location: tidyOptional(entry.location),
        responsibilities: tidyList(entry.responsibilities),
    }));
    return dedupeEntries(tidied, experienceStrategy);
}

export function dedupeEducation(entries: readonly EducationEntry[]): EducationEntry[] {
    const tidied = entries.map((entry) => ({
        ...entry,
        institution: tidyOptional(entry.institution),
        degree: tidyOptional(entry.degree),
        fieldOfStudy: tidyOptional(entry.fieldOfStudy),
        location: tidyOptional(entry.location),
        details: tidyList(entry.details),
    }));
    return dedupeEntries(tidied, educationStrategy);
}

export function dedupeVolunteering(entries: readonly VolunteeringEntry[]): VolunteeringEntry[] {
    const tidied = entries.map((entry) => ({
        ...entry,
        organization: tidyOptional(entry.organization),
        role: tidyOptional(entry.role),
        location: tidyOptional(entry.location),
        details: tidyList(entry.details),
    }));
    return dedupeEntries(tidied, volunteeringStrategy);
}

export function dedupeProjects(entries: readonly ProjectEntry[]): ProjectEntry[] {
    const tidied = entries.map((entry) => ({
        ...entry,
        name: tidyText(entry.name) || entry.name,
        description: tidyOptional(entry.description),
        technologies: tidyList(entry.technologies),
    }));
    return dedupeEntries(tidied, projectStrategy);
}

export function dedupeCertifications(entries: readonly CertificationEntry[]): CertificationEntry[] {
    const tidied = entries.map((entry) => ({
        ...entry,
        name: tidyText(entry.name) || entry.name,
        issuer: tidyOptional(entry.issuer),
    }));
    return dedupeEntries(tidied, certificationStrategy);
}

/**
 * Merge groups that share a category; skills union case-insensitively.
 */
export function dedupeSkillGroups(groups: readonly SkillGroup[]): SkillGroup[] {
    const merged = new Map<string, SkillGroup>();
    for (const group of groups) {
        const category = tidyText(group.category) || group.category;
        const key = category.toLowerCase();
        const existing = merged.get(key);
        const skills = tidyList(group.skills);
        merged.set(key, existing
            ? { category: existing.category, skills: unionText(existing.skills, skills) }
            : { category, skills: unionText([], skills) });
    }
    return [...merged.values()].filter((group) => group.skills.length > 0);
}
