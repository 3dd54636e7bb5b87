import type { CVRecord, SectionEntries } from "../types/resume";
import { extractCertifications } from "./certificationExtractor";
import { extractContact, matchesContactPattern } from "./contactExtractor";
import {
    dedupeCertifications,
    dedupeEducation,
    dedupeExperience,
    dedupeProjects,
    dedupeSkillGroups,
    dedupeVolunteering,
} from "./deduplicator";
import { extractEducation, extractExperience, extractVolunteering } from "./entryExtractor";
import { isBlank, isBulletLine, isEntryHeaderLine, stripBullet, tidyText } from "./heuristics";
import { extractProjects } from "./projectExtractor";
import { assembleRecord } from "./resultAssembler";
import { assertSectionLayout, segmentSections } from "./sectionSegmenter";
import type { Section, SectionLabel } from "./sectionSegmenter";
import { extractSkills } from "./skillsExtractor";
import { normalizeText } from "./textNormalizer";

type Collected = Required<SectionEntries>;
type SectionHandler = (lines: readonly string[], into: Collected) => void;
type BodyLabel = Exclude<SectionLabel, "CONTACT" | "UNKNOWN">;

/**
 * Which extractor reads which section. Contact details are read across the
 * whole document, and unknown sections are ignored.
 */
const SECTION_HANDLERS: Record<BodyLabel, SectionHandler> = {
    SUMMARY: (lines, into) => {
        if (into.summary) return;
        into.summary = joinSummary(lines);
    },
    EXPERIENCE: (lines, into) => {
        into.experience.push(...extractExperience(lines));
    },
    EDUCATION: (lines, into) => {
        into.education.push(...extractEducation(lines));
    },
    SKILLS: (lines, into) => {
        into.skills.push(...extractSkills(lines));
    },
    PROJECTS: (lines, into) => {
        into.projects.push(...extractProjects(lines));
    },
    CERTIFICATIONS: (lines, into) => {
        into.certifications.push(...extractCertifications(lines));
    },
    VOLUNTEERING: (lines, into) => {
        into.volunteering.push(...extractVolunteering(lines));
    },
};

function joinSummary(lines: readonly string[]): string {
    return tidyText(lines.filter((line) => !isBlank(line)).map(stripBullet).join(" "));
}

/**
 * Sentences in the region above the first heading, past the name and contact
 * lines. Used when the CV has no summary section of its own.
 */
export function preambleSummary(sections: readonly Section[]): string {
    const preamble = sections[0];
    if (preamble?.label !== "CONTACT") return "";
    return joinSummary(
        preamble.lines.filter(
            (line) => !isBlank(line) && !isBulletLine(line) && !isEntryHeaderLine(line) && !matchesContactPattern(line)
        )
    );
}

/**
 * Turn the plain text of a CV into a structured record. Never throws on odd
 * input; a `PipelineInvariantError` means a bug in the segmenter.
 */
export function extractDataFromText(text: string): CVRecord {
    const lines = normalizeText(text);
    if (lines.length === 0) return assembleRecord({}, {});

    const sections = segmentSections(lines);
    assertSectionLayout(sections, lines.length);

    const contact = extractContact(sections);
    const collected: Collected = {
        summary: "",
        experience: [],
        education: [],
        skills: [],
        projects: [],
        certifications: [],
        volunteering: [],
    };

    for (const section of sections) {
        if (section.label === "CONTACT" || section.label === "UNKNOWN") continue;
        SECTION_HANDLERS[section.label](section.lines, collected);
    }

    return assembleRecord(contact, {
        summary: collected.summary || preambleSummary(sections) || undefined,
        experience: dedupeExperience(collected.experience),
        education: dedupeEducation(collected.education),
        skills: dedupeSkillGroups(collected.skills),
        projects: dedupeProjects(collected.projects),
        certifications: dedupeCertifications(collected.certifications),
        volunteering: dedupeVolunteering(collected.volunteering),
    });
}
