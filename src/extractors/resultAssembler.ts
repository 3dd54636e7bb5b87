import type { ContactInfo, CVRecord, SectionEntries } from "../types/resume";

/**
 * Build the final record. Every list is copied and present; the result shares
 * no arrays with its inputs.
 */
export function assembleRecord(contact: ContactInfo, entries: Partial<SectionEntries>): CVRecord {
    const record: CVRecord = {
        contact: { ...contact },
        experience: (entries.experience ?? []).map((entry) => ({
            ...entry,
            responsibilities: [...entry.responsibilities],
        })),
        education: (entries.education ?? []).map((entry) => ({ ...entry, details: [...entry.details] })),
        skills: (entries.skills ?? []).map((group) => ({ ...group, skills: [...group.skills] })),
        projects: (entries.projects ?? []).map((project) => ({
            ...project,
            technologies: [...project.technologies],
        })),
        certifications: (entries.certifications ?? []).map((certification) => ({ ...certification })),
        volunteering: (entries.volunteering ?? []).map((entry) => ({ ...entry, details: [...entry.details] })),
    };

    if (entries.summary) record.summary = entries.summary;
    return record;
}
