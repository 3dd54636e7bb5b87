export interface YearMonth {
    year: number;
    month?: number;
}

export type DateRange =
    | {
        kind: "resolved";
        start: YearMonth;
        end: YearMonth | "present";
        text: string;
    }
    | {
        kind: "unresolved";
        text: string;
    };

export interface ContactInfo {
    name?: string;
    title?: string;
    location?: string;
    email?: string;
    phone?: string;
    linkedin?: string;
    github?: string;
    website?: string;
}

export interface ExperienceEntry {
    employer?: string;
    title?: string;
    location?: string;
    dateRange?: DateRange;
    responsibilities: string[];
}

export interface EducationEntry {
    institution?: string;
    degree?: string;
    fieldOfStudy?: string;
    location?: string;
    dateRange?: DateRange;
    details: string[];
}

export interface VolunteeringEntry {
    organization?: string;
    role?: string;
    location?: string;
    dateRange?: DateRange;
    details: string[];
}

export interface SkillGroup {
    category: string;
    skills: string[];
}

export interface ProjectEntry {
    name: string;
    description?: string;
    technologies: string[];
    url?: string;
    dateRange?: DateRange;
}

export interface CertificationEntry {
    name: string;
    issuer?: string;
    date?: string;
    issued?: YearMonth;
}

/**
 * Everything the pipeline pulls out of the section bodies.
 */
export interface SectionEntries {
    summary?: string;
    experience: ExperienceEntry[];
    education: EducationEntry[];
    skills: SkillGroup[];
    projects: ProjectEntry[];
    certifications: CertificationEntry[];
    volunteering: VolunteeringEntry[];
}

/**
 * The structured record returned to API callers. Lists are always present.
 */
export interface CVRecord extends SectionEntries {
    contact: ContactInfo;
}

export interface ParseFailure {
    reason: "decode_failed";
    message: string;
}

export type ParseOutcome =
    | {
        success: true;
        data: CVRecord;
        fingerprint: string;
        cached: boolean;
    }
    | {
        success: false;
        failure: ParseFailure;
    };
