import { describe, expect, it } from "vitest";
import type { ExperienceEntry } from "../types/resume";
import { assembleRecord } from "./resultAssembler";

describe("assembleRecord", () => {
    it("fills every list when nothing was found", () => {
        expect(assembleRecord({}, {})).toEqual({
            contact: {},
            experience: [],
            education: [],
            skills: [],
            projects: [],
            certifications: [],
            volunteering: [],
        });
    });

    it("is idempotent", () => {
        const record = assembleRecord(
            { name: "Jane Roe" },
            {
                summary: "Engineer.",
                experience: [{ employer: "Acme", responsibilities: ["Built things"] }],
                skills: [{ category: "General", skills: ["Go"] }],
            }
        );
        expect(assembleRecord(record.contact, record)).toEqual(record);
    });

    it("shares no lists with its input", () => {
        const experience: ExperienceEntry[] = [{ employer: "Acme", responsibilities: ["Built things"] }];
        const record = assembleRecord({}, { experience });
        experience[0].responsibilities.push("Changed later");
        experience.push({ responsibilities: [] });
        expect(record.experience).toEqual([{ employer: "Acme", responsibilities: ["Built things"] }]);
    });
});
