import { describe, expect, it } from "vitest";
import {
    foldKey,
    hasHeadingShape,
    isEntryHeaderLine,
    isKnownHeading,
    isLineContinuation,
    looksLikeDegree,
    looksLikeInstitution,
    looksLikeOrganization,
    looksLikeRole,
    tidyText,
} from "./heuristics";

describe("isLineContinuation", () => {
    it("joins a lowercase line onto an unfinished one", () => {
        expect(isLineContinuation("Built the", "new site")).toBe(true);
    });

    it("stops at terminal punctuation", () => {
        expect(isLineContinuation("Done.", "next")).toBe(false);
    });

    it("never continues a section heading", () => {
        expect(isLineContinuation("Skills", "python, go, sql")).toBe(false);
        expect(isLineContinuation("WORK HISTORY", "various roles")).toBe(false);
    });

    it("never continues with an email or a link", () => {
        expect(isLineContinuation("John Doe", "john@x.com")).toBe(false);
        expect(isLineContinuation("see", "www.site.com")).toBe(false);
    });
});

describe("isKnownHeading", () => {
    it("matches listed headings in any case", () => {
        expect(isKnownHeading("Skills")).toBe(true);
        expect(isKnownHeading("HOBBIES & INTERESTS")).toBe(true);
    });

    it("rejects other short lines", () => {
        expect(isKnownHeading("Built the")).toBe(false);
        expect(isKnownHeading("skills")).toBe(false);
    });
});

describe("hasHeadingShape", () => {
    it("accepts short capitalised lines", () => {
        expect(hasHeadingShape("Experience")).toBe(true);
        expect(hasHeadingShape("skills:")).toBe(true);
    });

    it("rejects sentences and lines with digits", () => {
        expect(hasHeadingShape("Worked on 3 projects")).toBe(false);
        expect(hasHeadingShape("this is a sentence.")).toBe(false);
    });
});

describe("keyword predicates", () => {
    it("recognises roles, organizations, institutions and degrees", () => {
        expect(looksLikeRole("Senior Software Engineer")).toBe(true);
        expect(looksLikeOrganization("Acme Corp.")).toBe(true);
        expect(looksLikeInstitution("State University")).toBe(true);
        expect(looksLikeDegree("Bachelor of Science")).toBe(true);
        expect(looksLikeRole("Acme Corp")).toBe(false);
    });
});

describe("text helpers", () => {
    it("trims dangling separators", () => {
        expect(tidyText("  - Acme Corp |  ")).toBe("Acme Corp");
    });

    it("folds case and whitespace", () => {
        expect(foldKey("  ACME   Corp ")).toBe("acme corp");
        expect(foldKey(undefined)).toBe("");
    });

    it("treats bullets and long sentences as non-headers", () => {
        expect(isEntryHeaderLine("Software Engineer at Acme Corp")).toBe(true);
        expect(isEntryHeaderLine("- Built things")).toBe(false);
    });
});
