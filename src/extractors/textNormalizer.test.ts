import { describe, expect, it } from "vitest";
import { normalizeText } from "./textNormalizer";

describe("normalizeText", () => {
    it("returns no lines for empty or blank input", () => {
        expect(normalizeText("")).toEqual([]);
        expect(normalizeText("  \n\t\n")).toEqual([]);
    });

    it("unifies line endings and bullet glyphs", () => {
        expect(normalizeText("Header\r\n• Built things\r\n* Shipped code")).toEqual([
            "Header",
            "- Built things",
            "- Shipped code",
        ]);
    });

    it("drops a bullet with nothing after it", () => {
        expect(normalizeText("A\n•\nB")).toEqual(["A", "", "B"]);
    });

    it("rejoins a sentence the layout wrapped", () => {
        expect(normalizeText("Led a team that built\nthe billing platform.")).toEqual([
            "Led a team that built the billing platform.",
        ]);
    });

    it("does not join a lowercase list onto its heading", () => {
        expect(normalizeText("Skills\npython, go, sql")).toEqual(["Skills", "python, go, sql"]);
    });

    it("does not join an email onto the name above it", () => {
        expect(normalizeText("John Doe\njohn@x.com")).toEqual(["John Doe", "john@x.com"]);
    });

    it("squeezes blank runs and trims blank edges", () => {
        expect(normalizeText("\n\nA\n\n\n\nB\n\n")).toEqual(["A", "", "B"]);
    });

    it("strips invisible characters and collapses whitespace", () => {
        expect(normalizeText("Jo\u200Bhn\u00A0Doe\nPython\t\tGo")).toEqual(["John Doe", "Python Go"]);
    });
});
