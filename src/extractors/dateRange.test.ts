import { describe, expect, it } from "vitest";
import { findDateRange, formatDatePoint, hasDateRange, parseDatePoint, parseDateRange, removeDateText } from "./dateRange";

describe("parseDateRange", () => {
    it("reads a month-year start with an open end", () => {
        expect(parseDateRange("Jan 2020 – Present")).toEqual({
            kind: "resolved",
            start: { year: 2020, month: 1 },
            end: "present",
            text: "Jan 2020 – Present",
        });
    });

    it("reads a year-only range", () => {
        expect(parseDateRange("2019 - 2021")).toEqual({
            kind: "resolved",
            start: { year: 2019 },
            end: { year: 2021 },
            text: "2019 - 2021",
        });
    });

    it("keeps a lone date as unresolved raw text", () => {
        expect(parseDateRange("March 2022")).toEqual({ kind: "unresolved", text: "March 2022" });
    });

    it("reads numeric months joined by a word", () => {
        expect(parseDateRange("03/2020 to 06/2021")).toEqual({
            kind: "resolved",
            start: { year: 2020, month: 3 },
            end: { year: 2021, month: 6 },
            text: "03/2020 to 06/2021",
        });
    });

    it("leaves a backwards range unresolved", () => {
        expect(parseDateRange("2021 - 2019")).toEqual({ kind: "unresolved", text: "2021 - 2019" });
    });

    it("returns undefined when there is no date", () => {
        expect(parseDateRange("no dates here")).toBeUndefined();
    });
});

describe("parseDatePoint", () => {
    it("rejects an impossible month", () => {
        expect(parseDatePoint("13/2020")).toBeUndefined();
    });

    it("accepts an abbreviated month with a dot", () => {
        expect(parseDatePoint("Sept. 2018")).toEqual({ year: 2018, month: 9 });
    });
});

describe("date helpers", () => {
    it("tells ranges from lone dates", () => {
        expect(hasDateRange("2018 – 2020")).toBe(true);
        expect(hasDateRange("Summer 2021")).toBe(false);
    });

    it("removes the date and the brackets around it", () => {
        const line = "Engineer (2019 - 2021)";
        const match = findDateRange(line);
        expect(match).toBeDefined();
        if (!match) return;
        expect(removeDateText(line, match).trim()).toBe("Engineer");
    });

    it("formats points", () => {
        expect(formatDatePoint({ year: 2020, month: 1 })).toBe("2020-01");
        expect(formatDatePoint({ year: 2019 })).toBe("2019");
        expect(formatDatePoint("present")).toBe("present");
    });
});
