import type { DateRange, YearMonth } from "../types/resume";

const MONTHS: ReadonlyArray<readonly [RegExp, number]> = [
    [/^jan/i, 1],
    [/^feb/i, 2],
    [/^mar/i, 3],
    [/^apr/i, 4],
    [/^may/i, 5],
    [/^jun/i, 6],
    [/^jul/i, 7],
    [/^aug/i, 8],
    [/^sep/i, 9],
    [/^oct/i, 10],
    [/^nov/i, 11],
    [/^dec/i, 12],
];

const MONTH_NAME =
    "(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?";
const YEAR = "(?:19|20)\\d{2}";
const DATE_POINT = `(?:${MONTH_NAME},?\\s+${YEAR}|\\b\\d{1,2}[/.-]${YEAR}|${YEAR})`;
const OPEN_END = "(?:present|current|now|ongoing)";
const RANGE_SEPARATOR = "(?:\\s*[-–—~]\\s*|\\s+(?:to|until|till)\\s+)";

const RANGE_PATTERN = new RegExp(`\\b(${DATE_POINT})${RANGE_SEPARATOR}(${DATE_POINT}|${OPEN_END})\\b`, "i");
const POINT_PATTERN = new RegExp(`\\b${DATE_POINT}\\b`, "i");
const OPEN_END_PATTERN = new RegExp(`^${OPEN_END}$`, "i");

/**
 * Where a date (range) sits inside a line.
 */
export interface DateMatch {
    range: DateRange;
    index: number;
    length: number;
}

/**
 * Resolve one endpoint: "March 2022", "Mar. 2022", "03/2022" or "2022".
 */
export function parseDatePoint(text: string): YearMonth | undefined {
    const value = text.trim();

    const named = value.match(new RegExp(`^(${MONTH_NAME}),?\\s+(${YEAR})$`, "i"));
    if (named) {
        const month = MONTHS.find(([pattern]) => pattern.test(named[1]));
        return month ? { year: Number(named[2]), month: month[1] } : undefined;
    }

    const numeric = value.match(new RegExp(`^(\\d{1,2})[/.-](${YEAR})$`));
    if (numeric) {
        const month = Number(numeric[1]);
        return month >= 1 && month <= 12 ? { year: Number(numeric[2]), month } : undefined;
    }

    const yearOnly = value.match(new RegExp(`^(${YEAR})$`));
    return yearOnly ? { year: Number(yearOnly[1]) } : undefined;
}

/** First month covered by the point, as a month index. */
export function startIndex(point: YearMonth): number {
    return point.year * 12 + (point.month ?? 1) - 1;
}

/** Last month covered by the point, as a month index. */
export function endIndex(point: YearMonth | "present"): number {
    if (point === "present") return Number.POSITIVE_INFINITY;
    return point.year * 12 + (point.month ?? 12) - 1;
}

function resolveRange(text: string, startText: string, endText: string): DateRange {
    const start = parseDatePoint(startText);
    const end = OPEN_END_PATTERN.test(endText.trim()) ? "present" : parseDatePoint(endText);

    if (!start || !end || startIndex(start) > endIndex(end)) {
        return { kind: "unresolved", text };
    }
    return { kind: "resolved", start, end, text };
}

/**
 * Locate the first date range in a line. A lone date is returned as an
 * unresolved range so the text survives.
 */
export function findDateRange(line: string): DateMatch | undefined {
    const range = line.match(RANGE_PATTERN);
    if (range && range.index !== undefined) {
        return {
            range: resolveRange(range[0], range[1], range[2]),
            index: range.index,
            length: range[0].length,
        };
    }

    const point = line.match(POINT_PATTERN);
    if (point && point.index !== undefined) {
        return {
            range: { kind: "unresolved", text: point[0] },
            index: point.index,
            length: point[0].length,
        };
    }

    return undefined;
}

/**
 * Parse a date-range string such as "Jan 2020 – Present" or "2019 - 2021".
 * Returns undefined only when the text holds no date at all.
 */
export function parseDateRange(text: string): DateRange | undefined {
    return findDateRange(text.trim())?.range;
}

/** Does the line carry a full date range (not just a lone date)? */
export function hasDateRange(line: string): boolean {
    return RANGE_PATTERN.test(line);
}

/** Remove the matched date text from its line. */
export function removeDateText(line: string, match: DateMatch): string {
    return `${line.slice(0, match.index)} ${line.slice(match.index + match.length)}`
        .replace(/\(\s*\)|\[\s*\]/g, " ");
}

/** "2020-01", "2019" or "present". */
export function formatDatePoint(point: YearMonth | "present"): string {
    if (point === "present") return "present";
    return point.month === undefined
        ? String(point.year)
        : `${point.year}-${String(point.month).padStart(2, "0")}`;
}
