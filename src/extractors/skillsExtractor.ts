import type { SkillGroup } from "../types/resume";
import { isBlank, isBulletLine, stripBullet, tidyText, wordCount } from "./heuristics";

export const DEFAULT_SKILL_CATEGORY = "General";

const SKILL_DELIMITER = /\s*[,|;•·]\s*/;
const MAX_SUBHEADING_WORDS = 4;
const MAX_CATEGORY_WORDS = 5;

export function isDelimitedList(line: string): boolean {
    return SKILL_DELIMITER.test(stripBullet(line));
}

export function splitSkills(text: string): string[] {
    return text.split(SKILL_DELIMITER).map(tidyText).filter(Boolean);
}

/**
 * "Languages:" on its own line, or a short undelimited line that introduces a
 * delimited or bulleted list on the next line.
 */
export function isSkillSubheading(line: string, next: string | undefined): boolean {
    const text = stripBullet(line);
    if (isDelimitedList(text) || wordCount(text) > MAX_SUBHEADING_WORDS) return false;
    if (/:$/.test(text)) return true;
    if (isBulletLine(line) || next === undefined || isBlank(next)) return false;
    return isBulletLine(next) || isDelimitedList(next);
}

/**
 * Group skills by sub-heading; flat lists land in the default category.
 * Duplicates are dropped case-insensitively, keeping the first spelling.
 */
export function extractSkills(lines: readonly string[]): SkillGroup[] {
    const groups = new Map<string, { category: string; skills: string[]; seen: Set<string> }>();
    let currentCategory = DEFAULT_SKILL_CATEGORY;

    const add = (category: string, skills: string[]) => {
        const key = category.toLowerCase();
        let group = groups.get(key);
        if (!group) {
            group = { category, skills: [], seen: new Set() };
            groups.set(key, group);
        }
        for (const skill of skills) {
            const folded = skill.toLowerCase();
            if (group.seen.has(folded)) continue;
            group.seen.add(folded);
            group.skills.push(skill);
        }
    };

    lines.forEach((line, index) => {
        if (isBlank(line)) {
            currentCategory = DEFAULT_SKILL_CATEGORY;
            return;
        }

        const text = stripBullet(line);
        const labeled = text.match(/^([^:]{1,40}):\s*(.+)$/);
        if (labeled && wordCount(labeled[1]) <= MAX_CATEGORY_WORDS) {
            add(tidyText(labeled[1]), splitSkills(labeled[2]));
            return;
        }

        if (isSkillSubheading(line, lines[index + 1])) {
            currentCategory = tidyText(text.replace(/:$/, ""));
            return;
        }

        add(currentCategory, splitSkills(text));
    });

    return [...groups.values()]
        .filter((group) => group.skills.length > 0)
        .map(({ category, skills }) => ({ category, skills }));
}
