import { z } from "zod";
import rawKeywords from "./heading-keywords.json";

const KeywordList = z.array(z.string().min(1)).readonly();

const HeadingKeywordTableSchema = z.object({
    en: KeywordList,
    es: KeywordList,
    fr: KeywordList,
    de: KeywordList,
    zh: KeywordList,
    ja: KeywordList,
    ko: KeywordList,
}).strict();

export type HeadingKeywordTable = z.infer<typeof HeadingKeywordTableSchema>;
export type LanguageTag = keyof HeadingKeywordTable;

/** Words meaning Chapter, Section, Part, Overview, Summary, Conclusion, Appendix */
export const HEADING_KEYWORDS: HeadingKeywordTable = HeadingKeywordTableSchema.parse(rawKeywords);

const NUMBERED_PREFIX_LENGTH = 6;
const DIGITS = /^\p{Nd}+$/u;

/**
 * Literal, case-sensitive prefix match against any language's keywords
 */
export function startsWithHeadingKeyword(
    line: string,
    table: HeadingKeywordTable = HEADING_KEYWORDS
): boolean {
    return Object.values(table).some(keywords =>
        keywords.some(keyword => line.startsWith(keyword))
    );
}

/**
 * "1.", "1.1", "2.3.4" at the start of the line: the first six characters must
 * contain a period and be nothing but digits once periods are dropped.
 * "1.1 Overview" fails ("11 Ov"), "1.1" alone passes.
 */
export function hasNumberedPrefix(line: string): boolean {
    const prefix = Array.from(line).slice(0, NUMBERED_PREFIX_LENGTH).join("");
    if (!prefix.includes(".")) return false;
    return DIGITS.test(prefix.trim().replaceAll(".", ""));
}

const UPPER = /\p{Lu}/u;
const LOWER = /\p{Ll}/u;
const TITLE = /\p{Lt}/u;

/**
 * True if the text has at least one cased character and no lowercase or titlecase ones
 */
export function isUpperCaseLine(text: string): boolean {
    let cased = false;
    for (const ch of text) {
        if (LOWER.test(ch) || TITLE.test(ch)) return false;
        if (UPPER.test(ch)) cased = true;
    }
    return cased;
}

/**
 * Title case in the conventional sense: uppercase letters only follow uncased
 * characters, lowercase letters only follow cased ones, at least one cased letter.
 * "1.1 Overview" and "Hello World" qualify, "Hello world" and "HELLO" do not.
 */
export function isTitleCaseLine(text: string): boolean {
    let cased = false;
    let previousCased = false;
    for (const ch of text) {
        if (UPPER.test(ch) || TITLE.test(ch)) {
            if (previousCased) return false;
            previousCased = true;
            cased = true;
        } else if (LOWER.test(ch)) {
            if (!previousCased) return false;
            previousCased = true;
            cased = true;
        } else {
            previousCased = false;
        }
    }
    return cased;
}

export function hasBoldFont(fontName: string): boolean {
    return fontName.toLowerCase().includes("bold");
}

/**
 * "Name: ____" style labels: a colon without a closing period
 */
export function looksLikeFormLabel(line: string): boolean {
    return line.includes(":") && !line.endsWith(".");
}
