import { describe, it, expect } from "vitest";
import {
    HEADING_KEYWORDS,
    hasBoldFont,
    hasNumberedPrefix,
    isTitleCaseLine,
    isUpperCaseLine,
    looksLikeFormLabel,
    startsWithHeadingKeyword,
} from "../rules";

describe("HEADING_KEYWORDS", () => {
    it("covers seven languages", () => {
        expect(Object.keys(HEADING_KEYWORDS)).toEqual(["en", "es", "fr", "de", "zh", "ja", "ko"]);
    });

    it("keeps the keyword order of each language", () => {
        expect(HEADING_KEYWORDS.en).toEqual([
            "Chapter", "Section", "Part", "Overview", "Summary", "Conclusion", "Appendix",
        ]);
    });
});

describe("startsWithHeadingKeyword", () => {
    it("matches an English keyword prefix", () => {
        expect(startsWithHeadingKeyword("Chapter 1: Introduction")).toBe(true);
    });

    it("is case-sensitive", () => {
        expect(startsWithHeadingKeyword("chapter one")).toBe(false);
    });

    it("matches keywords from other languages", () => {
        expect(startsWithHeadingKeyword("Capítulo 3")).toBe(true);
        expect(startsWithHeadingKeyword("Überblick der Ergebnisse")).toBe(true);
        expect(startsWithHeadingKeyword("概述")).toBe(true);
        expect(startsWithHeadingKeyword("付録 A")).toBe(true);
        expect(startsWithHeadingKeyword("부록 B")).toBe(true);
    });

    it("only matches at the start of the line", () => {
        expect(startsWithHeadingKeyword("第一章")).toBe(false);
        expect(startsWithHeadingKeyword("See Appendix B")).toBe(false);
    });

    it("uses a custom table when given", () => {
        const table = { ...HEADING_KEYWORDS, en: ["Lesson"] };
        expect(startsWithHeadingKeyword("Lesson 4", table)).toBe(true);
        expect(startsWithHeadingKeyword("Chapter 4", table)).toBe(false);
    });
});

describe("hasNumberedPrefix", () => {
    it("accepts bare section numbers", () => {
        expect(hasNumberedPrefix("1.1")).toBe(true);
        expect(hasNumberedPrefix("1.")).toBe(true);
        expect(hasNumberedPrefix("2.3.4")).toBe(true);
    });

    it("checks only the first six characters", () => {
        // "3.1415" -> "31415"
        expect(hasNumberedPrefix("3.14159 is pi")).toBe(true);
    });

    it("rejects a number followed by words within six characters", () => {
        // "1.1 Ov" -> "11 Ov"
        expect(hasNumberedPrefix("1.1 Overview")).toBe(false);
    });

    it("requires a period", () => {
        expect(hasNumberedPrefix("12345 Main Street")).toBe(false);
        expect(hasNumberedPrefix("2024")).toBe(false);
    });

    it("rejects periods without digits", () => {
        expect(hasNumberedPrefix("...")).toBe(false);
        expect(hasNumberedPrefix("")).toBe(false);
    });
});

describe("isUpperCaseLine", () => {
    it("accepts all-caps text", () => {
        expect(isUpperCaseLine("ANNUAL REPORT")).toBe(true);
        expect(isUpperCaseLine("FY2024 RESULTS")).toBe(true);
    });

    it("rejects mixed case", () => {
        expect(isUpperCaseLine("ANNUAL Report")).toBe(false);
    });

    it("rejects text without cased letters", () => {
        expect(isUpperCaseLine("2024")).toBe(false);
        expect(isUpperCaseLine("概述")).toBe(false);
    });
});

describe("isTitleCaseLine", () => {
    it("accepts capitalized words", () => {
        expect(isTitleCaseLine("Hello World")).toBe(true);
        expect(isTitleCaseLine("1.1 Overview")).toBe(true);
        expect(isTitleCaseLine("O'Neil Report")).toBe(true);
    });

    it("rejects lowercase words", () => {
        expect(isTitleCaseLine("Hello world")).toBe(false);
        expect(isTitleCaseLine("This is body text explaining things.")).toBe(false);
    });

    it("rejects uppercase letters inside a word", () => {
        expect(isTitleCaseLine("HELLO")).toBe(false);
        expect(isTitleCaseLine("McDonald")).toBe(false);
    });

    it("rejects text without cased letters", () => {
        expect(isTitleCaseLine("123")).toBe(false);
    });
});

describe("hasBoldFont", () => {
    it("matches bold anywhere in the font name, ignoring case", () => {
        expect(hasBoldFont("ABCDEF+Helvetica-Bold")).toBe(true);
        expect(hasBoldFont("Arial,BOLD")).toBe(true);
        expect(hasBoldFont("Helvetica")).toBe(false);
    });
});

describe("looksLikeFormLabel", () => {
    it("flags a colon without a closing period", () => {
        expect(looksLikeFormLabel("name: ________")).toBe(true);
    });

    it("allows colons in sentences ending with a period", () => {
        expect(looksLikeFormLabel("Note: see below.")).toBe(false);
    });

    it("ignores lines without a colon", () => {
        expect(looksLikeFormLabel("plain text")).toBe(false);
    });
});
