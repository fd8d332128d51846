import type { HeadingLevel } from "../types";
import { FontSizeHistogram, TITLE_SIZE_RATIO } from "../stats/font-histogram";
import { MAX_LINE_LENGTH } from "../extraction/lines";
import { charLength, countWords } from "../utils/shared";
import {
    HEADING_KEYWORDS,
    hasBoldFont,
    hasNumberedPrefix,
    isTitleCaseLine,
    isUpperCaseLine,
    looksLikeFormLabel,
    startsWithHeadingKeyword,
    type HeadingKeywordTable,
} from "./rules";

export interface ClassifierConfig {
    /** Lines longer than this are body text */
    maxLineLength?: number;
    maxUpperCaseWords?: number;
    maxTitleCaseWords?: number;
    /** Word limit for short lines at or above the average size */
    maxLargeFontWords?: number;
    maxBoldWords?: number;
    /** Fractions of the largest observed size */
    h1Ratio?: number;
    h2Ratio?: number;
    titleRatio?: number;
    keywords?: HeadingKeywordTable;
}

export const DEFAULT_CLASSIFIER_CONFIG: Required<ClassifierConfig> = {
    maxLineLength: MAX_LINE_LENGTH,
    maxUpperCaseWords: 6,
    maxTitleCaseWords: 8,
    maxLargeFontWords: 5,
    maxBoldWords: 8,
    h1Ratio: 0.9,
    h2Ratio: 0.8,
    titleRatio: TITLE_SIZE_RATIO,
    keywords: HEADING_KEYWORDS,
};

export type HeadingRule =
    | "keyword"
    | "numbered"
    | "uppercase"
    | "titlecase"
    | "large-font"
    | "bold";

export type RejectReason = "length" | "form-label" | "no-match";

export type Classification =
    | { heading: true; rule: HeadingRule }
    | { heading: false; reason: RejectReason };

/**
 * Rule-based heading detection over a document's running font statistics.
 *
 * Classifying a line records its size in the histogram, so the average used by
 * the large-font rule moves as the document is read. Results depend on line order.
 */
export class HeadingClassifier {
    private readonly config: Required<ClassifierConfig>;

    constructor(
        private readonly histogram: FontSizeHistogram,
        config: ClassifierConfig = {}
    ) {
        this.config = { ...DEFAULT_CLASSIFIER_CONFIG, ...config };
    }

    /**
     * First matching rule wins; there is no scoring
     */
    classify(line: string, fontSize: number, fontName: string): Classification {
        const cfg = this.config;

        if (line.length === 0 || charLength(line) > cfg.maxLineLength) {
            return { heading: false, reason: "length" };
        }

        this.histogram.observe(fontSize);

        if (startsWithHeadingKeyword(line, cfg.keywords)) {
            return { heading: true, rule: "keyword" };
        }
        if (hasNumberedPrefix(line)) {
            return { heading: true, rule: "numbered" };
        }

        const words = countWords(line);

        if (isUpperCaseLine(line) && words <= cfg.maxUpperCaseWords) {
            return { heading: true, rule: "uppercase" };
        }
        if (isTitleCaseLine(line) && words <= cfg.maxTitleCaseWords) {
            return { heading: true, rule: "titlecase" };
        }
        if (words <= cfg.maxLargeFontWords && fontSize >= this.histogram.averageSize()) {
            return { heading: true, rule: "large-font" };
        }
        if (hasBoldFont(fontName) && words <= cfg.maxBoldWords) {
            return { heading: true, rule: "bold" };
        }
        if (looksLikeFormLabel(line)) {
            return { heading: false, reason: "form-label" };
        }
        return { heading: false, reason: "no-match" };
    }

    isHeading(line: string, fontSize: number, fontName: string): boolean {
        return this.classify(line, fontSize, fontName).heading;
    }

    determineLevel(size: number): HeadingLevel {
        if (this.histogram.isEmpty()) return "H3";

        const largest = this.histogram.largestSize();
        if (size >= largest * this.config.h1Ratio) return "H1";
        if (size >= largest * this.config.h2Ratio) return "H2";
        return "H3";
    }

    /**
     * Size a heading needs to become the document title
     */
    titleThreshold(): number {
        return this.histogram.titleThreshold(this.config.titleRatio);
    }
}
