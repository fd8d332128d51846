import type { AssembledLine, CharacterDocument, ExtractionResult, Heading, PageProgressCallback } from "../types";
import { UNTITLED } from "../types";
import { FontSizeHistogram } from "../stats/font-histogram";
import { candidateLines } from "../extraction/lines";
import { HeadingClassifier, DEFAULT_CLASSIFIER_CONFIG, type ClassifierConfig } from "../classification/classifier";
import { truncateText } from "../utils/shared";
import Logger from "../utils/logger";

export interface OutlineOptions {
    classifier?: ClassifierConfig;
    onPage?: PageProgressCallback;
}

/**
 * Per-document extraction context. Owns the font histogram and the headings
 * found so far; create one per document and never share it.
 */
export class OutlineBuilder {
    private readonly histogram = new FontSizeHistogram();
    private readonly classifier: HeadingClassifier;
    private readonly maxLineLength: number;
    private readonly headings: Heading[] = [];
    private title: string | null = null;

    constructor(config: ClassifierConfig = {}) {
        this.classifier = new HeadingClassifier(this.histogram, config);
        this.maxLineLength = config.maxLineLength ?? DEFAULT_CLASSIFIER_CONFIG.maxLineLength;
    }

    /**
     * Global pass: record every fragment's size before any line is classified
     */
    collectStatistics(document: CharacterDocument): void {
        this.histogram.reset();
        for (const page of document.pages) {
            for (const char of page.characters) {
                this.histogram.observe(char.size);
            }
        }
    }

    /**
     * Classify one line; returns the heading it produced, if any
     */
    addLine(line: AssembledLine): Heading | null {
        if (!this.classifier.isHeading(line.text, line.size, line.font)) {
            return null;
        }

        const level = this.classifier.determineLevel(line.size);
        if (this.title === null && line.size >= this.classifier.titleThreshold()) {
            this.title = line.text;
        }

        const heading: Heading = { text: line.text, page: line.page, level };
        this.headings.push(heading);
        return heading;
    }

    /**
     * Second pass: pages in order, lines in assembly order
     */
    classifyDocument(document: CharacterDocument, onPage?: PageProgressCallback): void {
        const logger = Logger.getInstance();
        const totalPages = document.pages.length;

        for (const page of document.pages) {
            for (const line of candidateLines(page, this.maxLineLength)) {
                const heading = this.addLine(line);
                if (heading) {
                    logger.debug(`[${document.id}] p${heading.page} ${heading.level}: ${truncateText(heading.text, 60)}`);
                }
            }
            onPage?.(page.pageNumber, totalPages);
        }
    }

    result(): ExtractionResult {
        return {
            title: this.title ?? UNTITLED,
            outline: [...this.headings],
        };
    }
}

/**
 * Extract the title and heading outline of an in-memory document
 */
export function extractHeadings(
    document: CharacterDocument,
    options: OutlineOptions = {}
): ExtractionResult {
    const builder = new OutlineBuilder(options.classifier);
    builder.collectStatistics(document);
    builder.classifyDocument(document, options.onPage);
    return builder.result();
}
