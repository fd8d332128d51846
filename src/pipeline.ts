import { basename } from "path";
import type { DocumentLoader, ExtractionResult, PageProgressCallback } from "./types";
import { UNTITLED } from "./types";
import { extractHeadings, type OutlineOptions } from "./outline/builder";
import { loadPdfDocument } from "./pdf/source";
import type { ClassifierConfig } from "./classification/classifier";
import { errorMessage } from "./utils/shared";
import Logger from "./utils/logger";

export interface PipelineConfig {
    classifier?: ClassifierConfig;
    /** Defaults to the pdf.js loader */
    loader?: DocumentLoader;
    onPage?: PageProgressCallback;
}

export interface ExtendedExtractionResult extends ExtractionResult {
    /** Set when the document could not be opened or read */
    error?: string;
    pageCount: number;
}

function createEmptyResult(error?: string): ExtendedExtractionResult {
    return {
        title: UNTITLED,
        outline: [],
        pageCount: 0,
        ...(error !== undefined && { error }),
    };
}

/**
 * Load a PDF and extract its outline.
 *
 * Never throws for a bad document: load and parse failures are logged and
 * produce an untitled, empty outline so a batch can move on.
 */
export async function extractFromFile(
    path: string,
    config: PipelineConfig = {}
): Promise<ExtendedExtractionResult> {
    const logger = Logger.getInstance();
    const loader = config.loader ?? loadPdfDocument;

    try {
        const document = await logger.timeAsync("Load document", () => loader(path));
        logger.debug(`${basename(path)}: ${document.pages.length} pages`);

        const options: OutlineOptions = {
            ...(config.classifier && { classifier: config.classifier }),
            ...(config.onPage && { onPage: config.onPage }),
        };
        const result = logger.time("Extract headings", () => extractHeadings(document, options));

        return { ...result, pageCount: document.pages.length };
    } catch (err) {
        const message = errorMessage(err);
        logger.error(`Error processing ${path}: ${message}`);
        return createEmptyResult(message);
    }
}
