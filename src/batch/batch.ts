import { mkdir, readdir, writeFile } from "fs/promises";
import { join, parse } from "path";
import type { DocumentLoader } from "../types";
import type { AppConfig } from "../config";
import type { ClassifierConfig } from "../classification/classifier";
import { extractFromFile } from "../pipeline";
import { serializeResult } from "../output/outline-json";
import { errorMessage } from "../utils/shared";
import Logger from "../utils/logger";

export interface BatchOptions extends AppConfig {
    loader?: DocumentLoader;
    classifier?: ClassifierConfig;
}

export interface BatchReport {
    found: number;
    /** Files a sidecar was written for */
    processed: string[];
    /** Files with no headings (sidecar not written) */
    skipped: string[];
    /** Files that failed to load or whose sidecar could not be written */
    failed: string[];
    outputDir: string;
}

function isPdf(filename: string): boolean {
    return filename.toLowerCase().endsWith(".pdf");
}

/**
 * PDF file names in a directory, sorted
 */
export async function listPdfFiles(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
        .filter(e => e.isFile() && isPdf(e.name))
        .map(e => e.name)
        .sort();
}

export function sidecarName(filename: string): string {
    return `${parse(filename).name}.json`;
}

/**
 * Extract every PDF in inputDir, one at a time, writing <name>.json to outputDir
 */
export async function processDirectory(options: BatchOptions): Promise<BatchReport> {
    const logger = Logger.getInstance();
    await mkdir(options.outputDir, { recursive: true });

    const files = await listPdfFiles(options.inputDir);
    const report: BatchReport = {
        found: files.length,
        processed: [],
        skipped: [],
        failed: [],
        outputDir: options.outputDir,
    };

    for (const filename of files) {
        logger.log(`Processing ${filename}...`);

        const result = await extractFromFile(join(options.inputDir, filename), {
            ...(options.loader && { loader: options.loader }),
            ...(options.classifier && { classifier: options.classifier }),
            ...(options.progress && {
                onPage: (page: number, total: number) => logger.log(`  ${filename}: page ${page}/${total}`),
            }),
        });

        if (result.error !== undefined) {
            report.failed.push(filename);
            continue;
        }

        if (result.outline.length === 0 && !options.writeEmpty) {
            logger.log(`No headings found in ${filename}`);
            report.skipped.push(filename);
            continue;
        }

        const outputPath = join(options.outputDir, sidecarName(filename));
        try {
            await writeFile(outputPath, serializeResult(result), "utf-8");
        } catch (err) {
            logger.error(`Failed to write ${outputPath}: ${errorMessage(err)}`);
            report.failed.push(filename);
            continue;
        }

        report.processed.push(filename);
        logger.log(`Extracted ${result.outline.length} headings from ${filename}`);
        logger.log(`Document title: ${result.title}`);
    }

    return report;
}

/**
 * Batch entry point: prepares the input directory, processes it and logs a summary
 */
export async function runBatch(options: BatchOptions): Promise<BatchReport> {
    const logger = Logger.getInstance();
    await mkdir(options.inputDir, { recursive: true });

    const files = await listPdfFiles(options.inputDir);
    if (files.length === 0) {
        logger.log(`No PDF files found in ${options.inputDir}`);
        logger.log("Add PDF files to the input directory and run again.");
        return { found: 0, processed: [], skipped: [], failed: [], outputDir: options.outputDir };
    }

    logger.log(`Found ${files.length} PDF files in input directory`);
    const report = await processDirectory(options);

    logger.log("Processing complete!");
    logger.log(`Processed ${report.processed.length} files`);
    if (report.failed.length > 0) {
        logger.warn(`Failed: ${report.failed.join(", ")}`);
    }
    logger.log(`Results saved in: ${options.outputDir}`);

    return report;
}

export function formatBatchReport(report: BatchReport): string {
    const lines = [
        `Found ${report.found} PDF files`,
        `Processed: ${report.processed.length}`,
        `No headings: ${report.skipped.length}`,
        `Failed: ${report.failed.length}`,
        `Output directory: ${report.outputDir}`,
    ];
    for (const name of report.processed) {
        lines.push(`  ${name} -> ${sidecarName(name)}`);
    }
    return lines.join("\n");
}
