import { readFile } from "fs/promises";
import { createRequire } from "module";
import { pathToFileURL } from "url";
import { getDocument, GlobalWorkerOptions } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PDFPageProxy } from "pdfjs-dist/types/src/display/api";
import type { CharacterDocument, CharacterRecord, PageCharacters } from "../types";
import { DocumentLoadError } from "../errors";
import { errorMessage } from "../utils/shared";

/**
 * The parts of a pdf.js text item this module reads
 */
export interface TextRun {
    str: string;
    transform: number[];
    height: number;
    fontName: string;
}

export type FontNameResolver = (fontId: string) => string;

/**
 * Convert pdf.js text runs into fragments with a top-left origin.
 *
 * The font size is the vertical scale of the text matrix; `top` is the page
 * height minus the baseline and the glyph height.
 */
export function toCharacterRecords(
    runs: TextRun[],
    pageHeight: number,
    resolveFontName: FontNameResolver
): CharacterRecord[] {
    const records: CharacterRecord[] = [];

    for (const run of runs) {
        // pdf.js emits empty runs to mark line ends
        if (run.str === "") continue;

        const c = run.transform[2] ?? 0;
        const d = run.transform[3] ?? 0;
        const baseline = run.transform[5] ?? 0;
        const size = Math.hypot(c, d) || run.height;

        records.push({
            text: run.str,
            size,
            fontName: resolveFontName(run.fontName),
            top: pageHeight - baseline - size,
        });
    }

    return records;
}

/**
 * Real font name ("ABCDEF+Helvetica-Bold") for a pdf.js font id ("g_d0_f1").
 * Only available once the page's operator list has been built.
 */
function fontResolverFor(page: PDFPageProxy, fallback: Record<string, string>): FontNameResolver {
    return (fontId: string) => {
        if (page.commonObjs.has(fontId)) {
            const font: unknown = page.commonObjs.get(fontId);
            if (typeof font === "object" && font !== null && "name" in font && typeof font.name === "string") {
                return font.name;
            }
        }
        return fallback[fontId] ?? fontId;
    };
}

/**
 * Point pdf.js at its worker module so Node runs it in-process
 */
function configureWorker(): void {
    if (GlobalWorkerOptions.workerSrc) return;
    const require = createRequire(import.meta.url);
    const workerPath = require.resolve("pdfjs-dist/legacy/build/pdf.worker.mjs");
    GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
}

async function readPage(page: PDFPageProxy): Promise<PageCharacters> {
    const viewport = page.getViewport({ scale: 1 });
    const content = await page.getTextContent();
    await page.getOperatorList();

    const families: Record<string, string> = {};
    for (const [id, style] of Object.entries(content.styles)) {
        families[id] = style.fontFamily;
    }

    const runs: TextRun[] = [];
    for (const item of content.items) {
        if (!("str" in item)) continue;
        runs.push({
            str: item.str,
            transform: item.transform,
            height: item.height,
            fontName: item.fontName,
        });
    }

    return {
        pageNumber: page.pageNumber,
        characters: toCharacterRecords(runs, viewport.height, fontResolverFor(page, families)),
    };
}

/**
 * Read every page of a PDF into memory.
 * Throws DocumentLoadError when the file cannot be read or parsed.
 */
export async function loadPdfDocument(path: string): Promise<CharacterDocument> {
    let data: Uint8Array;
    try {
        data = new Uint8Array(await readFile(path));
    } catch (err) {
        throw new DocumentLoadError(path, errorMessage(err), { cause: err });
    }

    configureWorker();
    const loadingTask = getDocument({
        data,
        useSystemFonts: true,
        disableFontFace: true,
        isEvalSupported: false,
        verbosity: 0,
    });

    try {
        const pdf = await loadingTask.promise;
        const pages: PageCharacters[] = [];

        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
            const page = await pdf.getPage(pageNumber);
            pages.push(await readPage(page));
            page.cleanup();
        }

        return { id: path, pages };
    } catch (err) {
        throw new DocumentLoadError(path, errorMessage(err), { cause: err });
    } finally {
        await loadingTask.destroy();
    }
}
