/**
 * A positioned text fragment as reported by the PDF library.
 * `top` is measured from the top edge of the page.
 */
export interface CharacterRecord {
    text: string;
    size: number;
    fontName: string;
    top: number;
}

export interface PageCharacters {
    pageNumber: number; // 1-based
    characters: CharacterRecord[];
}

/**
 * A document whose pages have already been read into memory
 */
export interface CharacterDocument {
    id: string;
    pages: PageCharacters[];
}

/**
 * Loads a document from a path, e.g. a PDF on disk
 */
export type DocumentLoader = (path: string) => Promise<CharacterDocument>;

export interface AssembledLine {
    text: string;
    size: number;
    font: string;
    page: number;
}

export type HeadingLevel = "H1" | "H2" | "H3";

export interface Heading {
    readonly text: string;
    readonly page: number;
    readonly level: HeadingLevel;
}

export interface ExtractionResult {
    title: string;
    outline: Heading[];
}

export type PageProgressCallback = (pageNumber: number, totalPages: number) => void;

export const UNTITLED = "Untitled";
