import type { AssembledLine, PageCharacters } from "../types";
import { charLength, roundToTenth } from "../utils/shared";

export const MAX_LINE_LENGTH = 100;

/**
 * Group a page's fragments into lines keyed by top coordinate (one decimal).
 *
 * The first fragment seen at a key fixes the line's size and font; later
 * fragments only append text. The returned Map iterates in first-seen order,
 * which follows the content stream rather than the vertical position.
 */
export function assembleLines(page: PageCharacters): Map<number, AssembledLine> {
    const lines = new Map<number, AssembledLine>();

    for (const char of page.characters) {
        const key = roundToTenth(char.top);
        let line = lines.get(key);
        if (line === undefined) {
            line = {
                text: "",
                size: roundToTenth(char.size),
                font: char.fontName,
                page: page.pageNumber,
            };
            lines.set(key, line);
        }
        line.text += char.text;
    }

    return lines;
}

/**
 * Lines worth classifying: trimmed, non-empty and at most maxLength characters
 */
export function candidateLines(
    page: PageCharacters,
    maxLength: number = MAX_LINE_LENGTH
): AssembledLine[] {
    const candidates: AssembledLine[] = [];

    for (const line of assembleLines(page).values()) {
        const text = line.text.trim();
        if (text.length === 0 || charLength(text) > maxLength) continue;
        candidates.push({ ...line, text });
    }

    return candidates;
}
