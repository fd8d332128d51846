import { z } from "zod";
import type { ExtractionResult } from "../types";
import { OutlineParseError } from "../errors";
import { errorMessage } from "../utils/shared";

const HeadingSchema = z.object({
    text: z.string(),
    page: z.number().int().positive(),
    level: z.enum(["H1", "H2", "H3"]),
});

export const ExtractionResultSchema = z.object({
    title: z.string(),
    outline: z.array(HeadingSchema),
});

/**
 * JSON sidecar text: two-space indent, non-ASCII kept as-is, trailing newline
 */
export function serializeResult(result: ExtractionResult): string {
    const body: ExtractionResult = {
        title: result.title,
        outline: result.outline.map(h => ({ text: h.text, page: h.page, level: h.level })),
    };
    return JSON.stringify(body, null, 2) + "\n";
}

export function parseResult(json: string): ExtractionResult {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (err) {
        throw new OutlineParseError(`Invalid outline JSON: ${errorMessage(err)}`);
    }

    const parsed = ExtractionResultSchema.safeParse(raw);
    if (!parsed.success) {
        throw OutlineParseError.fromZod(parsed.error);
    }
    return parsed.data;
}

/**
 * Human-readable outline, indented by level
 */
export function formatOutline(result: ExtractionResult): string {
    const lines: string[] = [];

    lines.push(`Title: ${result.title}`);
    lines.push(`Headings: ${result.outline.length}`);
    lines.push("");

    for (const heading of result.outline) {
        const indent = "  ".repeat(Number(heading.level.slice(1)) - 1);
        lines.push(`${indent}${heading.level} ${heading.text} (p. ${heading.page})`);
    }

    return lines.join("\n");
}
