/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Math utilities
// =============================================================================

/**
 * Round to one decimal place, the granularity used for font sizes and line keys.
 *
 * Rounds the exact binary value, so 0.15 (stored just below 0.15) becomes 0.1.
 * Exact ties such as 10.25 go to the even digit.
 */
export function roundToTenth(value: number): number {
    const quarters = value * 4;
    if (Number.isInteger(quarters) && quarters % 2 !== 0) {
        const lower = Math.floor(value * 10);
        return (lower % 2 === 0 ? lower : lower + 1) / 10;
    }
    return Number(value.toFixed(1));
}

/**
 * Arithmetic mean, returns the fallback for empty arrays
 */
export function mean(values: number[], fallback: number): number {
    if (values.length === 0) return fallback;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Length in code points, so astral characters count once
 */
export function charLength(text: string): number {
    return Array.from(text).length;
}

/**
 * Number of whitespace-separated words
 */
export function countWords(text: string): number {
    return text.split(/\s+/).filter(w => w.length > 0).length;
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
