import { mean, roundToTenth } from "../utils/shared";

/** Average reported before any size has been observed (typical body text) */
export const DEFAULT_AVERAGE_SIZE = 12.0;

/** Largest size, and title threshold, reported before any size has been observed */
export const FALLBACK_LARGEST_SIZE = 18.0;

export const TITLE_SIZE_RATIO = 0.95;

/**
 * Counts font sizes (rounded to one decimal) seen in a document.
 *
 * Averages are taken over distinct sizes, not weighted by frequency: ten lines at
 * 10pt and one at 30pt average to 20. A few large outliers therefore pull the
 * average up, and short lines at or above it read as headings.
 */
export class FontSizeHistogram {
    private readonly counts = new Map<number, number>();

    observe(size: number): void {
        if (!Number.isFinite(size) || size <= 0) return;
        const key = roundToTenth(size);
        // 0.04 rounds to 0
        if (key <= 0) return;
        this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
    }

    count(size: number): number {
        return this.counts.get(roundToTenth(size)) ?? 0;
    }

    sizes(): number[] {
        return [...this.counts.keys()];
    }

    isEmpty(): boolean {
        return this.counts.size === 0;
    }

    averageSize(): number {
        return mean(this.sizes(), DEFAULT_AVERAGE_SIZE);
    }

    largestSize(): number {
        if (this.isEmpty()) return FALLBACK_LARGEST_SIZE;
        return Math.max(...this.sizes());
    }

    titleThreshold(ratio: number = TITLE_SIZE_RATIO): number {
        if (this.isEmpty()) return FALLBACK_LARGEST_SIZE;
        return this.largestSize() * ratio;
    }

    reset(): void {
        this.counts.clear();
    }
}
