import { describe, it, expect } from "vitest";
import { FontSizeHistogram } from "../font-histogram";

function histogramOf(entries: Array<[number, number]>): FontSizeHistogram {
    const histogram = new FontSizeHistogram();
    for (const [size, count] of entries) {
        for (let i = 0; i < count; i++) histogram.observe(size);
    }
    return histogram;
}

describe("FontSizeHistogram", () => {
    describe("empty", () => {
        it("defaults the average to 12", () => {
            expect(new FontSizeHistogram().averageSize()).toBe(12.0);
        });

        it("defaults the largest size and title threshold to 18", () => {
            const histogram = new FontSizeHistogram();
            expect(histogram.largestSize()).toBe(18.0);
            expect(histogram.titleThreshold()).toBe(18.0);
            expect(histogram.isEmpty()).toBe(true);
        });
    });

    describe("observe", () => {
        it("rounds sizes to one decimal place", () => {
            const histogram = new FontSizeHistogram();
            histogram.observe(11.96);
            histogram.observe(12.04);
            expect(histogram.sizes()).toEqual([12]);
            expect(histogram.count(12)).toBe(2);
        });

        it("ignores non-positive and non-finite sizes", () => {
            const histogram = new FontSizeHistogram();
            histogram.observe(0);
            histogram.observe(-4);
            histogram.observe(Number.NaN);
            histogram.observe(0.04);
            expect(histogram.isEmpty()).toBe(true);
        });

        it("counts repeated sizes", () => {
            const histogram = histogramOf([[10, 5], [20, 1]]);
            expect(histogram.count(10)).toBe(5);
            expect(histogram.count(20)).toBe(1);
            expect(histogram.count(14)).toBe(0);
        });
    });

    describe("averageSize", () => {
        it("averages distinct sizes without weighting by frequency", () => {
            const histogram = histogramOf([[10, 10], [30, 1]]);
            expect(histogram.averageSize()).toBe(20);
        });

        it("averages {10: 5, 20: 1} to 15", () => {
            expect(histogramOf([[10, 5], [20, 1]]).averageSize()).toBe(15);
        });
    });

    describe("largestSize", () => {
        it("returns the maximum distinct size", () => {
            expect(histogramOf([[10, 5], [20, 1]]).largestSize()).toBe(20);
        });
    });

    describe("titleThreshold", () => {
        it("is 95% of the largest size", () => {
            expect(histogramOf([[20, 1]]).titleThreshold()).toBeCloseTo(19, 10);
        });

        it("accepts a custom ratio", () => {
            expect(histogramOf([[20, 1]]).titleThreshold(0.5)).toBe(10);
        });
    });

    it("reset clears all observations", () => {
        const histogram = histogramOf([[10, 2]]);
        histogram.reset();
        expect(histogram.isEmpty()).toBe(true);
        expect(histogram.averageSize()).toBe(12.0);
    });
});
