import { describe, it, expect } from "vitest";
import { assembleLines, candidateLines } from "../lines";
import type { CharacterRecord, PageCharacters } from "../../types";

function char(text: string, top: number, size: number = 10, fontName: string = "Helvetica"): CharacterRecord {
    return { text, top, size, fontName };
}

function page(characters: CharacterRecord[], pageNumber: number = 1): PageCharacters {
    return { pageNumber, characters };
}

describe("assembleLines", () => {
    it("concatenates fragments sharing a top coordinate in stream order", () => {
        const lines = assembleLines(page([char("Hel", 100), char("lo ", 100), char("World", 100)]));
        expect([...lines.values()].map(l => l.text)).toEqual(["Hello World"]);
    });

    it("takes size and font from the first fragment of a line", () => {
        const lines = assembleLines(page([
            char("Big", 50, 24, "Helvetica-Bold"),
            char(" small", 50, 9, "Helvetica"),
        ]));
        expect(lines.get(50)).toEqual({ text: "Big small", size: 24, font: "Helvetica-Bold", page: 1 });
    });

    it("quantizes top coordinates to one decimal", () => {
        const lines = assembleLines(page([char("A", 100.01), char("B", 99.98)]));
        expect(lines.size).toBe(1);
        expect(lines.get(100)?.text).toBe("AB");
    });

    it("rounds exact ties on the top coordinate to the even digit", () => {
        const lines = assembleLines(page([char("ALPHA", 10.25), char("BETA", 10.3)]));
        expect([...lines.entries()].map(([top, l]) => [top, l.text])).toEqual([[10.2, "ALPHA"], [10.3, "BETA"]]);
    });

    it("rounds the line size to one decimal", () => {
        const lines = assembleLines(page([char("x", 10, 11.96)]));
        expect(lines.get(10)?.size).toBe(12);
    });

    it("keeps first-seen order instead of vertical order", () => {
        const lines = assembleLines(page([
            char("bottom", 700),
            char("top", 100),
            char(" again", 700.04),
        ]));
        expect([...lines.keys()]).toEqual([700, 100]);
        expect([...lines.values()].map(l => l.text)).toEqual(["bottom again", "top"]);
    });

    it("records the page number on every line", () => {
        const lines = assembleLines(page([char("a", 1), char("b", 2)], 4));
        expect([...lines.values()].map(l => l.page)).toEqual([4, 4]);
    });
});

describe("candidateLines", () => {
    it("trims line text", () => {
        const lines = candidateLines(page([char("  Results  ", 10)]));
        expect(lines.map(l => l.text)).toEqual(["Results"]);
    });

    it("drops lines that are empty after trimming", () => {
        const lines = candidateLines(page([char("   ", 10), char("Kept", 20)]));
        expect(lines.map(l => l.text)).toEqual(["Kept"]);
    });

    it("drops lines longer than 100 characters and keeps exactly 100", () => {
        const lines = candidateLines(page([char("a".repeat(101), 10), char("b".repeat(100), 20)]));
        expect(lines.map(l => l.text.length)).toEqual([100]);
    });

    it("measures length in code points", () => {
        const bold = "\u{1D401}".repeat(100);
        const lines = candidateLines(page([char(bold, 10), char(bold + "\u{1D401}", 20)]));
        expect(lines.map(l => l.text)).toEqual([bold]);
    });

    it("honors a custom length limit", () => {
        const lines = candidateLines(page([char("short", 10), char("much longer", 20)]), 5);
        expect(lines.map(l => l.text)).toEqual(["short"]);
    });
});
