import { describe, it, expect } from "vitest";
import { formatChordSymbol, parseChordSymbol, templateFor } from "../../src/theory/chords";
import { parseKey } from "../../src/theory/key";

describe("chord symbols", () => {
  describe("parseChordSymbol", () => {
    it.each([
      ["C", 0, "maj"],
      ["Am", 9, "min"],
      ["G7", 7, "dom7"],
      ["Bbmaj7", 10, "maj7"],
      ["F#m7b5", 6, "hdim7"],
      ["Bdim", 11, "dim"],
      ["Dsus", 2, "sus4"],
      ["E-7", 4, "min7"],
    ] as const)("reads %s", (symbol, root, quality) => {
      expect(parseChordSymbol(symbol)).toEqual({ root, quality, bass: null });
    });

    it("reads a slash bass", () => {
      expect(parseChordSymbol("C/E")).toEqual({ root: 0, quality: "maj", bass: 4 });
    });

    it("rejects unknown symbols", () => {
      expect(parseChordSymbol("Xyz")).toBeNull();
      expect(parseChordSymbol("Cblah")).toBeNull();
    });
  });

  it("formats symbols in the key's spelling", () => {
    const c = parseKey("C major");

    expect(formatChordSymbol(2, "min7", 2, c)).toBe("Dm7");
    expect(formatChordSymbol(7, "maj", 11, c)).toBe("G/B");
    expect(formatChordSymbol(7, "min", 7, c, "french")).toBe("Solm");
  });

  it("stacks template intervals in thirds", () => {
    expect(templateFor("dom7").intervals).toEqual([0, 4, 7, 10]);
    expect(templateFor("9").intervals).toEqual([0, 4, 7, 10, 2]);
  });
});
