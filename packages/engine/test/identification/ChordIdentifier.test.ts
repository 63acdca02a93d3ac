import { describe, it, expect } from "vitest";
import type { Chord, ChordQuality, PitchClass } from "@progcheck/contracts";
import { ChordIdentifier, identifyChords } from "../../src/identification/ChordIdentifier";
import { parseKey } from "../../src/theory/key";
import { C_MAJOR, chordOf, collect, fromArray } from "../_harness/midi";

describe("ChordIdentifier", () => {
  const identifier = new ChordIdentifier();

  describe("triads", () => {
    it("names a C major triad in root position", () => {
      expect(identifier.identify([0, 4, 7], 0, C_MAJOR)).toEqual({
        root: 0,
        quality: "maj",
        inversion: "root",
        bass: 0,
        confidence: 1,
        symbol: "C",
        degree: 1,
        numeral: "I",
      });
    });

    it("names inversions with a slash bass", () => {
      const identity = identifier.identify([0, 4, 7], 4, C_MAJOR);

      expect(identity?.inversion).toBe("first");
      expect(identity?.symbol).toBe("C/E");
    });

    it("names minor triads with their degree", () => {
      const identity = identifier.identify([2, 5, 9], 2, C_MAJOR);

      expect(identity).toMatchObject({ root: 2, quality: "min", symbol: "Dm", degree: 2, numeral: "ii" });
    });

    it("names chromatic chords relative to the key", () => {
      const identity = identifier.identify([0, 3, 8], 8, C_MAJOR);

      expect(identity).toMatchObject({ root: 8, quality: "maj", symbol: "Ab", degree: null, numeral: "bVI" });
    });

    it("reads degrees in the given key", () => {
      const identity = identifier.identify([4, 7, 11], 4, parseKey("G major"));

      expect(identity).toMatchObject({ symbol: "Em", numeral: "vi" });
    });
  });

  describe("sevenths", () => {
    it("names a dominant seventh", () => {
      const identity = identifier.identify([2, 5, 7, 11], 7, C_MAJOR);

      expect(identity).toMatchObject({ root: 7, quality: "dom7", symbol: "G7", numeral: "V7" });
    });

    it("prefers a seventh chord over an equally exact sixth chord", () => {
      const identity = identifier.identify([0, 4, 7, 9], 9, C_MAJOR);

      expect(identity).toMatchObject({ root: 9, quality: "min7", symbol: "Am7" });
    });

    it("breaks remaining ties on the lowest root", () => {
      // Csus4 and Fsus2 share the same pitch classes
      const identity = identifier.identify([0, 5, 7], 0, C_MAJOR);

      expect(identity).toMatchObject({ root: 0, quality: "sus4" });
    });
  });

  describe("confidence", () => {
    it("scores incomplete chords by the tones they lack", () => {
      const identity = identifier.identify([0, 4], 0, C_MAJOR);

      expect(identity?.symbol).toBe("C");
      expect(identity?.confidence).toBeCloseTo(2 / 3, 5);
    });

    it("leaves a chromatic cluster unidentified", () => {
      const all: PitchClass[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];

      expect(identifier.identify(all, 0, C_MAJOR)).toBeNull();
    });

    it("applies the configured threshold", () => {
      const strict = new ChordIdentifier({ confidenceThreshold: 0.7 });

      expect(strict.identify([0, 4], 0, C_MAJOR)).toBeNull();
    });

    it("leaves single notes unidentified", () => {
      expect(identifier.identify([0], 0, C_MAJOR)).toBeNull();
    });

    it("lists candidates best first", () => {
      const [best, next] = identifier.candidates([0, 4, 7], C_MAJOR);

      expect(best.cost).toBe(0);
      expect(next.cost).toBeGreaterThan(0);
    });
  });

  describe("notation", () => {
    it("uses French note names", () => {
      const french = new ChordIdentifier({ notation: "french" });

      expect(french.identify([7, 11, 2], 7, C_MAJOR)?.symbol).toBe("Sol");
      expect(french.identify([2, 5, 9], 5, C_MAJOR)?.symbol).toBe("Rém/Fa");
    });
  });

  describe("determinism", () => {
    /** The set itself, reversed, and every rotation */
    function orderings(pitchSet: PitchClass[]): PitchClass[][] {
      const rotations = pitchSet.map((_, i) => [...pitchSet.slice(i), ...pitchSet.slice(0, i)]);
      return [...rotations, [...pitchSet].reverse()];
    }

    const tieProne: { pitchSet: PitchClass[]; root: PitchClass; quality: ChordQuality }[] = [
      // Csus4 and Fsus2 share the tones; the lower root wins
      { pitchSet: [0, 5, 7], root: 0, quality: "sus4" },
      // Am7 over C6: sevenths rank before extended chords
      { pitchSet: [0, 4, 7, 9], root: 9, quality: "min7" },
      // Every root gives the same diminished seventh
      { pitchSet: [0, 3, 6, 9], root: 0, quality: "dim7" },
    ];

    it.each(tieProne)("resolves $pitchSet the same way every time", ({ pitchSet, root, quality }) => {
      const first = identifier.identify(pitchSet, 0, C_MAJOR);

      expect(first).toMatchObject({ root, quality });
      for (const ordering of orderings(pitchSet)) {
        for (let i = 0; i < 3; i++) {
          expect(identifier.identify(ordering, 0, C_MAJOR)).toEqual(first);
          expect(new ChordIdentifier().identify(ordering, 0, C_MAJOR)).toEqual(first);
        }
      }
    });
  });

  describe("identifyChords", () => {
    it("identifies each chord in the key in force", async () => {
      const chords: Chord[] = [chordOf(0, [60, 64, 67]), chordOf(1, [55, 59, 62])].map((c) => ({
        ...c,
        identity: null,
      }));

      const identified = await collect(identifyChords(fromArray(chords), identifier, () => C_MAJOR));

      expect(identified.map((c) => c.identity?.numeral)).toEqual(["I", "V"]);
    });
  });
});
