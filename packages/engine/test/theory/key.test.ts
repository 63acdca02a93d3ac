import { describe, it, expect } from "vitest";
import { InvalidConfigError } from "@progcheck/contracts";
import {
  degreeOf,
  formatMidiNote,
  isInKey,
  keyFromTonic,
  parseKey,
  romanNumeral,
  spellPitchClass,
  tonicFrequency,
} from "../../src/theory/key";

describe("key theory", () => {
  describe("parseKey", () => {
    it("reads major keys", () => {
      expect(parseKey("C major")).toEqual({
        tonic: 0,
        mode: "major",
        name: "C major",
        scale: [0, 2, 4, 5, 7, 9, 11],
      });
    });

    it("reads minor keys with the natural minor scale", () => {
      const key = parseKey("A minor");

      expect(key.tonic).toBe(9);
      expect(key.scale).toEqual([9, 11, 0, 2, 4, 5, 7]);
    });

    it("accepts short forms and accidentals", () => {
      expect(parseKey("F#m").name).toBe("F# minor");
      expect(parseKey("Bb").scale).toEqual([10, 0, 2, 3, 5, 7, 9]);
      expect(parseKey("eb minor").name).toBe("Eb minor");
    });

    it("accepts capitalised modes but keeps M and m apart", () => {
      expect(parseKey("A Minor").name).toBe("A minor");
      expect(parseKey("C Major").name).toBe("C major");
      expect(parseKey("D MIN").name).toBe("D minor");
      expect(parseKey("DM").name).toBe("D major");
      expect(parseKey("Dm").name).toBe("D minor");
    });

    it("rejects names that are not keys", () => {
      expect(() => parseKey("H major")).toThrow(InvalidConfigError);
      expect(() => parseKey("")).toThrow(InvalidConfigError);
      expect(() => parseKey("C dorian")).toThrow(InvalidConfigError);
    });
  });

  it("spells keys from a tonic", () => {
    expect(keyFromTonic(7, "major").name).toBe("G major");
    expect(keyFromTonic(1, "major").name).toBe("Db major");
    expect(keyFromTonic(1, "minor").name).toBe("C# minor");
  });

  describe("degrees", () => {
    it("finds scale degrees", () => {
      expect(degreeOf(7, parseKey("C major"))).toBe(5);
      expect(degreeOf(1, parseKey("C major"))).toBeNull();
    });

    it("counts the raised sixth and seventh in minor", () => {
      const aMinor = parseKey("A minor");

      expect(degreeOf(8, aMinor)).toBe(7);
      expect(degreeOf(6, aMinor)).toBe(6);
      expect(isInKey(8, aMinor)).toBe(true);
      expect(isInKey(3, aMinor)).toBe(false);
    });
  });

  describe("romanNumeral", () => {
    const c = parseKey("C major");

    it.each([
      [7, "dom7", "V7"],
      [2, "min", "ii"],
      [11, "dim", "vii°"],
      [11, "hdim7", "viiø7"],
      [0, "maj7", "Imaj7"],
      [10, "maj", "bVII"],
    ] as const)("names root %i %s as %s", (root, quality, numeral) => {
      expect(romanNumeral(root, quality, c)).toBe(numeral);
    });
  });

  describe("spelling", () => {
    it("follows the key's accidentals", () => {
      expect(spellPitchClass(10, parseKey("C major"))).toBe("Bb");
      expect(spellPitchClass(6, parseKey("G major"))).toBe("F#");
      expect(spellPitchClass(1, parseKey("A major"))).toBe("C#");
    });

    it("uses French names", () => {
      expect(spellPitchClass(2, parseKey("C major"), "french")).toBe("Ré");
      expect(formatMidiNote(60, "french")).toBe("Do4");
      expect(formatMidiNote(61, "french")).toBe("Do#4");
      expect(formatMidiNote(47, "french")).toBe("Si2");
    });

    it("formats notes with their octave", () => {
      expect(formatMidiNote(60)).toBe("C4");
      expect(formatMidiNote(70)).toBe("A#4");
    });
  });

  it("tunes the reference tone to the tonic", () => {
    expect(tonicFrequency(parseKey("A minor"))).toBeCloseTo(440, 5);
  });
});
