import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { EventEmitter } from "node:events";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { writeMidi, type MidiEvent } from "midi-file";
import { USAGE } from "../src/args";
import { runCli, type CliIO } from "../src/run";

function memoryStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

function createIO(extra: Partial<CliIO> = {}) {
  const stdout = memoryStream();
  const stderr = memoryStream();
  const io: CliIO = { stdout: stdout.stream, stderr: stderr.stream, ...extra };
  return { io, stdout: stdout.text, stderr: stderr.text };
}

/**
 * One beat per chord at 120 BPM (500ms), chords released as the next is struck.
 */
function progression(chords: number[][]): number[] {
  const events: MidiEvent[] = [];
  for (const chord of chords) {
    for (const noteNumber of chord) {
      events.push({ deltaTime: 0, type: "noteOn", channel: 0, noteNumber, velocity: 90 });
    }
    chord.forEach((noteNumber, i) => {
      events.push({ deltaTime: i === 0 ? 480 : 0, type: "noteOff", channel: 0, noteNumber, velocity: 0 });
    });
  }
  events.push({ deltaTime: 0, meta: true, type: "endOfTrack" });
  return writeMidi({ header: { format: 0, numTracks: 1, ticksPerBeat: 480 }, tracks: [events] });
}

const C = [48, 52, 55, 60];
const G = [43, 50, 55, 59];
const Dm = [50, 53, 57, 62];

/**
 * Two-part piano score, one note per hand and measure.
 */
function pianoScore(right: string[], left: string[]): string {
  const part = (id: string, notes: string[]): string =>
    `<part id="${id}">${notes
      .map((name, i) => {
        const [, step, octave] = /^([A-G])(\d)$/.exec(name) ?? [];
        return `<measure number="${i + 1}"><note><pitch><step>${step}</step><octave>${octave}</octave></pitch><duration>4</duration></note></measure>`;
      })
      .join("")}</part>`;
  return `<score-partwise>${part("P1", right)}${part("P2", left)}</score-partwise>`;
}

describe("runCli", () => {
  let dir: string;
  let takePath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "progcheck-cli-"));
    takePath = join(dir, "take.mid");
    await writeFile(takePath, Buffer.from(progression([C, G, Dm])));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints help", async () => {
    const { io, stdout } = createIO();

    expect(await runCli(["--help"], io)).toBe(0);
    expect(stdout()).toBe(USAGE);
  });

  it("exits 2 on bad usage", async () => {
    const { io, stderr } = createIO();

    expect(await runCli(["--colour"], io)).toBe(2);
    expect(stderr()).toContain("Usage: progcheck");
  });

  it("prints one verdict line per chord", async () => {
    const { io, stdout } = createIO();

    expect(await runCli(["-q", takePath], io)).toBe(0);
    expect(stdout()).toBe("[0] PASS C\n[1] PASS G\n[2] FAIL Dm no-v-to-ii\n");
  });

  it("logs a summary to stderr", async () => {
    const { io, stderr } = createIO();

    await runCli([takePath], io);

    expect(stderr()).toContain("[Pipeline] Reading");
    expect(stderr()).toContain("[progcheck] 3 chords, 2 passed, 1 failed\n");
  });

  it("layers flags over the config file", async () => {
    const configPath = join(dir, "progcheck.json");
    await writeFile(configPath, JSON.stringify({ rules: ["identified"], notation: "french" }));
    const { io, stdout } = createIO();

    expect(await runCli(["-q", "-c", configPath, "--notation", "english", takePath], io)).toBe(0);
    expect(stdout()).toBe("[0] PASS C\n[1] PASS G\n[2] PASS Dm\n");
  });

  it("uses French names from the config file", async () => {
    const configPath = join(dir, "french.json");
    await writeFile(configPath, JSON.stringify({ rules: ["identified"], notation: "french" }));
    const { io, stdout } = createIO();

    await runCli(["-q", "-c", configPath, takePath], io);

    expect(stdout()).toBe("[0] PASS Do\n[1] PASS Sol\n[2] PASS Rém\n");
  });

  describe("score", () => {
    let scorePath: string;

    beforeAll(async () => {
      // The last right-hand note (E4) is not in the Dm chord that is played
      scorePath = join(dir, "lesson.musicxml");
      await writeFile(scorePath, pianoScore(["C4", "B3", "E4"], ["C3", "G2", "D3"]));
    });

    it("checks each chord against its measure", async () => {
      const { io, stdout } = createIO();

      expect(await runCli(["-q", "-r", "identified", "--score", scorePath, takePath], io)).toBe(0);
      expect(stdout()).toBe("[0] PASS C\n[1] PASS G\n[2] FAIL Dm expected-notes\n");
    });

    it("checks only the chosen hand", async () => {
      const { io, stdout } = createIO();

      await runCli(["-q", "-r", "identified", "-s", scorePath, "--hand", "left", takePath], io);

      expect(stdout()).toBe("[0] PASS C\n[1] PASS G\n[2] PASS Dm\n");
    });

    it("logs the number of measures", async () => {
      const { io, stderr } = createIO();

      await runCli(["-r", "identified", "--score", scorePath, takePath], io);

      expect(stderr()).toContain(`[progcheck] 3 measures in ${scorePath} (hand: both)\n`);
    });

    it("rejects an unknown hand", async () => {
      const { io, stderr } = createIO();

      expect(await runCli(["-q", "--score", scorePath, "--hand", "middle", takePath], io)).toBe(1);
      expect(stderr()).toMatch(/^error \[config\] InvalidConfig: hand: /);
    });
  });

  describe("failures", () => {
    it("reports a missing input", async () => {
      const missing = join(dir, "missing.mid");
      const { io, stderr } = createIO();

      expect(await runCli(["-q", missing], io)).toBe(1);
      expect(stderr()).toBe(`error [event-source] DeviceUnavailable: MIDI input ${missing} not found\n`);
    });

    it("reports an invalid rule", async () => {
      const { io, stderr } = createIO();

      expect(await runCli(["-q", "-r", "no-such-rule", takePath], io)).toBe(1);
      expect(stderr()).toMatch(/^error \[config\] InvalidConfig: rules\.0: /);
    });

    it("fails when no port is connected", async () => {
      const empty = join(dir, "snd-empty");
      await mkdir(empty);
      const { io, stderr } = createIO({ deviceDir: empty });

      expect(await runCli(["-q"], io)).toBe(1);
      expect(stderr()).toBe("error [event-source] DeviceUnavailable: No MIDI input ports found\n");
    });
  });

  describe("ports", () => {
    it("lists ports", async () => {
      const snd = join(dir, "snd");
      await mkdir(snd);
      await writeFile(join(snd, "midiC1D0"), "");
      await writeFile(join(snd, "midiC0D0"), "");
      const { io, stdout } = createIO({ deviceDir: snd });

      expect(await runCli(["--list-ports"], io)).toBe(0);
      expect(stdout()).toBe(`hw:0,0\t${join(snd, "midiC0D0")}\nhw:1,0\t${join(snd, "midiC1D0")}\n`);
    });
  });

  describe("reference tone", () => {
    it("sounds the tonic of the starting key", async () => {
      const child = Object.assign(new EventEmitter(), { unref: vi.fn() });
      const spawnProcess = vi.fn(() => child);
      const { io } = createIO({ spawnProcess });

      await runCli(["-q", "--reference-tone", "-k", "A minor", "-r", "identified", takePath], io);

      expect(spawnProcess).toHaveBeenCalledWith(
        "speaker-test",
        ["-t", "sine", "-f", "440", "-l", "1"],
        { detached: true, stdio: "ignore" }
      );
    });
  });
});
