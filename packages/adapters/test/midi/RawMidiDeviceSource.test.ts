import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { execFileSync } from "node:child_process";
import { mkdtemp, open, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RawInput } from "@progcheck/contracts";
import { DeviceUnavailableError, MalformedStreamError } from "@progcheck/contracts";
import { RawMidiDeviceSource } from "../../src/midi/RawMidiDeviceSource";

async function collect(iterable: AsyncIterable<RawInput>): Promise<RawInput[]> {
  const inputs: RawInput[] = [];
  for await (const input of iterable) inputs.push(input);
  return inputs;
}

/**
 * A regular file stands in for the character device: the stream reads
 * its bytes and then ends, as a port does when it is closed.
 */
describe("RawMidiDeviceSource", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "progcheck-port-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("parses bytes and stamps them against the session clock", async () => {
    const devicePath = join(dir, "midiC1D0");
    await writeFile(devicePath, Buffer.from([0x90, 60, 100, 64, 100, 0x80, 60, 0]));
    const source = new RawMidiDeviceSource({
      devicePath,
      clock: () => 1250,
      sessionStart: 1000,
    });

    const inputs = await collect(source.events());

    expect(source.source).toBe("midi-device");
    expect(inputs).toEqual([
      { type: "midi_note_on", t: 250, note: 60, velocity: 100, channel: 0 },
      { type: "midi_note_on", t: 250, note: 64, velocity: 100, channel: 0 },
      { type: "midi_note_off", t: 250, note: 60, channel: 0 },
    ]);
  });

  it("fails with DeviceUnavailable when the port does not exist", async () => {
    const source = new RawMidiDeviceSource({ devicePath: join(dir, "midiC9D9") });

    await expect(collect(source.events())).rejects.toBeInstanceOf(DeviceUnavailableError);
  });

  it("fails with MalformedStream on undefined status bytes", async () => {
    const devicePath = join(dir, "midiC2D0");
    await writeFile(devicePath, Buffer.from([0x90, 60, 100, 0xf5]));
    const source = new RawMidiDeviceSource({ devicePath, clock: () => 0 });

    await expect(collect(source.events())).rejects.toBeInstanceOf(MalformedStreamError);
  });

  it.skipIf(process.platform === "win32")(
    "ends a live read cleanly when aborted while waiting for input",
    async () => {
      // A FIFO blocks like a port: reads wait until the writer sends bytes
      const devicePath = join(dir, "midiC3D0");
      execFileSync("mkfifo", [devicePath]);
      const controller = new AbortController();
      const source = new RawMidiDeviceSource({ devicePath, clock: () => 40, sessionStart: 0 });
      const inputs = source.events(controller.signal)[Symbol.asyncIterator]();

      const first = inputs.next();
      const writer = await open(devicePath, "w");
      try {
        await writer.write(Buffer.from([0x90, 60, 100]));
        await expect(first).resolves.toEqual({
          done: false,
          value: { type: "midi_note_on", t: 40, note: 60, velocity: 100, channel: 0 },
        });

        const rest = inputs.next();
        controller.abort();

        await expect(rest).resolves.toEqual({ done: true, value: undefined });
      } finally {
        await writer.close();
      }
    }
  );

  it("ends without opening the port when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new RawMidiDeviceSource({ devicePath: join(dir, "midiC9D9") });

    await expect(collect(source.events(controller.signal))).resolves.toEqual([]);
  });
});
