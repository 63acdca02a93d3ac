/**
 * MIDI port discovery and input selection.
 */

import type { Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { IMidiEventSource, MidiInputInfo } from "@progcheck/contracts";
import { DeviceUnavailableError } from "@progcheck/contracts";

import { MidiFileSource } from "./MidiFileSource";
import { RawMidiDeviceSource } from "./RawMidiDeviceSource";

export const DEFAULT_DEVICE_DIR = "/dev/snd";

const RAW_MIDI_DEVICE = /^midiC(\d+)D(\d+)$/;
const HW_PORT_ID = /^hw:(\d+),(\d+)$/;

/**
 * List ALSA raw-MIDI ports, ordered by card then device.
 * A missing device directory means no ports.
 */
export async function listMidiDevices(dir: string = DEFAULT_DEVICE_DIR): Promise<MidiInputInfo[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") return [];
    throw new DeviceUnavailableError(`Cannot list MIDI ports in ${dir}`, { cause: err });
  }

  const ports: Array<MidiInputInfo & { card: number; device: number }> = [];
  for (const name of entries) {
    const match = RAW_MIDI_DEVICE.exec(name);
    if (!match) continue;
    const card = Number(match[1]);
    const device = Number(match[2]);
    ports.push({ id: `hw:${card},${device}`, name, path: join(dir, name), card, device });
  }

  ports.sort((a, b) => a.card - b.card || a.device - b.device);
  return ports.map(({ id, name, path }) => ({ id, name, path }));
}

/**
 * Map a port id ("hw:1,0") to its device path; other inputs are returned as-is.
 */
export function resolveDevicePath(input: string, dir: string = DEFAULT_DEVICE_DIR): string {
  const match = HW_PORT_ID.exec(input);
  if (!match) return input;
  return join(dir, `midiC${match[1]}D${match[2]}`);
}

export interface EventSourceOptions {
  /** Directory holding raw-MIDI ports */
  deviceDir?: string;
  clock?: () => number;
}

/**
 * Pick the source variant for an input: character devices and FIFOs are
 * live ports, regular files are Standard MIDI Files.
 */
export async function createEventSource(
  input: string,
  options: EventSourceOptions = {}
): Promise<IMidiEventSource> {
  const path = resolveDevicePath(input, options.deviceDir);

  let info: Stats;
  try {
    info = await stat(path);
  } catch (err) {
    throw new DeviceUnavailableError(`MIDI input ${input} not found`, { cause: err });
  }

  if (info.isCharacterDevice() || info.isFIFO()) {
    return new RawMidiDeviceSource({ devicePath: path, clock: options.clock });
  }
  if (info.isFile()) {
    return new MidiFileSource({ filePath: path });
  }
  throw new DeviceUnavailableError(`MIDI input ${input} is neither a port nor a file`);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
