export { MidiByteParser } from "./MidiByteParser";
export { PushQueue } from "./PushQueue";
export { RawMidiDeviceSource, type RawMidiDeviceSourceConfig } from "./RawMidiDeviceSource";
export { MidiFileSource, midiDataToRawInputs, type MidiFileSourceConfig } from "./MidiFileSource";
export {
  listMidiDevices,
  resolveDevicePath,
  createEventSource,
  DEFAULT_DEVICE_DIR,
  type EventSourceOptions,
} from "./devices";
