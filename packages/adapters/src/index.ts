export * from "./midi";
export {
  playReferenceTone,
  type ReferenceToneOptions,
  type SpawnFn,
  type SpawnedProcess,
} from "./tone/ReferenceTone";
