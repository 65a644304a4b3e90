export type { CreateKeywardRuntimeOptions, KeywardRuntime } from "./createKeywardRuntime.js";
export { createKeywardRuntime } from "./createKeywardRuntime.js";
