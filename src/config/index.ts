export type { Env } from "./settings.js";
export { loadMemoryConfig, parseIntOr } from "./settings.js";
