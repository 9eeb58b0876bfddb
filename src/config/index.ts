export { configSchema } from "./schema.js";
export type { AppConfig } from "./schema.js";
export { loadConfig, loadConfigSourceSnapshots } from "./loader.js";
export type { ConfigSourceSnapshots, PartialConfig } from "./loader.js";
