/**
 * Storage layer barrel export
 */

export { ConfigStore, CONFIG_KEYS, isConfigKey } from "./config-store.js";
export type { ConfigKey } from "./config-store.js";
