export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  loadConfig,
  mergeConfig,
  parseConfig,
} from "./config-loader.js";
export type { LoadConfigOptions } from "./config-loader.js";
export type { ConfigOverrides, ReviewConfig } from "./types.js";
