import type { LogLevel } from "../logging/logger.js";

export interface ReviewConfig {
  readonly disabled_rules: readonly string[];
  readonly max_chars: number;
  readonly log_level: LogLevel;
}

export interface ConfigOverrides {
  readonly disable?: readonly string[];
  readonly maxChars?: number;
  readonly logLevel?: LogLevel;
}
