/**
 * Default values for the batch reader. Overridden by a config file, then by
 * explicit call options.
 */
export const READER_DEFAULTS = {
  warn: true,
  processes: 0,
  chunkSize: 1000,
  ordered: true,
} as const;

/**
 * Chunks allowed in flight per worker before the reader waits for results.
 */
export const IN_FLIGHT_PER_WORKER = 2;

/**
 * Metacharacters of the trn transcript body.
 */
export const TRN_SYNTAX = {
  ALT_OPEN: "{",
  ALT_SEPARATOR: "/",
  ALT_CLOSE: "}",
  ID_OPEN: "(",
  ID_CLOSE: ")",
} as const;

/**
 * Basename of the compiled worker entry, resolved next to the pool module.
 */
export const WORKER_SCRIPT_BASENAME = "parseWorker.js";

/**
 * Config file lookup.
 */
export const CONFIG_ENV_VAR = "TRN_READER_CONFIG";
export const DEFAULT_CONFIG_BASENAMES = [
  "trn-reader.config.json",
  "trn.config.json",
];
export const MAX_CONFIG_BYTES = 100000;
