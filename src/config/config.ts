import fs from "fs";
import path from "path";
import { z } from "zod";
import { CONFIG_ENV_VAR, DEFAULT_CONFIG_BASENAMES, MAX_CONFIG_BYTES } from "./constants";
import { createLogger } from "../utils/logger";

const logger = createLogger('config');

/**
 * Reader settings that may come from a config file or from call options.
 */
export const readerSettingsSchema = z
  .object({
    warn: z.boolean(),
    processes: z.number().int().min(0),
    chunkSize: z.number().int().min(1),
    ordered: z.boolean(),
  })
  .partial();

export type ITrnReaderConfig = z.infer<typeof readerSettingsSchema>;

function findConfigPath(): string | null {
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv) {
    const normalized = path.normalize(fromEnv);
    if (normalized.split(path.sep).includes('..') || !normalized.endsWith('.json')) {
      logger.warn(`Invalid config path in ${CONFIG_ENV_VAR}`, { path: fromEnv, reason: "path traversal or invalid extension" });
      return null;
    }
    const p = path.resolve(normalized);
    if (fs.existsSync(p)) return p;
    logger.warn(`Config file named by ${CONFIG_ENV_VAR} does not exist`, { path: p });
    return null;
  }

  const cwd = process.cwd();
  for (const base of DEFAULT_CONFIG_BASENAMES) {
    const p = path.join(cwd, base);
    if (fs.existsSync(p)) return p;
  }
  return null;
}

export function loadConfig(): ITrnReaderConfig {
  const configPath = findConfigPath();
  if (!configPath) return {};

  try {
    const raw = fs.readFileSync(configPath, "utf8");

    if (raw.length > MAX_CONFIG_BYTES) {
      logger.warn("Config file too large, ignoring", { fileSize: raw.length, limit: MAX_CONFIG_BYTES });
      return {};
    }

    const parsed = readerSettingsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.warn("Invalid config, ignoring", { configPath, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) });
      return {};
    }

    logger.debug("Loaded config", { configPath, config: parsed.data });
    return parsed.data;
  } catch (err) {
    logger.warn("Failed to parse config", {
      configPath,
      error: err instanceof Error ? err.message : 'Unknown error'
    });
    return {};
  }
}

export default loadConfig;
