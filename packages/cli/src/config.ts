/**
 * Tally execution configuration loader.
 * Precedence: ./.tallyrc.json > ~/.tally/config.json > defaults
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { DEFAULT_HEAP_LIMIT, DEFAULT_MEMORY_LIMIT } from "@tally/core";

const limitSchema = z.number().int().nonnegative();

export const configFileSchema = z
  .object({
    maxSteps: z.number().int().positive().optional(),
    memoryLimit: limitSchema.optional(),
    heapLimit: limitSchema.optional(),
  })
  .strict();

export interface TallyConfig {
  maxSteps?: number;
  memoryLimit: number;
  heapLimit: number;
}

export interface ResolvedConfig {
  config: TallyConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(filePath: string, message: string) {
    super(`Invalid configuration in ${filePath}: ${message}`);
    this.name = "ConfigError";
    this.path = filePath;
  }
}

export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".tallyrc.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".tally", "config.json");

  const projectConfig = loadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = loadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return {
    config: { memoryLimit: DEFAULT_MEMORY_LIMIT, heapLimit: DEFAULT_HEAP_LIMIT },
    source: "default",
    path: null,
  };
}

/**
 * Returns null when the file does not exist; throws ConfigError when it
 * exists but cannot be used.
 */
function loadConfigFile(filePath: string): TallyConfig | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(filePath, msg);
  }

  const parsed = configFileSchema.safeParse(data);
  if (!parsed.success) {
    const msg = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError(filePath, msg);
  }

  return {
    maxSteps: parsed.data.maxSteps,
    memoryLimit: parsed.data.memoryLimit ?? DEFAULT_MEMORY_LIMIT,
    heapLimit: parsed.data.heapLimit ?? DEFAULT_HEAP_LIMIT,
  };
}
