import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { ZodError } from "zod";
import { ConfigurationError } from "../errors";
import { fileExists } from "./file-exists";
import type {
  ConversionConfig,
  PartialConversionConfig,
  ConfigError,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("docbatch", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 * A broken default file is fatal: nothing sensible can run without it
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  try {
    const content = await readFile(defaultConfigPath, "utf-8");
    return ConversionConfigSchema.parse(JSON.parse(content));
  } catch (error) {
    throw new ConfigurationError(
      `Invalid default configuration at ${defaultConfigPath}: ${describeConfigError(error)}`,
      { cause: error },
    );
  }
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialConversionConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: override.input ?? base.input,
    output: override.output ?? base.output,
    metadata: override.metadata ?? base.metadata,
    converter: { ...base.converter, ...override.converter },
    workers: { ...base.workers, ...override.workers },
    backends: {
      docling: { ...base.backends.docling, ...override.backends?.docling },
      marker: { ...base.backends.marker, ...override.backends?.marker },
      llamaparse: {
        ...base.backends.llamaparse,
        ...override.backends?.llamaparse,
      },
    },
    logging: { ...base.logging, ...override.logging },
  };
}

export interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Unreadable user/custom files are reported in `errors` and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

/**
 * One-line description of a config loading failure
 */
export function describeConfigError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
