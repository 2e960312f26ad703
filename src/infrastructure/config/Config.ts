import dotenv from "dotenv";
import { readFileSync, existsSync } from "fs";
import { isAbsolute, normalize } from "path";
import type { LogLevel } from "../../domain/ports/ILogger.js";

// Load environment variables (for standalone mode)
dotenv.config();

const ADDON_OPTIONS_PATH = "/data/options.json";
const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export interface AppConfig {
  http: {
    port: number;
    host: string;
  };
  paths: {
    /** Home Assistant configuration directory */
    configDir: string;
    /** Add-on private data directory (saved settings) */
    dataDir: string;
    /** Generated package, relative to configDir */
    packagePath: string;
  };
  generator: {
    prefix: string;
    dwellSeconds: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  isAddon: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check if running as Home Assistant Add-on
 */
function isHomeAssistantAddon(): boolean {
  return existsSync(ADDON_OPTIONS_PATH) || !!process.env.SUPERVISOR_TOKEN;
}

/**
 * Load add-on options from Home Assistant Supervisor
 */
export function loadAddonOptions(path: string = ADDON_OPTIONS_PATH): Record<string, unknown> {
  if (!existsSync(path)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function optionString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function optionNumber(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function toLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/**
 * Load configuration - supports both add-on and standalone modes
 *
 * Add-on options (/data/options.json) take precedence over environment
 * variables; standalone runs read a .env file.
 */
export function loadConfig(): AppConfig {
  const isAddon = isHomeAssistantAddon();
  const options = isAddon ? loadAddonOptions() : {};

  return {
    http: {
      port: getEnvNumber("HTTP_PORT", 8099),
      host: getEnvOrDefault("HTTP_HOST", "0.0.0.0"),
    },
    paths: {
      configDir: getEnvOrDefault("CONFIG_DIR", "/config"),
      dataDir: getEnvOrDefault("DATA_DIR", isAddon ? "/data" : "./data"),
      packagePath:
        optionString(options, "package_path") ??
        getEnvOrDefault("PACKAGE_PATH", "packages/location_lighting_mode_generated.yaml"),
    },
    generator: {
      prefix: optionString(options, "entity_prefix") ?? getEnvOrDefault("ENTITY_PREFIX", "llm"),
      dwellSeconds: optionNumber(options, "dwell_seconds") ?? getEnvNumber("DWELL_SECONDS", 300),
    },
    logging: {
      level: toLogLevel(optionString(options, "log_level") ?? getEnvOrDefault("LOG_LEVEL", "info")),
      // Structured logging for add-on
      pretty: !isAddon && process.env.NODE_ENV !== "production",
    },
    isAddon,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (config.http.port < 1 || config.http.port > 65535) {
    throw new Error("HTTP_PORT must be between 1 and 65535");
  }

  const packagePath = normalize(config.paths.packagePath);
  if (isAbsolute(packagePath) || packagePath.startsWith("..")) {
    throw new Error("PACKAGE_PATH must be relative to the Home Assistant config directory");
  }
  if (!/\.ya?ml$/.test(packagePath)) {
    throw new Error("PACKAGE_PATH must point to a .yaml file");
  }

  if (!/^[a-z][a-z0-9_]*$/.test(config.generator.prefix)) {
    throw new Error("ENTITY_PREFIX must start with a letter and use only a-z, 0-9 and _");
  }

  if (!Number.isInteger(config.generator.dwellSeconds) || config.generator.dwellSeconds < 0) {
    throw new Error("DWELL_SECONDS must be a whole number of seconds, 0 or more");
  }
}
