import { isDifficulty, isLogLevel } from "@breachgrid/core";
import type { Difficulty, LogLevel } from "@breachgrid/core";
import type { ConfigData } from "./defaults";
import { resolveConfig } from "./resolve";

/** Resolved config with every value checked and converted. */
export interface Settings {
  difficulty: Difficulty;
  logLevel: LogLevel;
  maxAttempts: number;
}

let _settings: Settings | null = null;

export function toSettings(config: ConfigData): Settings {
  if (!isDifficulty(config.difficulty)) {
    throw new Error(
      `Invalid difficulty "${config.difficulty}". ` +
        "Use easy, medium, hard or expert.",
    );
  }
  if (!isLogLevel(config.logLevel)) {
    throw new Error(`Invalid log level "${config.logLevel}".`);
  }
  const maxAttempts = Number(config.maxAttempts);
  if (!Number.isInteger(maxAttempts) || maxAttempts < 0) {
    throw new Error(
      `Invalid maxAttempts "${config.maxAttempts}". ` +
        "Use a whole number, 0 or more.",
    );
  }
  return {
    difficulty: config.difficulty,
    logLevel: config.logLevel,
    maxAttempts,
  };
}

export async function initConfig(): Promise<Settings> {
  _settings = toSettings(await resolveConfig());
  return _settings;
}

export function getConfig(): Settings {
  if (!_settings) {
    throw new Error(
      "Config not initialized. Call initConfig() before accessing config.",
    );
  }
  return _settings;
}
