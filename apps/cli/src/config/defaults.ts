export interface ConfigData {
  /** Difficulty used when `generate` gets no `--difficulty`. */
  difficulty: string;
  logLevel: string;
  /** Attempts before the generator falls back. */
  maxAttempts: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "difficulty",
  "logLevel",
  "maxAttempts",
];

export const DEFAULTS: ConfigData = {
  difficulty: "medium",
  logLevel: "warn",
  maxAttempts: "20",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  difficulty: "BREACHGRID_DIFFICULTY",
  logLevel: "LOG_LEVEL",
  maxAttempts: "BREACHGRID_MAX_ATTEMPTS",
};
