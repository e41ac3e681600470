import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import type { ConfigData } from "./defaults";

/** `BREACHGRID_HOME` moves the whole config directory. */
export function getConfigDir(): string {
  return process.env.BREACHGRID_HOME || join(homedir(), ".breachgrid");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function toConfigData(parsed: unknown): Partial<ConfigData> {
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  const data: Partial<ConfigData> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") continue;
    if (key === "difficulty" || key === "logLevel" || key === "maxAttempts") {
      data[key] = value;
    }
  }
  return data;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  try {
    const raw = await readFile(path, "utf-8");
    return toConfigData(JSON.parse(raw));
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "breachgrid config" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(
    getConfigPath(),
    JSON.stringify(data, null, 2) + "\n",
    "utf-8",
  );
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
