import type { Command } from "commander";
import { createInterface } from "node:readline";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  writeConfigFile,
  getConfigPath,
  toSettings,
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
} from "../config";
import type { ConfigData } from "../config";
import { fail } from "./common";

function createPrompter() {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) return Promise.resolve("");
      return new Promise((resolve) => {
        rl.question(prompt, (answer) => resolve(answer));
        rl.once("close", () => resolve(""));
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.breachgrid/config.json)");

  configCmd.action(async () => {
    try {
      await runWizard();
    } catch (err: unknown) {
      fail(err);
    }
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      try {
        const configKey = requireKey(key);
        // Throws with a readable message when the value is not usable.
        toSettings({ ...DEFAULTS, [configKey]: value });
        await updateConfigFile(configKey, value);
        console.log(`Set ${configKey} = ${value}`);
      } catch (err: unknown) {
        fail(err);
      }
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      try {
        const resolved = await resolveConfig();
        console.log(resolved[requireKey(key)]);
      } catch (err: unknown) {
        fail(err);
      }
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      try {
        await printConfigList();
      } catch (err: unknown) {
        fail(err);
      }
    });
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const prompter = createPrompter();

  console.log("\nbreachgrid configuration");
  console.log("────────────────────────\n");

  try {
    const data: Partial<ConfigData> = { ...existing };
    for (const key of CONFIG_KEYS) {
      const current = existing[key] || DEFAULTS[key];
      const answer = await prompter.ask(`${key} [${current}]: `);
      data[key] = answer.trim() || current;
    }
    toSettings({ ...DEFAULTS, ...data });

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${resolved[key]}`);
    }
    console.log("");
  } finally {
    prompter.close();
  }
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    console.log(`  ${key}: ${resolved[key]}  (${getSource(key, fileData)})`);
  }
  console.log("");
}

export function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

function requireKey(key: string): keyof ConfigData {
  if (!isValidKey(key)) {
    throw new Error(
      `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
    );
  }
  return key;
}

export function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
): string {
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  const fileVal = fileData[key];
  if (fileVal !== undefined && fileVal !== "") return "config file";
  return "default";
}
