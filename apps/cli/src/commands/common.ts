import { randomBytes } from "node:crypto";
import { log } from "@breachgrid/core";
import type { Settings } from "../config";

export function newSeed(): string {
  return randomBytes(8).toString("hex");
}

export function applyLogLevel(settings: Settings): void {
  log.level(settings.logLevel);
}

export function fail(err: unknown): never {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

export function parseWholeNumber(value: string, name: string, min = 0): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(
      `${name} must be a whole number, ${min} or more (got "${value}")`,
    );
  }
  return n;
}
