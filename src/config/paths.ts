import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["WARDEN_STATE_DIR"] ?? join(homedir(), ".warden");
}

export function getConfigPath(): string {
  return process.env["WARDEN_CONFIG_PATH"] ?? "warden.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
