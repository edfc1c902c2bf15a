import { config as loadEnvFile } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

let loaded = false;

function serviceRoot() {
  return path.resolve(fileURLToPath(new URL("..", import.meta.url)));
}

export function loadLocalEnv() {
  if (loaded) return;
  loaded = true;
  const root = serviceRoot();
  const candidates: Array<{ file: string; override: boolean }> = [
    { file: ".env", override: false },
    { file: ".env.local", override: true },
  ];

  for (const candidate of candidates) {
    const envPath = path.join(root, candidate.file);
    if (!existsSync(envPath)) continue;
    loadEnvFile({ path: envPath, override: candidate.override });
  }
}
