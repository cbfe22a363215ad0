import fs from "fs";
import path from "path";

export function parseEnvFile(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  const lines = content.split(/\r?\n/);

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const normalized = trimmed.startsWith("export ")
      ? trimmed.slice("export ".length)
      : trimmed;
    const eqIndex = normalized.indexOf("=");
    if (eqIndex <= 0) continue;

    const key = normalized.slice(0, eqIndex).trim();
    if (!key) continue;

    let value = normalized.slice(eqIndex + 1).trim();
    if (
      (value.startsWith("\"") && value.endsWith("\"")) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    entries[key] = value;
  }

  return entries;
}

// Variables already present in the environment win over the file.
export function loadEnvFile(filePath: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(filePath)) return;
  const entries = parseEnvFile(fs.readFileSync(filePath, "utf-8"));
  for (const [key, value] of Object.entries(entries)) {
    if (Object.prototype.hasOwnProperty.call(env, key)) continue;
    env[key] = value;
  }
}

loadEnvFile(path.resolve(process.cwd(), ".env"));
