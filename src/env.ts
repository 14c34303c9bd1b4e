import fs from "fs";
import path from "path";

export function loadEnvFile(envPath: string, env: NodeJS.ProcessEnv = process.env): number {
  if (!fs.existsSync(envPath)) return 0;

  const content = fs.readFileSync(envPath, "utf-8");
  let applied = 0;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const normalized = trimmed.startsWith("export ")
      ? trimmed.slice("export ".length)
      : trimmed;
    const eqIndex = normalized.indexOf("=");
    if (eqIndex <= 0) continue;

    const key = normalized.slice(0, eqIndex).trim();
    if (!key) continue;
    if (Object.prototype.hasOwnProperty.call(env, key)) continue;

    let value = normalized.slice(eqIndex + 1).trim();
    if (
      (value.startsWith("\"") && value.endsWith("\"")) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    env[key] = value;
    applied += 1;
  }

  return applied;
}

loadEnvFile(path.resolve(process.cwd(), process.env.ENV_FILE || ".env"));
