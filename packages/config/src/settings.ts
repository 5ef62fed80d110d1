// packages/config/src/settings.ts
import { promises as fs } from "node:fs";
import { resolve } from "node:path";

export async function ensureDir(p: string): Promise<void> {
  await fs.mkdir(p, { recursive: true });
}

// ───────────────────────── Settings file ─────────────────────────
// Canonical path (preferred) and legacy fallback, both relative to the working directory
export function settingsFile(env: NodeJS.ProcessEnv = process.env): string {
  return env.PNGSLIM_SETTINGS_FILE ?? resolve(process.cwd(), "pngslim.settings.json");
}

export function legacySettingsFile(): string {
  return resolve(process.cwd(), ".pngslimrc.json");
}

type JsonObject = Record<string, unknown>;

function isObject(x: unknown): x is JsonObject {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

export function deepMerge(base: JsonObject, override: JsonObject): JsonObject {
  const out: JsonObject = { ...base };
  for (const [k, v] of Object.entries(override)) {
    const prev = out[k];
    if (isObject(v) && isObject(prev)) out[k] = deepMerge(prev, v);
    else out[k] = v;
  }
  return out;
}

async function readJson(file: string): Promise<JsonObject | null> {
  let txt: string;
  try {
    txt = await fs.readFile(file, "utf8");
  } catch (err) {
    if (isObject(err) && err.code === "ENOENT") return null;
    throw err;
  }
  const parsed: unknown = JSON.parse(txt);
  if (!isObject(parsed)) throw new Error(`[config] ${file} must hold a JSON object`);
  return parsed;
}

export async function readSettings(file: string = settingsFile()): Promise<JsonObject> {
  // Read canonical and legacy, merge if both present (legacy fills gaps)
  const [primary, legacy] = await Promise.all([readJson(file), readJson(legacySettingsFile())]);
  if (primary && legacy) return deepMerge(legacy, primary);
  return primary ?? legacy ?? {};
}
