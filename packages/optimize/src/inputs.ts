import { promises as fs } from "node:fs";
import { join } from "node:path";

export const PNG_FILE = /\.a?png$/;

/** Output directory, explicit paths, or a mapping from input path. */
export type OutputSpec = string | string[] | ((input: string) => string);

export type ResolvedPaths = { inputs: string[]; outputs: string[] };

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

/** PNG/APNG files under `dir`, relative and sorted. */
export async function listPngFiles(dir: string, recursive: boolean): Promise<string[]> {
  const found: string[] = [];
  const walk = async (rel: string): Promise<void> => {
    const entries = await fs.readdir(join(dir, rel), { withFileTypes: true });
    for (const e of entries) {
      const child = rel ? `${rel}/${e.name}` : e.name;
      if (e.isDirectory()) {
        if (recursive) await walk(child);
      } else if (PNG_FILE.test(e.name)) {
        found.push(child);
      }
    }
  };
  await walk("");
  return found.sort();
}

/**
 * Expands a directory input to its PNG files and pairs every input with an
 * output path. Omitted output means overwrite in place.
 */
export async function resolveInputs(
  input: string | string[],
  output?: OutputSpec,
  opts: { recursive?: boolean } = {}
): Promise<ResolvedPaths> {
  if (typeof input === "string" && (await isDirectory(input))) {
    const files = await listPngFiles(input, opts.recursive ?? true);
    const inputs = files.map((f) => join(input, f));
    if (output === undefined) return { inputs, outputs: inputs };
    if (typeof output === "function") return { inputs, outputs: inputs.map(output) };
    if (typeof output === "string") return { inputs, outputs: files.map((f) => join(output, f)) };
    throw new TypeError("a directory input needs an output directory or a mapping function");
  }

  const inputs = typeof input === "string" ? [input] : input;
  if (output === undefined) return { inputs, outputs: inputs };
  if (typeof output === "function") return { inputs, outputs: inputs.map(output) };
  return { inputs, outputs: typeof output === "string" ? [output] : output };
}
