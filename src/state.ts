import { readFile, writeFile, mkdir, rename } from "node:fs/promises";
import { dirname } from "node:path";

/** Write JSON atomically: write to .tmp then rename */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeTextAtomic(filePath, JSON.stringify(data, null, 2));
}

export async function writeTextAtomic(filePath: string, text: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmp = filePath + ".tmp";
  await writeFile(tmp, text, "utf-8");
  await rename(tmp, filePath);
}

export async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf-8");
  return JSON.parse(raw);
}

/** Like readJson, but a missing file yields null */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
  try {
    return await readJson(filePath);
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    // Re-throw corrupted JSON
    throw err;
  }
}
