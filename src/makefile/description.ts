import { mkdtemp, readFile, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Writes the description only when its content differs, so an unchanged
 * workflow keeps the file's modification time.
 */
export async function writeIfChanged(file: string, text: string): Promise<boolean> {
  const current = await readFile(file, "utf-8").catch((e: NodeJS.ErrnoException) => {
    if (e.code === "ENOENT") return undefined;
    throw e;
  });
  if (current === text) return false;
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, text, "utf-8");
  return true;
}

export async function withTempDescription<T>(text: string, fn: (file: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "stepmake-"));
  const file = join(dir, "Makefile");
  try {
    await writeFile(file, text, "utf-8");
    return await fn(file);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
