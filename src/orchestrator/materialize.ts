import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export function writeJson(runId: string, fileName: string, obj: unknown, root = "runs") {
  const dir = join(root, runId);
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, JSON.stringify(obj, null, 2), "utf-8");
  return path;
}
