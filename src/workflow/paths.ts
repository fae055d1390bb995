import path from "node:path";
import { DeclarationError } from "../errors.js";
import type { FilePath } from "../types/contracts.js";

/**
 * Characters no path may contain: make cannot express them in a target or
 * prerequisite list, even escaped.
 */
export const UNSUPPORTED_PATH_CHARS: readonly string[] = ["\n", "\r", "\0", "\t", "\\", ";", "=", "|"];

export function normPath(raw: string): FilePath {
  for (const ch of UNSUPPORTED_PATH_CHARS) {
    if (raw.includes(ch)) {
      throw new DeclarationError(`path ${JSON.stringify(raw)} contains unsupported character ${JSON.stringify(ch)}`);
    }
  }
  const p = path.posix.normalize(raw);
  return p.length > 1 && p.endsWith("/") ? p.slice(0, -1) : p;
}

/**
 * Accepts a single path or a list; empty strings are dropped, duplicates keep
 * their first position.
 */
export function toPathList(value: FilePath | readonly FilePath[] | undefined): FilePath[] {
  if (value === undefined) return [];
  const list = typeof value === "string" ? [value] : value;
  const out: FilePath[] = [];
  for (const item of list) {
    if (item.length === 0) continue;
    const p = normPath(item);
    if (!out.includes(p)) out.push(p);
  }
  return out;
}

export function toCommandList(value: string | readonly string[]): string[] {
  const list = typeof value === "string" ? [value] : [...value];
  if (list.length === 0) throw new DeclarationError("a step needs at least one command");
  for (const cmd of list) {
    if (cmd.trim().length === 0) throw new DeclarationError("commands must not be empty");
    if (cmd.includes("\0")) throw new DeclarationError("commands must not contain NUL bytes");
  }
  return list;
}
