// ============================================================================
// Path Utilities - Compare the file names clang reports
// ============================================================================

import * as path from "path";

/**
 * clang's own buffers ("<built-in>", "<command line>", "<scratch space>")
 * are not files.
 */
export function isPseudoFile(file: string): boolean {
  return file.startsWith("<") && file.endsWith(">");
}

/** Absolute form of a file name as clang printed it (relative to where clang ran). */
export function resolveSourcePath(file: string, baseDir: string): string {
  return path.normalize(path.resolve(baseDir, file));
}

export function isSameFile(a: string, b: string, baseDir: string): boolean {
  return resolveSourcePath(a, baseDir) === resolveSourcePath(b, baseDir);
}

/**
 * Key for an unnamed record, matching the "at main.c:3:9" suffix clang puts
 * in spellings such as "struct (unnamed struct at main.c:3:9)".
 */
export function locationKey(file: string, line: number, column: number, baseDir: string): string {
  return `${resolveSourcePath(file, baseDir)}:${line}:${column}`;
}

/** `locationKey` of a "dir/main.c:3:9" suffix, or null when it has no line and column. */
export function parseLocationKey(text: string, baseDir: string): string | null {
  const match = /^(.*):(\d+):(\d+)$/.exec(text);
  if (!match) return null;
  return locationKey(match[1], Number(match[2]), Number(match[3]), baseDir);
}
