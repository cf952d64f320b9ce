// ============================================================================
// Clang - Produces the JSON AST dump for a C source file
// ============================================================================

import { execFileSync } from "child_process";

export interface ClangOptions {
  /** clang executable. Default: "clang" */
  clangPath?: string;
  /** Extra arguments placed before the file, e.g. include paths and defines */
  clangArgs?: string[];
  /** Working directory for clang; file names in the dump are relative to it */
  cwd?: string;
}

// Dumps of translation units that include libc headers run to tens of megabytes.
const MAX_DUMP_BYTES = 512 * 1024 * 1024;

export function clangDumpArguments(sourcePath: string, extraArgs: string[] = []): string[] {
  return ["-Xclang", "-ast-dump=json", "-fsyntax-only", ...extraArgs, sourcePath];
}

/** Run clang on `sourcePath` and parse the AST it prints. */
export function dumpClangAst(sourcePath: string, options: ClangOptions = {}): unknown {
  const clang = options.clangPath ?? "clang";
  let output: string;

  try {
    output = execFileSync(clang, clangDumpArguments(sourcePath, options.clangArgs), {
      cwd: options.cwd,
      encoding: "utf-8",
      maxBuffer: MAX_DUMP_BYTES,
      stdio: ["ignore", "pipe", "pipe"],
    });
  } catch (err) {
    const stderr = err instanceof Error && "stderr" in err ? String(err.stderr ?? "").trim() : "";
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to run ${clang} on ${sourcePath}: ${stderr || message}`);
  }

  try {
    return JSON.parse(output);
  } catch (err) {
    throw new Error(`${clang} did not print a JSON AST for ${sourcePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
