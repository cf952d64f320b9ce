#!/usr/bin/env node

/**
 * CLI entry point for harness-synth
 *
 * Usage:
 *   harness-synth <main.c | ast.json | -> [options]
 *   clang -Xclang -ast-dump=json -fsyntax-only main.c | harness-synth - -p main.c
 *
 * Writes the harness to stdout and diagnostics to stderr.
 */

import * as fs from 'fs';
import * as path from 'path';
import { generateHarnessFromFile, isCSource, HarnessError, type HarnessOptions, type ClangOptions } from './index.js';

export interface CliOptions extends HarnessOptions, ClangOptions {
  help?: boolean;
  version?: boolean;
  doctor?: boolean;
  quiet?: boolean;
}

/** Where the CLI writes; swapped out in tests. */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const version = '0.1.0';

const PREFIX = '[harness-synth]';

class UsageError extends Error {}

function helpText(): string {
  return `
harness-synth v${version}

USAGE:
  harness-synth <input> [options]

DESCRIPTION:
  Generate a C harness that reads the arguments of a function from stdin
  and calls it. <input> is a C file (run through clang), a JSON AST dump
  from "clang -Xclang -ast-dump=json -fsyntax-only", or - for stdin.

OPTIONS:
  -h, --help                     Show this help message
  -v, --version                  Show version number
      --doctor                   Output diagnostic information for debugging

  -f, --function <name>          Harness this function instead of the last one
  -p, --primaryFile <path>       File whose functions are candidates
      --baseDir <path>           Directory the AST's file names are relative to
      --allowOtherFiles          Fall back to functions outside the primary file

  -m, --main                     Wrap the harness in int main(void)
  -i, --include <file>           #include "<file>" above main (repeatable)

      --clang <path>             clang executable (default: clang)
      --clangArg <arg>           Extra argument for clang (repeatable)

  -q, --quiet                    No diagnostics on stderr
      --verbose                  Also list the locals of every parameter

EXAMPLES:
  # Harness the last function of main.c
  harness-synth main.c

  # Complete program that includes the source under test
  harness-synth main.c --main --include main.c > harness.c

  # From a saved dump
  harness-synth main.ast.json --primaryFile main.c --function parse_header
`;
}

export function parseArgs(args: string[]): { inputPath: string | null; options: CliOptions } {
  const options: CliOptions = {};
  let inputPath: string | null = null;

  const value = (i: number, flag: string): string => {
    const next = args[i];
    if (next === undefined) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '-v' || arg === '--version') {
      options.version = true;
    } else if (arg === '--doctor') {
      options.doctor = true;
    } else if (arg === '-f' || arg === '--function') {
      options.functionName = value(++i, arg);
    } else if (arg === '-p' || arg === '--primaryFile') {
      options.primaryFile = value(++i, arg);
    } else if (arg === '--baseDir') {
      options.baseDir = value(++i, arg);
    } else if (arg === '--allowOtherFiles') {
      options.requirePrimaryFile = false;
    } else if (arg === '-m' || arg === '--main') {
      options.wrapInMain = true;
    } else if (arg === '-i' || arg === '--include') {
      options.includes = [...(options.includes ?? []), value(++i, arg)];
    } else if (arg === '--clang') {
      options.clangPath = value(++i, arg);
    } else if (arg === '--clangArg') {
      options.clangArgs = [...(options.clangArgs ?? []), value(++i, arg)];
    } else if (arg === '-q' || arg === '--quiet') {
      options.quiet = true;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unknown option: ${arg}\nRun with --help to see available options`);
    } else if (!inputPath) {
      // First non-flag argument is the input
      inputPath = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return { inputPath, options };
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(args: string[], io: CliIO): number {
  if (args.length === 0) {
    io.stdout(helpText());
    return 0;
  }

  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(error.message);
      return 1;
    }
    throw error;
  }
  const { inputPath, options } = parsed;

  if (options.help) {
    io.stdout(helpText());
    return 0;
  }

  if (options.version) {
    io.stdout(version);
    return 0;
  }

  if (!inputPath) {
    io.stderr('Error: No input file specified');
    io.stderr('Usage: harness-synth <input> [options]');
    io.stderr('Run with --help for more information');
    return 1;
  }

  const absolutePath = inputPath === '-' ? inputPath : path.resolve(process.cwd(), inputPath);

  if (options.doctor) {
    io.stdout(JSON.stringify(doctor(inputPath, absolutePath, options), null, 2));
    return 0;
  }

  if (absolutePath !== '-' && !fs.existsSync(absolutePath)) {
    io.stderr(`Error: File not found: ${inputPath}`);
    return 1;
  }

  const { help, version: _version, doctor: _doctor, quiet, ...harnessOptions } = options;
  try {
    const result = generateHarnessFromFile(absolutePath, {
      ...harnessOptions,
      onDiagnostic: quiet ? undefined : (message) => io.stderr(`${PREFIX} ${message}`),
    });
    io.stdout(result.code.trimEnd());
    return 0;
  } catch (error) {
    const label = error instanceof HarnessError ? error.kind : 'Error';
    io.stderr(`${label}: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

function doctor(inputPath: string, absolutePath: string, options: CliOptions): Record<string, unknown> {
  const { help, version: _version, doctor: _doctor, ...harnessOptions } = options;
  const exists = absolutePath !== '-' && fs.existsSync(absolutePath);

  const input: Record<string, unknown> = {
    inputPath,
    absolutePath,
    fileExists: exists,
    mode: isCSource(inputPath) ? 'clang' : 'ast-json',
  };

  if (exists) {
    const stats = fs.statSync(absolutePath);
    input.fileSize = stats.size;
    input.modified = stats.mtime.toISOString();
  }

  const diagnostics: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    version,
    environment: {
      nodeVersion: process.version,
      platform: process.platform,
      arch: process.arch,
      cwd: process.cwd(),
    },
    input,
    options: harnessOptions,
  };

  const messages: string[] = [];
  try {
    const result = generateHarnessFromFile(absolutePath, {
      ...harnessOptions,
      verbose: true,
      onDiagnostic: (message) => messages.push(message),
    });
    diagnostics.generationResult = {
      success: true,
      translationUnit: result.translationUnit,
      target: { name: result.target.name, file: result.target.file, line: result.target.line },
      code: result.code,
    };
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    diagnostics.generationResult = {
      success: false,
      error: {
        kind: error instanceof HarnessError ? error.kind : undefined,
        message: failure.message,
        stack: failure.stack,
      },
    };
  }
  diagnostics.messages = messages;

  return diagnostics;
}

function main(): void {
  const code = runCli(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
  process.exit(code);
}

if (require.main === module) {
  main();
}
