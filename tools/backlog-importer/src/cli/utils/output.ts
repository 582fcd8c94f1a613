import * as fs from 'node:fs';
import * as path from 'node:path';

/** Output flags shared by every command. */
export interface OutputOptions {
  pretty: boolean;
  output?: string;
}

/**
 * What a command produced: a JSON payload, an optional human-readable
 * rendering for `--pretty`, and the exit code the run deserves.
 */
export interface CommandResult {
  json: unknown;
  text?: string;
  exitCode: number;
}

/**
 * One JSON line by default. Under `--pretty`, the text rendering when the
 * command has one, else indented JSON.
 */
export function renderResult(result: CommandResult, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(result.json) + '\n';
  }
  return result.text ?? JSON.stringify(result.json, null, 2) + '\n';
}

/**
 * Write to `outputPath` (creating its directory) or to stdout. The written
 * path is reported on stderr so stdout stays clean.
 */
export function writeOutput(content: string, outputPath?: string): void {
  if (outputPath) {
    const resolved = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, content);
    process.stderr.write(`Written to ${resolved}\n`);
  } else {
    process.stdout.write(content);
  }
}

/** Render and write a command result; returns its exit code. */
export function emitResult(result: CommandResult, options: OutputOptions): number {
  writeOutput(renderResult(result, options.pretty), options.output);
  return result.exitCode;
}

/** Print `Error: <message>` on stderr; returns the exit code to use. */
export function reportError(err: unknown, exitCode = 2): number {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  return exitCode;
}
