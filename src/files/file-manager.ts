/**
 * FileManager - Reads report inputs and writes result files
 */

import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";

export type ReportIOKind = "input" | "output";

/**
 * Filesystem failure at the tool boundary
 */
export class ReportIOError extends Error {
  constructor(
    readonly kind: ReportIOKind,
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ReportIOError";
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read a text report. Invalid UTF-8 sequences become U+FFFD instead of failing.
 */
export async function readTextInput(path: string, label = "input"): Promise<string> {
  try {
    const buffer = await readFile(path);
    return buffer.toString("utf-8");
  } catch (error) {
    throw new ReportIOError("input", path, `Cannot read ${label} '${path}': ${describe(error)}`, {
      cause: error,
    });
  }
}

/**
 * Write a file, creating parent directories. Content goes to a temp file
 * beside the target and is renamed into place.
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${process.pid}.tmp`);

  let dirReady = false;

  try {
    await mkdir(dir, { recursive: true });
    dirReady = true;
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
  } catch (error) {
    if (dirReady) {
      await rm(tempPath, { force: true });
    }
    throw new ReportIOError("output", path, `Cannot write '${path}': ${describe(error)}`, {
      cause: error,
    });
  }
}

/**
 * Write a value as pretty-printed JSON
 */
export async function writeJsonOutput(path: string, value: unknown): Promise<void> {
  await writeOutputFile(path, `${JSON.stringify(value, null, 2)}\n`);
}
