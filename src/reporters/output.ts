/**
 * Shared file output for reporters.
 *
 * @module reporters/output
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ErrorCode, StratifyError } from "../core/types.js";

/**
 * Write a text file, creating parent directories as needed.
 *
 * @throws StratifyError (FILE_WRITE_FAILED) when the write fails
 */
export async function writeOutputFile(filePath: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf8");
  } catch (error) {
    throw new StratifyError(
      `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.FILE_WRITE_FAILED,
      { path: filePath },
    );
  }
}
