/**
 * Reading identifier lists for `--ids-file`
 *
 */

import { readFile } from "node:fs/promises";
import { ValidationError } from "./errors.js";

/**
 * Read one identifier per line; blank lines and lines starting with `#` are skipped
 *
 * @param filePath - Path of the list
 * @returns Identifiers in file order
 * @throws {@link ValidationError} when the file cannot be read
 *
 * @public
 */
export async function readIdsFile(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ValidationError(
      `Cannot read identifier file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      "idsFile",
      filePath,
    );
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
