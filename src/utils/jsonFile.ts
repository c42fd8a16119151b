/**
 * JSON file reading with domain-specific errors
 */

import * as fs from "fs";
import { describeError } from "./errors";

/**
 * Read and parse a JSON file.
 *
 * @param toError - Builds the error thrown when the file cannot be read or parsed
 * @returns The parsed value, still unvalidated
 */
export function readJsonFile(
  filePath: string,
  toError: (reason: string) => Error,
): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw toError(`cannot read ${filePath}: ${describeError(err)}`);
  }

  try {
    return JSON.parse(content);
  } catch (err) {
    throw toError(`${filePath} is not valid JSON: ${describeError(err)}`);
  }
}
