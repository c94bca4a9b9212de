import fs from "fs";
import { join, normalize } from "path";

/**
 * Safely join paths. Ensure the joined path won't escape the base path.
 */
export function safelyJoinPath(basePath: string, ...paths: string[]) {
  // path.normalize ensures the `../`s is on the left side of the result path
  const childPath = normalize(join(...paths));
  if (childPath.startsWith(".."))
    throw new Error(
      `Invalid path join: ${JSON.stringify(
        {
          basePath,
          paths
        },
        null,
        2
      )}`
    );

  return join(basePath, childPath);
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Read a whole text file. A missing file reads as empty when `missingAsEmpty` is set, e.g. a
 * contestant's program that never wrote its output.
 */
export async function readTextFile(filePath: string, missingAsEmpty = false): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, "utf-8");
  } catch (e) {
    if (missingAsEmpty && isErrnoException(e) && e.code === "ENOENT") return "";
    throw e;
  }
}
