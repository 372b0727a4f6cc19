import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { PromptStorageError, toError } from "../errors";
import type { Logger } from "../logger";
import { err, ok, type Result } from "../result";

function isFileNotFound(error: unknown): boolean {
  return typeof error === "object"
    && error !== null
    && "code" in error
    && error.code === "ENOENT";
}

/**
 * Reads a JSON document. A missing file is `null`; so is unparseable
 * content, which is logged and otherwise treated as absent.
 */
export async function readJsonFile(
  path: string,
  logger: Logger,
): Promise<Result<unknown, PromptStorageError>> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isFileNotFound(error)) {
      return ok(null);
    }

    return err(new PromptStorageError(`Unable to read ${path}`, "STORAGE_READ_FAILED", toError(error)));
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (error) {
    logger.warn("Discarding unparseable state file", { path, error: toError(error) });
    return ok(null);
  }
}

/** Writes to `<path>.tmp` then renames over the target. */
export async function writeJsonFile(path: string, value: unknown): Promise<Result<void, PromptStorageError>> {
  const tmpPath = `${path}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
    await rename(tmpPath, path);
    return ok(undefined);
  } catch (error) {
    return err(new PromptStorageError(`Unable to write ${path}`, "STORAGE_WRITE_FAILED", toError(error)));
  }
}

export async function deleteJsonFile(path: string): Promise<Result<void, PromptStorageError>> {
  try {
    await unlink(path);
    return ok(undefined);
  } catch (error) {
    if (isFileNotFound(error)) {
      return ok(undefined);
    }

    return err(new PromptStorageError(`Unable to delete ${path}`, "STORAGE_DELETE_FAILED", toError(error)));
  }
}
