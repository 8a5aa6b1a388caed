/**
 * File Utilities
 *
 * Folder and file creation helpers, used to materialize a sink's parent
 * folder and to save swarm output.
 */

import { existsSync } from "fs";
import { mkdir, writeFile as fsWriteFile } from "fs/promises";
import * as path from "path";
import { formatError, toError } from "../errors";
import type { SwarmLogger } from "../types";

export interface FileWriteFailure {
  name: string;
  error: Error;
}

export interface WriteFilesResult {
  /** Paths written, in completion order */
  written: string[];
  failed: FileWriteFailure[];
}

/**
 * Create a folder (and parents) if it doesn't already exist.
 *
 * @example
 * await ensureFolder("out/run-1");
 */
export async function ensureFolder(folder: string, logger: SwarmLogger = console): Promise<void> {
  if (existsSync(folder)) {
    logger.debug(`[Files] Folder '${folder}' already exists.`);
    return;
  }
  await mkdir(folder, { recursive: true });
  logger.info(`[Files] Folder '${folder}' created.`);
}

/**
 * Write `content` to `folder/name`, creating the folder first.
 * Overwrites an existing file.
 *
 * @returns the written path
 */
export async function writeFile(
  folder: string,
  name: string,
  content: string | Uint8Array,
  logger: SwarmLogger = console
): Promise<string> {
  await ensureFolder(folder, logger);
  const filePath = path.join(folder, name);
  await fsWriteFile(filePath, content);
  logger.info(`[Files] File '${filePath}' created with content.`);
  return filePath;
}

/**
 * Write several files into one folder concurrently.
 *
 * A failed file is logged and reported in `failed`; it does not stop the
 * others and the returned promise does not reject.
 *
 * @example
 * const { written, failed } = await writeFiles("my_folder", {
 *   "file1.txt": "Content 1",
 *   "file3.log": "Log content",
 * });
 */
export async function writeFiles(
  folder: string,
  files: Record<string, string | Uint8Array>,
  logger: SwarmLogger = console
): Promise<WriteFilesResult> {
  const result: WriteFilesResult = { written: [], failed: [] };

  await Promise.all(
    Object.entries(files).map(async ([name, content]) => {
      try {
        result.written.push(await writeFile(folder, name, content, logger));
      } catch (error) {
        logger.error(`[Files] Failed to create file '${path.join(folder, name)}': ${formatError(error)}`);
        result.failed.push({ name, error: toError(error) });
      }
    })
  );

  return result;
}
