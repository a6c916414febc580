import { rm, writeFile } from 'fs/promises';
import { TempFileCleanupError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Writes `contents` to `path`, hands the path to `use`, and removes the file
 * afterwards whether `use` resolved or threw. A failed removal is only logged.
 */
export async function withTemporaryFile<T>(
  path: string,
  contents: Uint8Array,
  use: (path: string) => Promise<T>,
  logger: Logger
): Promise<T> {
  try {
    await writeFile(path, contents);
    return await use(path);
  } finally {
    try {
      await rm(path, { force: true });
    } catch (error) {
      logger.warn(new TempFileCleanupError(path, error).message);
    }
  }
}
