/**
 * @almanac/reader -- reading calendar files from disk.
 */

import { open, type FileHandle } from "node:fs/promises";
import { CalendarReadError } from "./errors";

export interface ReadCalendarFileOptions {
  /** Refuse files larger than this many bytes. */
  readonly maxBytes?: number;
}

/**
 * Read a calendar file as UTF-8 text. The size is checked before any
 * content is read; the file handle is always closed.
 *
 * @throws CalendarReadError when the file is missing, not a regular file,
 *   too large, or cannot be read
 */
export async function readCalendarFile(path: string, options: ReadCalendarFileOptions = {}): Promise<string> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    throw new CalendarReadError(path, "cannot be opened", { cause: err });
  }

  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      throw new CalendarReadError(path, "not a regular file");
    }
    if (options.maxBytes !== undefined && stats.size > options.maxBytes) {
      throw new CalendarReadError(path, `${stats.size} bytes exceeds the limit of ${options.maxBytes}`);
    }
    return await handle.readFile({ encoding: "utf-8" });
  } catch (err) {
    if (err instanceof CalendarReadError) throw err;
    throw new CalendarReadError(path, "read failed", { cause: err });
  } finally {
    await handle.close();
  }
}
