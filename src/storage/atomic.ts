/**
 * File System Helpers for the Storage Layer
 *
 * Read helpers and existence checks, plus the conflict-free move used by
 * the archive.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Whether `error` is a Node system error with the given code (ENOENT, EXDEV, ...)
 *
 * Checked structurally: errors raised by Node internals may come from another
 * realm, where `instanceof Error` is false.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`);
    }
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in file: ${filePath}`);
    }
    throw error;
  }
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Check if a directory exists
 *
 * @param dirPath - Path to check
 * @returns true if the path is a directory
 */
export async function dirExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if anything (file, directory, link) exists at a path
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find a free path for `target` by appending -1, -2, ... before the
 * extension. The unsuffixed name is returned when it is free.
 *
 * @example
 * ```typescript
 * // archive/ holds paper.pdf and paper-1.pdf
 * await uniqueTarget('archive/paper.pdf'); // 'archive/paper-2.pdf'
 * ```
 */
export async function uniqueTarget(target: string): Promise<string> {
  if (!(await pathExists(target))) {
    return target;
  }

  const dir = path.dirname(target);
  const ext = path.extname(target);
  const stem = path.basename(target, ext);

  for (let counter = 1; ; counter++) {
    const candidate = path.join(dir, `${stem}-${counter}${ext}`);
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}

/**
 * Move a file, falling back to copy + unlink when source and destination
 * are on different devices.
 *
 * @param from - Current path
 * @param to - Destination path (must not exist)
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (!hasErrorCode(error, 'EXDEV')) {
      throw error;
    }
    await fs.copyFile(from, to, fs.constants.COPYFILE_EXCL);
    await fs.unlink(from);
  }
}
