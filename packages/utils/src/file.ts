/**
 * File Operations
 */

import { mkdir, writeFile, readFile, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Narrow an unknown error to a Node system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Write a file, creating its directory first
 */
export async function safeWriteFile(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * Read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Get file size in bytes, or undefined when the file is missing
 */
export async function findFileSizeBytes(filePath: string): Promise<number | undefined> {
  try {
    return await getFileSizeBytes(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}
