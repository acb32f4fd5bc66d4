/**
 * File Operations
 */

import {
  appendFile,
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  stat,
} from 'node:fs/promises';
import { dirname, join } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Read a UTF-8 file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Append a single line to a file, creating the file and its directory on first use
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await appendFile(filePath, `${line}\n`, 'utf8');
}

/**
 * True when the path exists and is a regular file
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Remove a file; missing files are ignored
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Move a file to a new location
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await rename(source, destination);
}

/**
 * List every file below a directory whose base name matches the pattern
 */
export async function findFiles(root: string, pattern: RegExp): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(root, { recursive: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const matches: string[] = [];
  for (const entry of entries) {
    const name = entry.split(/[\\/]/).pop() ?? entry;
    if (pattern.test(name)) {
      matches.push(join(root, entry));
    }
  }
  return matches;
}
