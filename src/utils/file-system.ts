/**
 * File system operations used by the overlay, the oracles and the CLI.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';
import { toIoError } from './errors.js';

/**
 * Read a file and return its contents as a string.
 * Failures surface as SystemError (IO_ERROR).
 */
export async function readFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw toIoError(error, filePath);
  }
}

/**
 * Check if a regular file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Stat a path, surfacing failures as SystemError (IO_ERROR).
 */
export async function statFile(filePath: string): Promise<fs.Stats> {
  try {
    return await fs.promises.stat(filePath);
  } catch (error) {
    throw toIoError(error, filePath);
  }
}

/**
 * List the entry names of a directory, sorted.
 */
export async function listDirectory(dirPath: string): Promise<string[]> {
  try {
    const names = await fs.promises.readdir(dirPath);
    return names.sort();
  } catch (error) {
    throw toIoError(error, dirPath);
  }
}

/**
 * Find files matching glob patterns. Results are sorted.
 */
export async function globFiles(
  patterns: string[],
  options: { cwd: string; ignore?: string[] }
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd,
    ignore: options.ignore,
    onlyFiles: true,
    dot: false,
  });
  return files.sort();
}
