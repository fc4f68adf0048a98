/**
 * Presents an explicit list of files as if it were the whole directory tree,
 * so per-directory package discovery only ever sees the curated files.
 */
import * as path from 'node:path';
import { statFile } from '../../utils/file-system.js';

export interface OverlayEntry {
  /** Base name of the file */
  name: string;
  /** Path relative to the overlay's base directory, slash-separated */
  relativePath: string;
  size: number;
  modifiedAt: Date;
  isDirectory: boolean;
}

export class DirectoryOverlay {
  private readonly filenames: readonly string[];

  constructor(
    readonly baseDir: string,
    filenames: readonly string[]
  ) {
    this.filenames = [...filenames];
  }

  /**
   * Entries of `dir` (absolute, or relative to the base directory) among the
   * listed files, in list order. A failed metadata lookup rejects.
   */
  async readDir(dir: string): Promise<OverlayEntry[]> {
    const wanted = path.resolve(this.baseDir, dir);
    const entries: OverlayEntry[] = [];

    for (const name of this.filenames) {
      const full = path.resolve(this.baseDir, name);
      if (path.dirname(full) !== wanted) continue;

      const stat = await statFile(full);
      entries.push({
        name: path.basename(full),
        relativePath: toSlash(path.relative(this.baseDir, full)),
        size: stat.size,
        modifiedAt: stat.mtime,
        isDirectory: stat.isDirectory(),
      });
    }

    return entries;
  }

  /**
   * Distinct parent directories of the listed files, relative to the base
   * directory ("." for top-level files), sorted.
   */
  directories(): string[] {
    const dirs = new Set<string>();
    for (const name of this.filenames) {
      dirs.add(path.normalize(path.dirname(name)));
    }
    return [...dirs].sort();
  }
}

export function toSlash(p: string): string {
  return p.split(path.sep).join('/');
}
