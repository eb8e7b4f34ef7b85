import fs from 'fs/promises';
import path from 'path';
import { minimatch } from 'minimatch';
import { logger } from '../../middleware/logging.js';
import { ScanConfig } from '../../config/types.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { FileRecord } from '../../types/batch.js';

/**
 * Batch Scanner
 *
 * Lists screenshot files in a folder. Extensions compare case-insensitively
 * against the allow-list; ignore globs match the path relative to the scanned
 * folder, so `drafts/**` skips a whole subtree. Output is sorted by path.
 *
 * A missing or non-directory folder yields an empty list, never an error.
 */
export class BatchScanner {
  private readonly extensions: Set<string>;
  private readonly ignorePatterns: string[];

  constructor(config: Pick<ScanConfig, 'extensions' | 'ignorePatterns'>) {
    this.extensions = new Set(config.extensions.map(ext => ext.toLowerCase()));
    this.ignorePatterns = [...config.ignorePatterns];

    logger.info('BatchScanner initialized', {
      extensions: Array.from(this.extensions),
      ignorePatterns: this.ignorePatterns,
    });
  }

  async scan(folder: string, recursive = false): Promise<FileRecord[]> {
    try {
      const stats = await fs.stat(folder);
      if (!stats.isDirectory()) {
        logger.error('Not a directory', { folder });
        return [];
      }
    } catch (error) {
      logger.error('Folder not found', { folder, error: getErrorMessage(error) });
      return [];
    }

    const records: FileRecord[] = [];
    await this.walk(folder, folder, recursive, records);
    records.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    logger.info('Scan complete', { folder, recursive, found: records.length });
    return records;
  }

  /**
   * Keep files whose size in KB lies within [minKb, maxKb]; either bound may be omitted
   */
  async filterBySize(files: readonly FileRecord[], minKb?: number, maxKb?: number): Promise<FileRecord[]> {
    const kept: FileRecord[] = [];

    for (const file of files) {
      let sizeKb: number;
      try {
        sizeKb = (await fs.stat(file.path)).size / 1024;
      } catch (error) {
        logger.warn('Could not check file size', { path: file.path, error: getErrorMessage(error) });
        continue;
      }

      if (minKb !== undefined && sizeKb < minKb) {
        logger.debug('Skipping file: too small', { filename: file.filename, sizeKb });
        continue;
      }
      if (maxKb !== undefined && sizeKb > maxKb) {
        logger.debug('Skipping file: too large', { filename: file.filename, sizeKb });
        continue;
      }
      kept.push(file);
    }

    logger.info('Filtered files by size', { before: files.length, after: kept.length, minKb, maxKb });
    return kept;
  }

  private async walk(root: string, dir: string, recursive: boolean, out: FileRecord[]): Promise<void> {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.error('Error scanning folder', { dir, error: getErrorMessage(error) });
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (this.isIgnored(path.relative(root, fullPath))) {
        continue;
      }

      if (entry.isDirectory()) {
        if (recursive) {
          await this.walk(root, fullPath, recursive, out);
        }
        continue;
      }

      if (!entry.isFile() || !this.extensions.has(path.extname(entry.name).toLowerCase())) {
        continue;
      }

      try {
        const stats = await fs.stat(fullPath);
        out.push({
          path: fullPath,
          filename: entry.name,
          sizeBytes: stats.size,
          modifiedTime: stats.mtime.toISOString(),
        });
      } catch (error) {
        // Removed between readdir and stat
        logger.warn('Could not stat file', { path: fullPath, error: getErrorMessage(error) });
      }
    }
  }

  private isIgnored(relativePath: string): boolean {
    if (this.ignorePatterns.length === 0) {
      return false;
    }
    const posixPath = relativePath.split(path.sep).join('/');
    return this.ignorePatterns.some(pattern => minimatch(posixPath, pattern, { dot: true, nocase: true }));
  }
}
