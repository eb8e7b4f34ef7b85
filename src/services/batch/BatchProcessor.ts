import fs from 'fs/promises';
import { logger } from '../../middleware/logging.js';
import { FileNotFoundError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import {
  BatchStats,
  FileRecord,
  PerFileFunction,
  ProcessOptions,
  ProgressCallback,
} from '../../types/batch.js';
import { BatchScanner } from './BatchScanner.js';
import { successRate } from './batchReport.js';

export interface ProcessFolderOptions {
  recursive?: boolean;
  progress?: ProgressCallback;
  signal?: AbortSignal;
}

/**
 * Batch Processor
 *
 * Runs a per-file function over files strictly one after another, in order.
 * One file's failure (returned or thrown) is recorded and the run continues.
 * An AbortSignal is checked between files; a file already started finishes.
 */
export class BatchProcessor {
  constructor(private readonly scanner: BatchScanner) {}

  async processFiles(
    files: readonly FileRecord[],
    perFile: PerFileFunction,
    options: ProcessOptions = {}
  ): Promise<BatchStats> {
    const stats = emptyStats(files.length);
    const startTime = Date.now();
    const total = files.length;

    logger.info('Starting batch processing', { totalFiles: total });

    for (let index = 0; index < total; index++) {
      if (options.signal?.aborted) {
        logger.warn('Batch processing cancelled', { remaining: total - index });
        break;
      }

      const file = files[index];
      const position = index + 1;

      reportProgress(options.progress, position, total, file);

      try {
        const outcome = await perFile(file);
        if (outcome.skipped) {
          stats.skipped++;
          logger.debug(`[${position}/${total}] Skipped ${file.filename}`);
          continue;
        }

        stats.processed++;
        if (outcome.success) {
          stats.successful++;
          logger.debug(`[${position}/${total}] Processed ${file.filename}`, { category: outcome.category });
        } else {
          stats.failed++;
          const message = `${file.filename}: ${outcome.error || 'Unknown error'}`;
          stats.errors.push(message);
          logger.warn(`[${position}/${total}] Failed to process: ${message}`);
        }
      } catch (error) {
        stats.processed++;
        stats.failed++;
        const message = `${file.filename}: ${getErrorMessage(error)}`;
        stats.errors.push(message);
        logger.error(`[${position}/${total}] Exception processing ${file.filename}`, {
          error: getErrorMessage(error),
        });
      }
    }

    stats.processingTimeMs = Date.now() - startTime;

    logger.info('Batch processing complete', {
      successful: stats.successful,
      totalFiles: stats.totalFiles,
      successRate: Number(successRate(stats).toFixed(1)),
      durationMs: stats.processingTimeMs,
    });
    if (stats.errors.length > 0) {
      logger.warn(`Encountered ${stats.errors.length} errors during batch processing`);
    }

    return stats;
  }

  /**
   * Scan a folder and process what it holds. The folder itself must be readable.
   */
  async processFolder(
    folder: string,
    perFile: PerFileFunction,
    options: ProcessFolderOptions = {}
  ): Promise<BatchStats> {
    await assertDirectory(folder);

    const files = await this.scanner.scan(folder, options.recursive ?? false);
    if (files.length === 0) {
      logger.warn('No supported files found', { folder });
      return emptyStats(0);
    }

    return this.processFiles(files, perFile, {
      ...(options.progress && { progress: options.progress }),
      ...(options.signal && { signal: options.signal }),
    });
  }
}

export function emptyStats(totalFiles: number): BatchStats {
  return {
    totalFiles,
    processed: 0,
    successful: 0,
    failed: 0,
    skipped: 0,
    processingTimeMs: 0,
    errors: [],
  };
}

/**
 * A failing progress callback is logged; it never counts against the file
 */
function reportProgress(
  progress: ProgressCallback | undefined,
  position: number,
  total: number,
  file: FileRecord
): void {
  if (!progress) {
    return;
  }
  try {
    progress(position, total, file);
  } catch (error) {
    logger.warn('Progress callback failed', { filename: file.filename, error: getErrorMessage(error) });
  }
}

async function assertDirectory(folder: string): Promise<void> {
  try {
    const stats = await fs.stat(folder);
    if (stats.isDirectory()) {
      return;
    }
  } catch (error) {
    throw new FileNotFoundError(folder, `Folder not accessible: ${folder}`, {
      service: 'BatchProcessor',
      operation: 'processFolder',
      metadata: { reason: getErrorMessage(error) },
    });
  }
  throw new FileNotFoundError(folder, `Not a directory: ${folder}`, {
    service: 'BatchProcessor',
    operation: 'processFolder',
  });
}
