/**
 * File Organizer - Places screenshots into category folders
 *
 * Layout under the base folder:
 *   {base}/
 *     code/
 *       login_form_20240115_093012.png
 *     errors/
 *     other/
 *     _originals/        <- only when originals are kept
 *       Screenshot 2024-01-15 at 9.30.12 AM.png
 *
 * Never overwrites: every destination gets a `_N` counter suffix until free.
 * I/O failures are reported in the OrganizeResult, not thrown.
 */

import fs from 'fs/promises';
import path from 'path';
import fse from 'fs-extra';
import { logger } from '../../middleware/logging.js';
import { OTHER_CATEGORY, ORGANIZATION } from '../../config/constants.js';
import { OrganizationConfig } from '../../config/types.js';
import { getErrorMessage, isNotFoundError } from '../../utils/errorHandling.js';
import { formatTimestamp, normalizeExtension, sanitizeFilename } from '../../utils/filenameUtils.js';
import { normalizePathArgument } from '../../utils/pathNormalization.js';
import { CategoryFolderResult, CategoryStatistics, OrganizeResult } from '../../types/organize.js';

export class FileOrganizer {
  readonly baseFolder: string;
  readonly archiveFolder: string;
  readonly categories: readonly string[];
  readonly keepOriginals: boolean;

  constructor(config: OrganizationConfig) {
    this.baseFolder = path.resolve(normalizePathArgument(config.baseFolder));
    this.archiveFolder = path.join(this.baseFolder, ORGANIZATION.ARCHIVE_FOLDER);
    this.categories = [...config.categories];
    this.keepOriginals = config.keepOriginals;

    logger.info('FileOrganizer initialized', {
      baseFolder: this.baseFolder,
      categories: this.categories,
      keepOriginals: this.keepOriginals,
    });
  }

  async organize(sourcePath: string, category: string, suggestedName?: string): Promise<OrganizeResult> {
    if (!(await fse.pathExists(sourcePath))) {
      const error = `Source file not found: ${sourcePath}`;
      logger.error(error);
      return { success: false, originalPath: sourcePath, archived: false, error };
    }

    const resolvedCategory = this.resolveCategory(category);

    try {
      await this.ensureFolderStructure();

      const parsed = path.parse(sourcePath);
      const filename = this.generateSafeFilename(suggestedName || parsed.name, parsed.ext);
      const destinationPath = await this.getUniquePath(
        path.join(this.getCategoryPath(resolvedCategory), filename)
      );

      let archivePath: string | undefined;
      if (this.keepOriginals) {
        archivePath = await this.getUniquePath(path.join(this.archiveFolder, parsed.base));
        await fse.copy(sourcePath, archivePath, { preserveTimestamps: true });
        logger.debug('Archived original', { archivePath });

        await fse.copy(sourcePath, destinationPath, { preserveTimestamps: true });
      } else {
        await fse.move(sourcePath, destinationPath);
      }

      logger.info('Organized file', {
        from: sourcePath,
        to: destinationPath,
        category: resolvedCategory,
        archived: archivePath !== undefined,
      });

      return {
        success: true,
        originalPath: sourcePath,
        destinationPath,
        category: resolvedCategory,
        archived: archivePath !== undefined,
        ...(archivePath && { archivePath }),
      };
    } catch (error) {
      const message = `Failed to organize file: ${getErrorMessage(error)}`;
      logger.error(message, { sourcePath, category: resolvedCategory });
      return {
        success: false,
        originalPath: sourcePath,
        category: resolvedCategory,
        archived: false,
        error: message,
      };
    }
  }

  /**
   * Create base, category and archive folders. Safe to call repeatedly.
   */
  async ensureFolderStructure(): Promise<void> {
    await fse.ensureDir(this.baseFolder);
    for (const category of this.categories) {
      await fse.ensureDir(this.getCategoryPath(category));
    }
    if (this.keepOriginals) {
      await fse.ensureDir(this.archiveFolder);
    }
  }

  /**
   * `{sanitized}_{YYYYMMDD_HHMMSS}{ext}`
   */
  generateSafeFilename(name: string, extension: string, now: Date = new Date()): string {
    return `${sanitizeFilename(name)}_${formatTimestamp(now)}${normalizeExtension(extension)}`;
  }

  /**
   * First of `path`, `stem_1.ext`, `stem_2.ext`, ... that does not exist
   */
  async getUniquePath(filePath: string): Promise<string> {
    if (!(await fse.pathExists(filePath))) {
      return filePath;
    }

    const { dir, name, ext } = path.parse(filePath);
    let counter = 1;
    let candidate = path.join(dir, `${name}_${counter}${ext}`);
    while (await fse.pathExists(candidate)) {
      counter++;
      candidate = path.join(dir, `${name}_${counter}${ext}`);
    }
    return candidate;
  }

  async ensureCategoryFolder(category: string, baseDir?: string): Promise<CategoryFolderResult> {
    const folderPath = this.getCategoryPath(category, baseDir);
    const existed = await fse.pathExists(folderPath);

    await fse.ensureDir(folderPath);
    if (!existed) {
      logger.info('Created category folder', { folderPath });
    }

    return { folderPath, created: !existed };
  }

  getCategoryPath(category: string, baseDir?: string): string {
    const root = baseDir ? path.resolve(normalizePathArgument(baseDir)) : this.baseFolder;
    return path.join(root, category);
  }

  /**
   * Regular files directly under each category folder.
   * Counts everything present, not only files this organizer placed.
   * Dot-files (`.DS_Store` and the like) and subfolders are not counted.
   */
  async getStatistics(): Promise<CategoryStatistics> {
    const stats: CategoryStatistics = {};

    for (const category of this.categories) {
      try {
        const entries = await fs.readdir(this.getCategoryPath(category), { withFileTypes: true });
        stats[category] = entries.filter(entry => entry.isFile() && !entry.name.startsWith('.')).length;
      } catch (error) {
        if (!isNotFoundError(error)) {
          logger.warn('Could not read category folder', { category, error: getErrorMessage(error) });
        }
        stats[category] = 0;
      }
    }

    return stats;
  }

  private resolveCategory(category: string): string {
    if (this.categories.includes(category)) {
      return category;
    }

    const fallback = this.categories.includes(OTHER_CATEGORY) ? OTHER_CATEGORY : this.categories[0];
    logger.warn(`Invalid category '${category}', defaulting to '${fallback}'`);
    return fallback;
  }
}
