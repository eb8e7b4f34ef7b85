/**
 * File Organization Types
 */

export interface OrganizeResult {
  success: boolean;
  originalPath: string;
  destinationPath?: string;
  /** Category actually used (after coercion to "other") */
  category?: string;
  archived: boolean;
  archivePath?: string;
  error?: string;
}

export interface CategoryFolderResult {
  folderPath: string;
  created: boolean;
}

/**
 * File count per category folder
 */
export type CategoryStatistics = Record<string, number>;
