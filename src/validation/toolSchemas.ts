import { z } from 'zod';

/**
 * Tool Argument Schemas
 *
 * Zod schemas for the arguments of each screenshot tool. Keys are snake_case,
 * matching the tool contract; defaults are applied here.
 */

const pathArgument = z.string().min(1, 'Path is required');

/**
 * A single folder name: no separators, not `.` or `..`
 */
const categoryName = z
  .string()
  .trim()
  .min(1, 'Category is required')
  .max(100)
  .refine(value => !/[\\/]/.test(value) && value !== '.' && value !== '..', 'Category must be a single folder name');

export const listScreenshotsSchema = z.object({
  directory: pathArgument,
  recursive: z.boolean().optional().default(false),
  max_files: z.number().int().positive().optional(),
});

export const analyzeScreenshotSchema = z.object({
  file_path: pathArgument,
  force_vision: z.boolean().optional().default(false),
});

export const getCategoriesSchema = z.object({});

export const createCategoryFolderSchema = z.object({
  category: categoryName,
  base_dir: pathArgument.optional(),
});

export const moveScreenshotSchema = z.object({
  source_path: pathArgument,
  dest_folder: pathArgument,
  new_filename: z
    .string()
    .min(1)
    .refine(value => !/[\\/]/.test(value), 'Filename must not contain path separators')
    .optional(),
  keep_original: z.boolean().optional().default(true),
});

export const categorizeScreenshotSchema = z.object({
  text: z.string(),
  available_categories: z.array(z.string().min(1)).optional(),
});

export const generateFilenameSchema = z.object({
  original_filename: z.string().min(1, 'Filename is required'),
  category: z.string().min(1, 'Category is required'),
  text: z.string().optional(),
  description: z.string().optional(),
});

export const organizeFolderSchema = z
  .object({
    directory: pathArgument,
    recursive: z.boolean().optional().default(false),
    force_vision: z.boolean().optional().default(false),
    min_size_kb: z.number().nonnegative().optional(),
    max_size_kb: z.number().nonnegative().optional(),
  })
  .refine(
    args => args.min_size_kb === undefined || args.max_size_kb === undefined || args.min_size_kb <= args.max_size_kb,
    { message: 'min_size_kb must not exceed max_size_kb', path: ['min_size_kb'] }
  );

export const toolSchemas = {
  list_screenshots: listScreenshotsSchema,
  analyze_screenshot: analyzeScreenshotSchema,
  get_categories: getCategoriesSchema,
  create_category_folder: createCategoryFolderSchema,
  move_screenshot: moveScreenshotSchema,
  categorize_screenshot: categorizeScreenshotSchema,
  generate_filename: generateFilenameSchema,
  organize_folder: organizeFolderSchema,
} as const;

export type ToolName = keyof typeof toolSchemas;

export const TOOL_NAMES = Object.keys(toolSchemas).filter(isToolName);

export function isToolName(value: string): value is ToolName {
  return Object.prototype.hasOwnProperty.call(toolSchemas, value);
}

export type ListScreenshotsArgs = z.infer<typeof listScreenshotsSchema>;
export type AnalyzeScreenshotArgs = z.infer<typeof analyzeScreenshotSchema>;
export type CreateCategoryFolderArgs = z.infer<typeof createCategoryFolderSchema>;
export type MoveScreenshotArgs = z.infer<typeof moveScreenshotSchema>;
export type CategorizeScreenshotArgs = z.infer<typeof categorizeScreenshotSchema>;
export type GenerateFilenameArgs = z.infer<typeof generateFilenameSchema>;
export type OrganizeFolderArgs = z.infer<typeof organizeFolderSchema>;
