/**
 * Screenshot Tool Service
 *
 * The data-level tool boundary. Each tool takes snake_case arguments, returns a
 * JSON-serializable payload and normalizes every path argument first.
 *
 * Raising is limited to missing files/folders (FileNotFoundError) and bad
 * arguments (ValidationError). Failures further down are reported in the payload.
 */

import path from 'path';
import fse from 'fs-extra';
import { z } from 'zod';
import { logger } from '../../middleware/logging.js';
import { FileNotFoundError, SchemaValidationError } from '../../errors/index.js';
import { CATEGORY_DESCRIPTIONS, KEYWORD_CONFIDENCE, OTHER_CATEGORY } from '../../config/constants.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { formatDate, meaningfulTokens, nameFromText } from '../../utils/filenameUtils.js';
import { resolveExistingPath } from '../../utils/pathNormalization.js';
import { AnalysisResult } from '../../types/analysis.js';
import { BatchStats, FileProcessingOutcome, FileRecord } from '../../types/batch.js';
import { CategoryStatistics } from '../../types/organize.js';
import {
  AnalysisResultPayload,
  BatchStatsPayload,
  CategorizeScreenshotResponse,
  CreateCategoryFolderResponse,
  FileRecordPayload,
  GenerateFilenameResponse,
  GetCategoriesResponse,
  ListScreenshotsResponse,
  MoveScreenshotResponse,
  OrganizeFolderResponse,
  ToolResponse,
} from '../../types/tools.js';
import {
  AnalyzeScreenshotArgs,
  CategorizeScreenshotArgs,
  CreateCategoryFolderArgs,
  GenerateFilenameArgs,
  ListScreenshotsArgs,
  MoveScreenshotArgs,
  OrganizeFolderArgs,
  ToolName,
  toolSchemas,
} from '../../validation/toolSchemas.js';
import { ServiceContext } from '../ServiceContext.js';
import { formatSummaryReport, successRate, summarizeErrors } from '../batch/batchReport.js';

export class ScreenshotToolService {
  constructor(private readonly context: ServiceContext) {}

  /**
   * Validate raw arguments and dispatch to the named tool
   */
  async callTool(name: ToolName, rawArgs: unknown): Promise<ToolResponse> {
    logger.debug('Tool call', { tool: name });

    switch (name) {
      case 'list_screenshots':
        return this.listScreenshots(parseArgs(name, toolSchemas.list_screenshots, rawArgs));
      case 'analyze_screenshot':
        return this.analyzeScreenshot(parseArgs(name, toolSchemas.analyze_screenshot, rawArgs));
      case 'get_categories':
        parseArgs(name, toolSchemas.get_categories, rawArgs);
        return this.getCategories();
      case 'create_category_folder':
        return this.createCategoryFolder(parseArgs(name, toolSchemas.create_category_folder, rawArgs));
      case 'move_screenshot':
        return this.moveScreenshot(parseArgs(name, toolSchemas.move_screenshot, rawArgs));
      case 'categorize_screenshot':
        return this.categorizeScreenshot(parseArgs(name, toolSchemas.categorize_screenshot, rawArgs));
      case 'generate_filename':
        return this.generateFilename(parseArgs(name, toolSchemas.generate_filename, rawArgs));
      case 'organize_folder':
        return this.organizeFolder(parseArgs(name, toolSchemas.organize_folder, rawArgs));
    }
  }

  async listScreenshots(args: ListScreenshotsArgs): Promise<ListScreenshotsResponse> {
    const directory = await requireExisting(args.directory, 'Directory');

    logger.info('Listing screenshots', { directory, recursive: args.recursive });
    const records = await this.context.scanner.scan(directory, args.recursive);
    const totalCount = records.length;

    const truncated = args.max_files !== undefined && totalCount > args.max_files;
    const listed = truncated ? records.slice(0, args.max_files) : records;
    if (truncated) {
      logger.info('Truncated file list', { maxFiles: args.max_files, found: totalCount });
    }

    return {
      files: listed.map(toFileRecordPayload),
      total_count: totalCount,
      truncated,
    };
  }

  async analyzeScreenshot(args: AnalyzeScreenshotArgs): Promise<AnalysisResultPayload> {
    const filePath = await requireExisting(args.file_path, 'Screenshot file');
    const startTime = Date.now();

    try {
      const result = await this.context.pipeline.analyze(filePath, { forceVision: args.force_vision });
      return toAnalysisPayload(result);
    } catch (error) {
      logger.error('Failed to analyze screenshot', { filePath, error: getErrorMessage(error) });
      return {
        extracted_text: null,
        description: null,
        category: OTHER_CATEGORY,
        suggested_filename: nameFromText(undefined, OTHER_CATEGORY),
        processing_method: 'vision',
        processing_time_ms: Date.now() - startTime,
        confidence: 0,
        word_count: 0,
        success: false,
        error: getErrorMessage(error),
      };
    }
  }

  getCategories(): GetCategoriesResponse {
    const patterns = this.context.classifier.getPatterns();

    return {
      categories: this.context.config.organization.categories.map(name => ({
        name,
        description: CATEGORY_DESCRIPTIONS[name] ?? '',
        keywords: patterns[name] ?? [],
      })),
      default_category: OTHER_CATEGORY,
    };
  }

  async createCategoryFolder(args: CreateCategoryFolderArgs): Promise<CreateCategoryFolderResponse> {
    const { organizer } = this.context;

    try {
      const result = await organizer.ensureCategoryFolder(args.category, args.base_dir);
      return { folder_path: result.folderPath, created: result.created, success: true, error: null };
    } catch (error) {
      const folderPath = organizer.getCategoryPath(args.category, args.base_dir);
      logger.error('Failed to create category folder', { folderPath, error: getErrorMessage(error) });
      return { folder_path: folderPath, created: false, success: false, error: getErrorMessage(error) };
    }
  }

  async moveScreenshot(args: MoveScreenshotArgs): Promise<MoveScreenshotResponse> {
    const source = await requireExisting(args.source_path, 'Source file');
    const destFolder = await requireExisting(args.dest_folder, 'Destination folder');

    const filename = args.new_filename ? `${args.new_filename}${path.extname(source)}` : path.basename(source);
    const operation = args.keep_original ? 'copy' : 'move';

    try {
      const destination = await this.context.organizer.getUniquePath(path.join(destFolder, filename));
      if (args.keep_original) {
        await fse.copy(source, destination, { preserveTimestamps: true });
      } else {
        await fse.move(source, destination);
      }

      logger.info(`Screenshot ${operation} complete`, { from: source, to: destination });
      return { original_path: source, new_path: destination, operation, success: true, error: null };
    } catch (error) {
      logger.error(`Failed to ${operation} screenshot`, { source, error: getErrorMessage(error) });
      return { original_path: source, new_path: null, operation, success: false, error: getErrorMessage(error) };
    }
  }

  categorizeScreenshot(args: CategorizeScreenshotArgs): CategorizeScreenshotResponse {
    const allowed = args.available_categories;
    const scored = this.context.classifier.score(args.text, allowed);

    let category = scored.category;
    if (allowed && !allowed.includes(category)) {
      category = OTHER_CATEGORY;
    }

    const matched = scored.scores.find(entry => entry.category === category)?.matchedPatterns ?? [];
    const confidence = matched.length > 0
      ? Math.min(KEYWORD_CONFIDENCE.MAX, KEYWORD_CONFIDENCE.BASE + KEYWORD_CONFIDENCE.PER_MATCH * matched.length)
      : KEYWORD_CONFIDENCE.BASE;

    return {
      suggested_category: category,
      confidence: Math.round(confidence * 100) / 100,
      matched_keywords: matched,
      method: 'keyword_classifier',
    };
  }

  generateFilename(args: GenerateFilenameArgs, now: Date = new Date()): GenerateFilenameResponse {
    const timestamp = formatDate(now);
    const extension = path.extname(args.original_filename);

    const tokens = firstNonEmpty(meaningfulTokens(args.text), meaningfulTokens(args.description));
    const baseName = tokens.length > 0 ? tokens.join('_').toLowerCase() : `${args.category}_screenshot`;

    return { suggested_filename: `${baseName}_${timestamp}`, extension, timestamp };
  }

  /**
   * Scan, analyze and organize every screenshot in a folder
   */
  async organizeFolder(args: OrganizeFolderArgs): Promise<OrganizeFolderResponse> {
    const directory = await requireExisting(args.directory, 'Directory');
    const { scanner, processor, pipeline, organizer, config } = this.context;

    let files = await scanner.scan(directory, args.recursive);
    if (args.min_size_kb !== undefined || args.max_size_kb !== undefined) {
      files = await scanner.filterBySize(files, args.min_size_kb, args.max_size_kb);
    }

    const organizeOne = async (file: FileRecord): Promise<FileProcessingOutcome> => {
      const analysis = await pipeline.analyze(file.path, { forceVision: args.force_vision });
      const organized = await organizer.organize(file.path, analysis.category, analysis.suggestedFilename);
      return organized.success
        ? { success: true, category: organized.category }
        : { success: false, error: organized.error };
    };

    const stats = await processor.processFiles(files, organizeOne, {
      progress: (index, total, file) => logger.info(`[${index}/${total}] Organizing ${file.filename}`),
    });

    const summary = summarizeErrors(stats, config.scan.errorSummaryLimit);
    return {
      stats: toBatchStatsPayload(stats),
      success_rate: successRate(stats),
      error_summary: { errors: summary.errors, omitted: summary.omitted },
      report: formatSummaryReport(stats),
    };
  }

  async getStatistics(): Promise<CategoryStatistics> {
    return this.context.organizer.getStatistics();
  }
}

function parseArgs<S extends z.ZodTypeAny>(tool: ToolName, schema: S, rawArgs: unknown): z.output<S> {
  const parsed = schema.safeParse(rawArgs ?? {});
  if (!parsed.success) {
    const errors = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new SchemaValidationError(errors, `Invalid arguments for ${tool}`, {
      service: 'ScreenshotToolService',
      operation: tool,
    });
  }
  return parsed.data;
}

async function requireExisting(raw: string, label: string): Promise<string> {
  const resolved = await resolveExistingPath(raw);
  if (resolved === undefined) {
    throw new FileNotFoundError(raw, `${label} not found: ${raw}`, { service: 'ScreenshotToolService' });
  }
  return resolved;
}

function firstNonEmpty(...candidates: string[][]): string[] {
  return candidates.find(tokens => tokens.length > 0) ?? [];
}

function toFileRecordPayload(record: FileRecord): FileRecordPayload {
  return {
    path: record.path,
    filename: record.filename,
    size_bytes: record.sizeBytes,
    modified_time: record.modifiedTime,
  };
}

export function toAnalysisPayload(result: AnalysisResult): AnalysisResultPayload {
  return {
    extracted_text: result.extractedText ?? null,
    description: result.description ?? null,
    category: result.category,
    suggested_filename: result.suggestedFilename,
    processing_method: result.processingMethod,
    processing_time_ms: result.processingTimeMs,
    confidence: result.confidence,
    word_count: result.wordCount,
    success: result.success,
    error: result.error ?? null,
  };
}

function toBatchStatsPayload(stats: BatchStats): BatchStatsPayload {
  return {
    total_files: stats.totalFiles,
    processed: stats.processed,
    successful: stats.successful,
    failed: stats.failed,
    skipped: stats.skipped,
    processing_time_ms: stats.processingTimeMs,
    errors: [...stats.errors],
  };
}
