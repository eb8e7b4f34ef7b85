/**
 * Tool Response Types
 *
 * Payloads returned at the tool boundary. Field names are snake_case and every
 * value is JSON-serializable.
 */

export interface FileRecordPayload {
  path: string;
  filename: string;
  size_bytes: number;
  modified_time: string;
}

export interface ListScreenshotsResponse {
  files: FileRecordPayload[];
  /** Count before truncation */
  total_count: number;
  truncated: boolean;
}

export interface AnalysisResultPayload {
  extracted_text: string | null;
  description: string | null;
  category: string;
  suggested_filename: string;
  processing_method: 'ocr' | 'vision';
  processing_time_ms: number;
  confidence: number;
  word_count: number;
  success: boolean;
  error: string | null;
}

export interface CategoryInfo {
  name: string;
  description: string;
  keywords: string[];
}

export interface GetCategoriesResponse {
  categories: CategoryInfo[];
  default_category: string;
}

export interface CreateCategoryFolderResponse {
  folder_path: string;
  created: boolean;
  success: boolean;
  error: string | null;
}

export interface MoveScreenshotResponse {
  original_path: string;
  new_path: string | null;
  operation: 'copy' | 'move';
  success: boolean;
  error: string | null;
}

export interface CategorizeScreenshotResponse {
  suggested_category: string;
  confidence: number;
  matched_keywords: string[];
  method: 'keyword_classifier';
}

export interface GenerateFilenameResponse {
  /** Without extension */
  suggested_filename: string;
  extension: string;
  timestamp: string;
}

export interface BatchStatsPayload {
  total_files: number;
  processed: number;
  successful: number;
  failed: number;
  skipped: number;
  processing_time_ms: number;
  errors: string[];
}

export interface OrganizeFolderResponse {
  stats: BatchStatsPayload;
  success_rate: number;
  error_summary: {
    errors: string[];
    omitted: number;
  };
  report: string;
}

export type ToolResponse =
  | ListScreenshotsResponse
  | AnalysisResultPayload
  | GetCategoriesResponse
  | CreateCategoryFolderResponse
  | MoveScreenshotResponse
  | CategorizeScreenshotResponse
  | GenerateFilenameResponse
  | OrganizeFolderResponse;
