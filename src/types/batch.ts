/**
 * Batch Scanning & Processing Types
 */

/**
 * Read-only snapshot of a scanned file. May be stale by the time it is used.
 */
export interface FileRecord {
  readonly path: string;
  readonly filename: string;
  readonly sizeBytes: number;
  /** ISO-8601 */
  readonly modifiedTime: string;
}

export interface BatchStats {
  totalFiles: number;
  processed: number;
  successful: number;
  failed: number;
  skipped: number;
  processingTimeMs: number;
  errors: string[];
}

/**
 * What a per-file function reports back. Throwing is also allowed and counts as a failure.
 */
export interface FileProcessingOutcome {
  success: boolean;
  skipped?: boolean;
  category?: string;
  error?: string;
}

export type PerFileFunction = (file: FileRecord) => Promise<FileProcessingOutcome>;

/** index is 1-based */
export type ProgressCallback = (index: number, total: number, file: FileRecord) => void;

export interface ProcessOptions {
  progress?: ProgressCallback;
  /** Checked between files only; a running file always completes */
  signal?: AbortSignal;
}

export interface ErrorSummary {
  errors: string[];
  omitted: number;
}
