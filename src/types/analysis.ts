/**
 * Analysis Result Types
 */

import { ExtractionResult, DescriptionResult } from './capabilities.js';

export type ProcessingMethod = 'ocr' | 'vision';

/**
 * One result per analyzed file. Frozen on creation.
 */
export interface AnalysisResult {
  readonly extractedText?: string;
  readonly description?: string;
  readonly category: string;
  readonly suggestedFilename: string;
  readonly processingMethod: ProcessingMethod;
  readonly processingTimeMs: number;
  readonly confidence: number;
  readonly wordCount: number;
  readonly success: boolean;
  readonly error?: string;
}

/**
 * Pipeline states. CLASSIFY and DESCRIBE are terminal.
 */
export type PipelineState = 'START' | 'EXTRACT' | 'CLASSIFY' | 'DESCRIBE';

export interface AnalyzeOptions {
  /** Skip extraction and go straight to description */
  forceVision?: boolean;
}

/**
 * Mutable working state carried between pipeline transitions
 */
export interface PipelineContext {
  readonly imagePath: string;
  readonly forceVision: boolean;
  readonly startedAt: number;
  extraction?: ExtractionResult;
  extractionError?: string;
  description?: DescriptionResult;
}
