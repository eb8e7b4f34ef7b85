import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { meaningfulTokens, nameFromText } from '../../utils/filenameUtils.js';
import { KeywordClassifier } from '../classification/KeywordClassifier.js';
import { ContentDescriber, TextExtractor } from '../../types/capabilities.js';
import {
  AnalysisResult,
  AnalyzeOptions,
  PipelineContext,
  PipelineState,
} from '../../types/analysis.js';

/**
 * Analysis Pipeline
 *
 * Tiered analysis as an explicit state machine:
 *
 *   START ──forced──────────────────────────────► DESCRIBE (vision)
 *     └──► EXTRACT ──sufficient text──► CLASSIFY (ocr)
 *               └──failure / too few words──► DESCRIBE (vision)
 *
 * CLASSIFY and DESCRIBE are terminal and build the result. Extraction output
 * gathered before DESCRIBE is carried into the vision result. Describer
 * failures are not caught here.
 */

export interface AnalysisPipelineOptions {
  /** Confidence reported for OCR-classified results */
  ocrConfidence: number;
}

type TerminalState = Extract<PipelineState, 'CLASSIFY' | 'DESCRIBE'>;

export class AnalysisPipeline {
  constructor(
    private readonly extractor: TextExtractor,
    private readonly describer: ContentDescriber,
    private readonly classifier: KeywordClassifier,
    private readonly options: AnalysisPipelineOptions
  ) {}

  async analyze(imagePath: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const context: PipelineContext = {
      imagePath,
      forceVision: options.forceVision ?? false,
      startedAt: Date.now(),
    };

    let state: PipelineState = 'START';
    while (!isTerminal(state)) {
      state = await this.transition(state, context);
    }

    return this.finish(state, context);
  }

  /**
   * Run one non-terminal state and return the next state
   */
  async transition(state: PipelineState, context: PipelineContext): Promise<PipelineState> {
    switch (state) {
      case 'START':
        return this.start(context);
      case 'EXTRACT':
        return this.extract(context);
      case 'CLASSIFY':
      case 'DESCRIBE':
        return state;
    }
  }

  start(context: PipelineContext): PipelineState {
    if (context.forceVision) {
      logger.debug('Vision forced, skipping extraction', { imagePath: context.imagePath });
      return 'DESCRIBE';
    }
    return 'EXTRACT';
  }

  async extract(context: PipelineContext): Promise<PipelineState> {
    try {
      context.extraction = await this.extractor.extract(context.imagePath);
    } catch (error) {
      context.extractionError = getErrorMessage(error);
      logger.warn('Text extraction failed, falling back to description', {
        imagePath: context.imagePath,
        extractor: this.extractor.name,
        error: context.extractionError,
      });
      return 'DESCRIBE';
    }

    if (context.extraction.sufficient) {
      return 'CLASSIFY';
    }

    logger.info('Insufficient text, falling back to description', {
      imagePath: context.imagePath,
      wordCount: context.extraction.wordCount,
      threshold: this.extractor.minWordsThreshold,
    });
    return 'DESCRIBE';
  }

  classify(context: PipelineContext): AnalysisResult {
    const text = context.extraction?.text ?? '';
    const category = this.classifier.classify(text);
    const tokens = meaningfulTokens(text);

    const result: AnalysisResult = {
      extractedText: text,
      description: tokens.length > 0 ? tokens.join(' ') : `${category} screenshot`,
      category,
      suggestedFilename: nameFromText(text, category),
      processingMethod: 'ocr',
      processingTimeMs: elapsedSince(context.startedAt),
      confidence: this.options.ocrConfidence,
      wordCount: context.extraction?.wordCount ?? 0,
      success: true,
    };
    return Object.freeze(result);
  }

  async describe(context: PipelineContext): Promise<AnalysisResult> {
    const described = await this.describer.describe(context.imagePath);
    context.description = described;

    const result: AnalysisResult = {
      ...(context.extraction && { extractedText: context.extraction.text }),
      description: described.description,
      category: described.category,
      suggestedFilename: described.suggestedFilename,
      processingMethod: 'vision',
      processingTimeMs: elapsedSince(context.startedAt),
      confidence: described.confidence,
      wordCount: context.extraction?.wordCount ?? 0,
      success: true,
    };
    return Object.freeze(result);
  }

  private async finish(state: TerminalState, context: PipelineContext): Promise<AnalysisResult> {
    const result = state === 'CLASSIFY' ? this.classify(context) : await this.describe(context);

    logger.info('Analysis complete', {
      imagePath: context.imagePath,
      method: result.processingMethod,
      category: result.category,
      durationMs: result.processingTimeMs,
    });

    return result;
  }
}

function isTerminal(state: PipelineState): state is TerminalState {
  return state === 'CLASSIFY' || state === 'DESCRIBE';
}

function elapsedSince(startedAt: number): number {
  return Math.max(0, Date.now() - startedAt);
}
