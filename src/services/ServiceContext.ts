import { AppConfig } from '../config/types.js';
import { logger } from '../middleware/logging.js';
import { ContentDescriber, TextExtractor } from '../types/capabilities.js';
import { KeywordClassifier, patternsForCategories } from './classification/KeywordClassifier.js';
import { DisabledTextExtractor, TesseractTextExtractor } from './extraction/TesseractTextExtractor.js';
import {
  DisabledContentDescriber,
  VisionContentDescriber,
  VisionHttpClient,
} from './description/VisionContentDescriber.js';
import { AnalysisPipeline } from './analysis/AnalysisPipeline.js';
import { FileOrganizer } from './organization/FileOrganizer.js';
import { BatchScanner } from './batch/BatchScanner.js';
import { BatchProcessor } from './batch/BatchProcessor.js';

/**
 * Everything the tool layer and the HTTP app need, built once per process
 * (or per test). Backends are chosen here from configuration.
 */
export interface ServiceContext {
  config: AppConfig;
  extractor: TextExtractor;
  describer: ContentDescriber;
  classifier: KeywordClassifier;
  pipeline: AnalysisPipeline;
  organizer: FileOrganizer;
  scanner: BatchScanner;
  processor: BatchProcessor;
}

export interface ServiceOverrides {
  extractor?: TextExtractor;
  describer?: ContentDescriber;
  classifier?: KeywordClassifier;
  /** HTTP client handed to the vision describer */
  visionClient?: VisionHttpClient;
}

export function createServiceContext(config: AppConfig, overrides: ServiceOverrides = {}): ServiceContext {
  const extractor = overrides.extractor ?? createExtractor(config);
  const describer = overrides.describer ?? createDescriber(config, overrides.visionClient);
  const classifier =
    overrides.classifier ?? new KeywordClassifier(patternsForCategories(config.organization.categories));

  const pipeline = new AnalysisPipeline(extractor, describer, classifier, {
    ocrConfidence: config.processing.ocrConfidence,
  });
  const organizer = new FileOrganizer(config.organization);
  const scanner = new BatchScanner(config.scan);
  const processor = new BatchProcessor(scanner);

  logger.info('Service context created', {
    extractor: extractor.name,
    describer: describer.name,
  });

  return { config, extractor, describer, classifier, pipeline, organizer, scanner, processor };
}

function createExtractor(config: AppConfig): TextExtractor {
  switch (config.ocr.engine) {
    case 'tesseract':
      return new TesseractTextExtractor({
        minWordsThreshold: config.processing.ocrMinWords,
        tesseractPath: config.ocr.tesseractPath,
        language: config.ocr.language,
      });
    case 'none':
      return new DisabledTextExtractor(config.processing.ocrMinWords);
  }
}

function createDescriber(config: AppConfig, client?: VisionHttpClient): ContentDescriber {
  if (config.vision.provider === 'none') {
    return new DisabledContentDescriber();
  }
  return new VisionContentDescriber(config.vision, config.organization.categories, client);
}
