/**
 * Analysis Capability Type Definitions
 *
 * Two small capability interfaces with interchangeable implementations,
 * chosen once when the ServiceContext is built.
 */

/**
 * Output of a text extraction (OCR) pass
 */
export interface ExtractionResult {
  text: string;
  wordCount: number;
  /** wordCount >= the extractor's minimum word threshold */
  sufficient: boolean;
}

/**
 * Extracts text from an image.
 * Throws ExtractionError when the image cannot be decoded or the engine fails.
 */
export interface TextExtractor {
  readonly name: string;
  readonly minWordsThreshold: number;
  extract(imagePath: string): Promise<ExtractionResult>;
}

/**
 * Output of a description (vision) pass. `category` is already validated
 * against the configured set.
 */
export interface DescriptionResult {
  description: string;
  category: string;
  suggestedFilename: string;
  confidence: number;
}

/**
 * Produces a description and classification hint from an image.
 * Slow and possibly billed: only called when extraction is insufficient or forced.
 * Throws DescriptionFormatError on an unusable reply, DescriptionError on transport failure.
 */
export interface ContentDescriber {
  readonly name: string;
  describe(imagePath: string): Promise<DescriptionResult>;
}
