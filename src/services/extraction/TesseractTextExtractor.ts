import { execFile } from 'child_process';
import sharp from 'sharp';
import { logger } from '../../middleware/logging.js';
import { ExtractionError, ProcessError } from '../../errors/index.js';
import { getErrorCode, getErrorMessage, toError } from '../../utils/errorHandling.js';
import { ExtractionResult, TextExtractor } from '../../types/capabilities.js';

/**
 * Tesseract Text Extractor
 *
 * Runs the `tesseract` CLI against a screenshot and counts the words it reads.
 * sharp checks first that the file decodes as an image, so a corrupt or
 * non-image file fails fast with ExtractionError instead of an engine error.
 *
 * Arguments go to execFile as an array; the image path never passes through a shell.
 */

export interface TesseractOptions {
  minWordsThreshold: number;
  tesseractPath: string;
  language: string;
}

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

function runTesseract(binary: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(binary, args, { maxBuffer: MAX_OUTPUT_BYTES }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(String(stdout));
    });
  });
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export class TesseractTextExtractor implements TextExtractor {
  readonly name = 'tesseract';
  readonly minWordsThreshold: number;

  constructor(private readonly options: TesseractOptions) {
    this.minWordsThreshold = options.minWordsThreshold;
    logger.info('TesseractTextExtractor initialized', {
      minWordsThreshold: options.minWordsThreshold,
      language: options.language,
    });
  }

  async extract(imagePath: string): Promise<ExtractionResult> {
    const startTime = Date.now();

    await this.assertDecodable(imagePath);

    let output: string;
    try {
      output = await runTesseract(this.options.tesseractPath, [
        imagePath,
        'stdout',
        '-l',
        this.options.language,
      ]);
    } catch (error) {
      const code = getErrorCode(error);
      const message = code === 'ENOENT'
        ? `OCR engine not found: ${this.options.tesseractPath}`
        : `OCR engine failed: ${getErrorMessage(error)}`;

      logger.error('Tesseract run failed', {
        imagePath,
        error: getErrorMessage(error),
        durationMs: Date.now() - startTime,
      });

      throw new ExtractionError(
        imagePath,
        message,
        { service: 'TesseractTextExtractor', operation: 'extract', durationMs: Date.now() - startTime },
        new ProcessError(this.options.tesseractPath, code, getErrorMessage(error), undefined, toError(error))
      );
    }

    const text = output.trim();
    const wordCount = countWords(text);
    const sufficient = wordCount >= this.minWordsThreshold;

    logger.info('OCR complete', {
      imagePath,
      wordCount,
      sufficient,
      durationMs: Date.now() - startTime,
    });

    return { text, wordCount, sufficient };
  }

  private async assertDecodable(imagePath: string): Promise<void> {
    try {
      const metadata = await sharp(imagePath).metadata();
      logger.debug('Image decoded', {
        imagePath,
        format: metadata.format,
        width: metadata.width,
        height: metadata.height,
      });
    } catch (error) {
      throw new ExtractionError(
        imagePath,
        `Cannot decode image: ${imagePath}`,
        { service: 'TesseractTextExtractor', operation: 'decode' },
        toError(error)
      );
    }
  }
}

/**
 * Extractor used when OCR is switched off: every image goes to description
 */
export class DisabledTextExtractor implements TextExtractor {
  readonly name = 'none';

  constructor(readonly minWordsThreshold: number) {}

  async extract(imagePath: string): Promise<ExtractionResult> {
    throw new ExtractionError(imagePath, 'Text extraction is disabled', {
      service: 'DisabledTextExtractor',
      operation: 'extract',
    });
  }
}
