/**
 * Shared test fixtures: temp folders, tiny real images, configs and capability fakes
 */

import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import sharp from 'sharp';
import { loadConfig } from '../src/config/ConfigManager.js';
import { AppConfig } from '../src/config/types.js';
import { countWords } from '../src/services/extraction/TesseractTextExtractor.js';
import {
  ContentDescriber,
  DescriptionResult,
  ExtractionResult,
  TextExtractor,
} from '../src/types/capabilities.js';

export async function makeTempDir(prefix = 'screenshot-sorter-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write a real 4x4 PNG so decoders accept it
 */
export async function writePng(filePath: string): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width: 4, height: 4, channels: 3, background: { r: 255, g: 255, b: 255 } },
  })
    .png()
    .toFile(filePath);
  return filePath;
}

export async function writeFile(filePath: string, content: string | Buffer = 'x'): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}

/**
 * Defaults with OCR/vision switched off and organization under the given folder
 */
export function makeConfig(baseFolder: string, env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    ORGANIZE_BASE_FOLDER: baseFolder,
    OCR_ENGINE: 'none',
    VISION_PROVIDER: 'none',
    LOG_CONSOLE_ENABLED: 'false',
    ...env,
  });
}

/**
 * Extractor returning canned text per file name, or throwing for names in `failFor`
 */
export class FakeExtractor implements TextExtractor {
  readonly name = 'fake-ocr';
  readonly calls: string[] = [];

  constructor(
    readonly minWordsThreshold: number,
    private readonly textFor: (imagePath: string) => string,
    private readonly failFor: (imagePath: string) => boolean = () => false
  ) {}

  async extract(imagePath: string): Promise<ExtractionResult> {
    this.calls.push(imagePath);
    if (this.failFor(imagePath)) {
      throw new Error(`cannot read ${path.basename(imagePath)}`);
    }
    const text = this.textFor(imagePath);
    const wordCount = countWords(text);
    return { text, wordCount, sufficient: wordCount >= this.minWordsThreshold };
  }
}

export class FakeDescriber implements ContentDescriber {
  readonly name = 'fake-vision';
  readonly calls: string[] = [];

  constructor(
    private readonly result: DescriptionResult = {
      description: 'A chat window with two messages',
      category: 'communication',
      suggestedFilename: 'chat_window',
      confidence: 0.85,
    },
    private readonly failFor: (imagePath: string) => boolean = () => false
  ) {}

  async describe(imagePath: string): Promise<DescriptionResult> {
    this.calls.push(imagePath);
    if (this.failFor(imagePath)) {
      throw new Error(`vision unavailable for ${path.basename(imagePath)}`);
    }
    return { ...this.result };
  }
}
