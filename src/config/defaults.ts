import { AppConfig } from './types.js';
import { DEFAULT_CATEGORIES, DEFAULT_IMAGE_EXTENSIONS } from './constants.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 3400,
    host: '127.0.0.1',
    env: 'development',
  },
  organization: {
    baseFolder: '~/Screenshots/organized',
    categories: [...DEFAULT_CATEGORIES],
    keepOriginals: true,
  },
  processing: {
    ocrMinWords: 10,
    ocrConfidence: 0.8,
  },
  ocr: {
    engine: 'tesseract',
    tesseractPath: 'tesseract',
    language: 'eng',
  },
  vision: {
    provider: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o',
    azure: {
      deployment: 'gpt-4o',
      apiVersion: '2024-10-21',
    },
    timeoutMs: 0, // callers apply their own timeout
    defaultConfidence: 0.8,
    maxTokens: 500,
    temperature: 0.3, // low temperature keeps categories consistent
  },
  scan: {
    extensions: [...DEFAULT_IMAGE_EXTENSIONS],
    ignorePatterns: [],
    errorSummaryLimit: 10,
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
