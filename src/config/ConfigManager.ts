import dotenv from 'dotenv';
import { AppConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { OTHER_CATEGORY } from './constants.js';
import { ConfigurationError } from '../errors/index.js';

type Env = Record<string, string | undefined>;

/**
 * Build an AppConfig from defaults plus environment overrides.
 * Pure: reads only the env object it is given.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const reader = new EnvReader(env);
  const config: AppConfig = structuredClone(defaultConfig);

  // Server configuration
  config.server.port = reader.getNumber('PORT', config.server.port);
  config.server.host = reader.getString('HOST', config.server.host);
  config.server.env = reader.getEnum('NODE_ENV', config.server.env, [
    'development',
    'production',
    'test',
  ]);

  // Organization
  config.organization.baseFolder = reader.getString(
    'ORGANIZE_BASE_FOLDER',
    config.organization.baseFolder
  );
  config.organization.categories = reader.getStringArray(
    'ORGANIZE_CATEGORIES',
    config.organization.categories
  );
  if (!config.organization.categories.includes(OTHER_CATEGORY)) {
    config.organization.categories.push(OTHER_CATEGORY);
  }
  config.organization.keepOriginals = reader.getBoolean(
    'ORGANIZE_KEEP_ORIGINALS',
    config.organization.keepOriginals
  );

  // Processing thresholds
  config.processing.ocrMinWords = reader.getNumber('OCR_MIN_WORDS', config.processing.ocrMinWords);
  config.processing.ocrConfidence = reader.getFloat(
    'OCR_CONFIDENCE',
    config.processing.ocrConfidence
  );

  // OCR engine
  config.ocr.engine = reader.getEnum('OCR_ENGINE', config.ocr.engine, ['tesseract', 'none']);
  config.ocr.tesseractPath = reader.getString('TESSERACT_PATH', config.ocr.tesseractPath);
  config.ocr.language = reader.getString('OCR_LANGUAGE', config.ocr.language);

  // Vision backend
  config.vision.provider = reader.getEnum('VISION_PROVIDER', config.vision.provider, [
    'openai',
    'azure',
    'none',
  ]);
  config.vision.baseUrl = reader.getString('VISION_BASE_URL', config.vision.baseUrl);
  config.vision.apiKey = env.VISION_API_KEY;
  config.vision.model = reader.getString('VISION_MODEL', config.vision.model);
  config.vision.azure.endpoint = env.AZURE_OPENAI_ENDPOINT;
  config.vision.azure.deployment = reader.getString(
    'AZURE_OPENAI_DEPLOYMENT',
    config.vision.azure.deployment
  );
  config.vision.azure.apiVersion = reader.getString(
    'AZURE_OPENAI_API_VERSION',
    config.vision.azure.apiVersion
  );
  config.vision.timeoutMs = reader.getNumber('VISION_TIMEOUT_MS', config.vision.timeoutMs);
  config.vision.defaultConfidence = reader.getFloat(
    'VISION_DEFAULT_CONFIDENCE',
    config.vision.defaultConfidence
  );

  // Scanning
  config.scan.extensions = reader
    .getStringArray('SCAN_EXTENSIONS', config.scan.extensions)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());
  config.scan.ignorePatterns = reader.getStringArray(
    'SCAN_IGNORE_PATTERNS',
    config.scan.ignorePatterns
  );
  config.scan.errorSummaryLimit = reader.getNumber(
    'BATCH_ERROR_SUMMARY_LIMIT',
    config.scan.errorSummaryLimit
  );

  // Logging configuration
  config.logging.level = reader.getEnum('LOG_LEVEL', config.logging.level, [
    'error',
    'warn',
    'info',
    'debug',
  ]);
  config.logging.file.enabled = reader.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
  config.logging.file.path = reader.getString('LOG_FILE_PATH', config.logging.file.path);
  config.logging.console.enabled = reader.getBoolean(
    'LOG_CONSOLE_ENABLED',
    config.logging.console.enabled
  );

  return config;
}

/**
 * Validate a loaded configuration. Returns warnings; throws on hard errors.
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.processing.ocrMinWords < 0) {
    errors.push('OCR_MIN_WORDS must not be negative');
  }

  for (const [key, value] of [
    ['OCR_CONFIDENCE', config.processing.ocrConfidence],
    ['VISION_DEFAULT_CONFIDENCE', config.vision.defaultConfidence],
  ] as const) {
    if (value < 0 || value > 1) {
      errors.push(`${key} must be between 0 and 1`);
    }
  }

  if (config.vision.provider === 'azure' && !config.vision.azure.endpoint) {
    errors.push('AZURE_OPENAI_ENDPOINT is required when VISION_PROVIDER=azure');
  }

  if (config.vision.provider !== 'none' && !config.vision.apiKey) {
    warnings.push('VISION_API_KEY not provided - vision fallback will fail when used');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'config',
      `Configuration validation failed:\n${errors.join('\n')}`
    );
  }

  return warnings;
}

class EnvReader {
  constructor(private readonly env: Env) {}

  getString(key: string, defaultValue: string): string {
    const value = this.env[key];
    return value || defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  getFloat(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  getStringArray(key: string, defaultValue: string[]): string[] {
    const value = this.env[key];
    if (!value) {
      return [...defaultValue];
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }
}

/**
 * Process-wide configuration holder for the entry point.
 * Services never read it directly; they receive their config through the ServiceContext.
 */
export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  validate(): string[] {
    return validateConfig(this.config);
  }
}
