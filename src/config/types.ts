export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
}

export interface OrganizationConfig {
  baseFolder: string;
  categories: string[];
  keepOriginals: boolean;
}

export interface ProcessingConfig {
  ocrMinWords: number; // words needed before OCR text is trusted for classification
  ocrConfidence: number;
}

export interface OcrConfig {
  engine: 'tesseract' | 'none';
  tesseractPath: string;
  language: string;
}

export interface VisionConfig {
  provider: 'openai' | 'azure' | 'none';
  baseUrl: string;
  apiKey?: string | undefined;
  model: string;
  azure: {
    endpoint?: string | undefined;
    deployment: string;
    apiVersion: string;
  };
  timeoutMs: number; // 0 = no timeout
  defaultConfidence: number;
  maxTokens: number;
  temperature: number;
}

export interface ScanConfig {
  extensions: string[];
  ignorePatterns: string[];
  errorSummaryLimit: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  server: ServerConfig;
  organization: OrganizationConfig;
  processing: ProcessingConfig;
  ocr: OcrConfig;
  vision: VisionConfig;
  scan: ScanConfig;
  logging: LoggingConfig;
}
