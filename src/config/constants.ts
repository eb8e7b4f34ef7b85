/**
 * Application-wide Constants
 *
 * Centralized location for category names, folder names and tuning values.
 */

/**
 * The universal fallback category. Always valid, whatever the configured set.
 */
export const OTHER_CATEGORY = 'other';

/**
 * Default category set, in declaration order
 */
export const DEFAULT_CATEGORIES = [
  'code',
  'errors',
  'documentation',
  'design',
  'communication',
  'memes',
  OTHER_CATEGORY,
] as const;

/**
 * Human-readable descriptions returned by get_categories
 */
export const CATEGORY_DESCRIPTIONS: Record<string, string> = {
  code: 'Code snippets, terminal output, IDE screenshots, programming content',
  errors: 'Error messages, stack traces, warnings, exceptions',
  documentation: 'Documentation pages, technical specs, API references',
  design: 'UI mockups, design files, graphics, visual assets',
  communication: 'Messages, emails, chat conversations, social media',
  memes: 'Memes, jokes, funny images',
  other: "Miscellaneous screenshots that don't fit other categories",
};

/**
 * Supported screenshot extensions (lower-case, with leading dot)
 */
export const DEFAULT_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.tiff'] as const;

/**
 * Organization layout
 */
export const ORGANIZATION = {
  /** Archive folder for originals, created under the base folder */
  ARCHIVE_FOLDER: '_originals',
  /** Maximum length of a sanitized filename stem */
  MAX_NAME_LENGTH: 50,
  /** Stem used when sanitization leaves nothing */
  FALLBACK_NAME: 'screenshot',
} as const;

/**
 * Filename generation from extracted text or descriptions
 */
export const NAMING = {
  /** Number of tokens taken from text */
  MAX_TOKENS: 5,
  /** Tokens must be longer than this */
  MIN_TOKEN_LENGTH: 2,
} as const;

/**
 * Keyword classifier confidence for categorize_screenshot
 */
export const KEYWORD_CONFIDENCE = {
  BASE: 0.5,
  PER_MATCH: 0.1,
  MAX: 0.9,
} as const;

/**
 * Prompt sent with every image to the vision backend
 */
export function buildVisionPrompt(categories: readonly string[]): string {
  const list = categories.join(', ');
  return `Analyze this screenshot and determine:
1. Category: ${list}
2. Main content description (brief, 1-2 sentences)
3. Suggested filename (descriptive, no spaces, lowercase with underscores)

Return ONLY valid JSON in this exact format:
{"category": "code", "description": "Brief description here", "filename": "descriptive_name_here"}

Categories must be one of: ${list}`;
}
