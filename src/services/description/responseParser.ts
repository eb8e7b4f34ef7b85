import { z } from 'zod';
import { logger } from '../../middleware/logging.js';
import { DescriptionFormatError } from '../../errors/index.js';
import { OTHER_CATEGORY } from '../../config/constants.js';
import { DescriptionResult } from '../../types/capabilities.js';

/**
 * Vision reply parsing
 *
 * The model is asked for one JSON object. Replies sometimes arrive wrapped in
 * Markdown fences; those are stripped. Anything that is still not a JSON
 * object with string category/description/filename is a hard failure.
 */

const visionReplySchema = z.object({
  category: z.string(),
  description: z.string(),
  filename: z.string(),
  confidence: z.number().optional(),
});

export function stripMarkdownFences(raw: string): string {
  let text = raw.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(text);
  if (fenced) {
    text = fenced[1];
  }
  return text.trim();
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function parseDescriptionResponse(
  raw: string,
  categories: readonly string[],
  defaultConfidence: number
): DescriptionResult {
  const body = stripMarkdownFences(raw);

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new DescriptionFormatError(
      raw,
      'Invalid JSON response from vision model',
      { service: 'VisionContentDescriber', operation: 'parse' },
      error instanceof Error ? error : undefined
    );
  }

  const parsed = visionReplySchema.safeParse(data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)');
    throw new DescriptionFormatError(
      raw,
      `Incomplete response from vision model: ${fields.join(', ')}`,
      { service: 'VisionContentDescriber', operation: 'parse', metadata: { fields } }
    );
  }

  const reply = parsed.data;
  let category = reply.category.trim().toLowerCase();
  if (!categories.includes(category)) {
    logger.warn('Invalid category from vision model, defaulting to other', {
      category: reply.category,
    });
    category = OTHER_CATEGORY;
  }

  return {
    category,
    description: reply.description,
    suggestedFilename: reply.filename,
    confidence: clamp01(reply.confidence ?? defaultConfidence),
  };
}
