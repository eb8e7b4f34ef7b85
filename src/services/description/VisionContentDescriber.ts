/**
 * Vision Content Describer
 * Sends a screenshot to an OpenAI-compatible (or Azure OpenAI) chat-completions
 * endpoint and turns the JSON reply into a category, description and filename.
 *
 * The call may be slow and billed per request; the pipeline only reaches this
 * when OCR text is insufficient or vision is forced.
 */

import path from 'path';
import fs from 'fs-extra';
import axios, { AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { logger } from '../../middleware/logging.js';
import {
  ConfigurationError,
  DescriptionError,
  DescriptionFormatError,
} from '../../errors/index.js';
import { buildVisionPrompt } from '../../config/constants.js';
import { VisionConfig } from '../../config/types.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { ContentDescriber, DescriptionResult } from '../../types/capabilities.js';
import { parseDescriptionResponse } from './responseParser.js';

/**
 * The part of an axios instance the describer uses
 */
export interface VisionHttpClient {
  post(url: string, data: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  bmp: 'image/bmp',
  tiff: 'image/tiff',
  webp: 'image/webp',
};

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

export function imageMimeType(imagePath: string): string {
  const extension = path.extname(imagePath).slice(1).toLowerCase();
  return MIME_TYPES[extension] ?? `image/${extension || 'png'}`;
}

export class VisionContentDescriber implements ContentDescriber {
  readonly name: string;
  private readonly client: VisionHttpClient;
  private readonly prompt: string;

  constructor(
    private readonly config: VisionConfig,
    private readonly categories: readonly string[],
    client?: VisionHttpClient
  ) {
    this.name = `vision:${config.provider}`;
    this.prompt = buildVisionPrompt(categories);
    this.client = client ?? axios.create({ timeout: config.timeoutMs });

    logger.info('VisionContentDescriber initialized (credentials checked on first use)', {
      provider: config.provider,
      model: config.provider === 'azure' ? config.azure.deployment : config.model,
    });
  }

  async describe(imagePath: string): Promise<DescriptionResult> {
    const startTime = Date.now();
    const apiKey = this.requireApiKey();

    const image = await fs.readFile(imagePath);
    const dataUrl = `data:${imageMimeType(imagePath)};base64,${image.toString('base64')}`;

    const body = {
      ...(this.config.provider === 'openai' && { model: this.config.model }),
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: this.prompt },
            { type: 'image_url', image_url: { url: dataUrl } },
          ],
        },
      ],
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };

    const { url, requestConfig } = this.buildRequest(apiKey);

    let responseData: unknown;
    try {
      const response = await this.client.post(url, body, requestConfig);
      responseData = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.error('Vision request failed', {
        provider: this.config.provider,
        imagePath,
        status,
        error: getErrorMessage(error),
        durationMs: Date.now() - startTime,
      });
      throw new DescriptionError(
        this.name,
        status,
        `Vision request failed${status ? ` (${status})` : ''}: ${getErrorMessage(error)}`,
        { operation: 'describe', durationMs: Date.now() - startTime },
        toError(error)
      );
    }

    const completion = chatCompletionSchema.safeParse(responseData);
    const content = completion.success ? completion.data.choices[0].message.content : undefined;
    if (!content) {
      throw new DescriptionFormatError(
        JSON.stringify(responseData ?? null),
        'Vision response contained no message content',
        { service: this.name, operation: 'describe' }
      );
    }

    logger.debug('Vision raw response', { content: content.slice(0, 200) });

    const result = parseDescriptionResponse(content, this.categories, this.config.defaultConfidence);

    logger.info('Vision processing complete', {
      imagePath,
      category: result.category,
      durationMs: Date.now() - startTime,
    });

    return result;
  }

  private requireApiKey(): string {
    if (!this.config.apiKey) {
      throw new ConfigurationError(
        'VISION_API_KEY',
        'Vision credentials not found. Set VISION_API_KEY (and AZURE_OPENAI_ENDPOINT for Azure).'
      );
    }
    return this.config.apiKey;
  }

  private buildRequest(apiKey: string): { url: string; requestConfig: AxiosRequestConfig } {
    if (this.config.provider === 'azure') {
      const endpoint = this.config.azure.endpoint;
      if (!endpoint) {
        throw new ConfigurationError('AZURE_OPENAI_ENDPOINT', 'AZURE_OPENAI_ENDPOINT is required for Azure vision');
      }
      const base = endpoint.replace(/\/+$/, '');
      return {
        url: `${base}/openai/deployments/${encodeURIComponent(this.config.azure.deployment)}/chat/completions`,
        requestConfig: {
          params: { 'api-version': this.config.azure.apiVersion },
          headers: { 'api-key': apiKey, 'Content-Type': 'application/json' },
        },
      };
    }

    return {
      url: `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`,
      requestConfig: {
        headers: { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' },
      },
    };
  }
}

/**
 * Describer used when no vision backend is configured
 */
export class DisabledContentDescriber implements ContentDescriber {
  readonly name = 'none';

  async describe(imagePath: string): Promise<DescriptionResult> {
    throw new ConfigurationError(
      'VISION_PROVIDER',
      `Vision fallback is disabled; cannot describe ${path.basename(imagePath)}`
    );
  }
}
