import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import path from 'path';
import { AxiosRequestConfig } from 'axios';
import {
  DisabledContentDescriber,
  VisionContentDescriber,
  VisionHttpClient,
  imageMimeType,
} from '../../src/services/description/VisionContentDescriber.js';
import {
  ConfigurationError,
  DescriptionError,
  DescriptionFormatError,
} from '../../src/errors/index.js';
import { VisionConfig } from '../../src/config/types.js';
import { makeConfig, makeTempDir, removeDir, writeFile } from '../helpers.js';

interface RecordedCall {
  url: string;
  data: unknown;
  config?: AxiosRequestConfig;
}

class RecordingClient implements VisionHttpClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly reply: () => unknown) {}

  async post(url: string, data: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }> {
    this.calls.push({ url, data, config });
    return { data: this.reply() };
  }
}

function chatReply(content: string | null) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

const CATEGORIES = ['code', 'errors', 'communication', 'other'];

describe('VisionContentDescriber', () => {
  let tmpDir: string;
  let imagePath: string;

  beforeAll(async () => {
    tmpDir = await makeTempDir();
    imagePath = await writeFile(path.join(tmpDir, 'shot.jpg'), 'abc');
  });

  afterAll(async () => {
    await removeDir(tmpDir);
  });

  function visionConfig(env: Record<string, string>): VisionConfig {
    return makeConfig(tmpDir, env).vision;
  }

  it('should post the image to the OpenAI chat completions endpoint', async () => {
    const client = new RecordingClient(() =>
      chatReply('```json\n{"category": "code", "description": "An editor", "filename": "editor_view"}\n```')
    );
    const describer = new VisionContentDescriber(
      visionConfig({ VISION_PROVIDER: 'openai', VISION_API_KEY: 'test-secret' }),
      CATEGORIES,
      client
    );

    const result = await describer.describe(imagePath);

    expect(result).toEqual({
      category: 'code',
      description: 'An editor',
      suggestedFilename: 'editor_view',
      confidence: 0.8,
    });
    expect(client.calls).toHaveLength(1);
    const call = client.calls[0];
    expect(call.url).toBe('https://api.openai.com/v1/chat/completions');
    expect(call.config?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    expect(call.data).toMatchObject({
      model: 'gpt-4o',
      max_tokens: 500,
      temperature: 0.3,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: expect.stringContaining('Categories must be one of: code, errors, communication, other') },
            { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,YWJj' } },
          ],
        },
      ],
    });
  });

  it('should address an Azure deployment with the api-key header', async () => {
    const client = new RecordingClient(() =>
      chatReply('{"category": "errors", "description": "A stack trace", "filename": "trace", "confidence": 0.6}')
    );
    const describer = new VisionContentDescriber(
      visionConfig({
        VISION_PROVIDER: 'azure',
        VISION_API_KEY: 'test-secret',
        AZURE_OPENAI_ENDPOINT: 'https://vision.example.test/',
        AZURE_OPENAI_DEPLOYMENT: 'shots',
      }),
      CATEGORIES,
      client
    );

    const result = await describer.describe(imagePath);

    expect(result.confidence).toBe(0.6);
    const call = client.calls[0];
    expect(call.url).toBe('https://vision.example.test/openai/deployments/shots/chat/completions');
    expect(call.config?.params).toEqual({ 'api-version': '2024-10-21' });
    expect(call.config?.headers).toEqual({ 'api-key': 'test-secret', 'Content-Type': 'application/json' });
    expect(call.data).not.toHaveProperty('model');
  });

  it('should coerce an unknown category to other', async () => {
    const client = new RecordingClient(() =>
      chatReply('{"category": "recipes", "description": "A cake", "filename": "cake"}')
    );
    const describer = new VisionContentDescriber(
      visionConfig({ VISION_PROVIDER: 'openai', VISION_API_KEY: 'test-secret' }),
      CATEGORIES,
      client
    );

    await expect(describer.describe(imagePath)).resolves.toMatchObject({ category: 'other' });
  });

  it('should fail with a configuration error before any request when the key is missing', async () => {
    const client = new RecordingClient(() => chatReply('{}'));
    const describer = new VisionContentDescriber(visionConfig({ VISION_PROVIDER: 'openai' }), CATEGORIES, client);

    await expect(describer.describe(imagePath)).rejects.toThrow(ConfigurationError);
    expect(client.calls).toEqual([]);
  });

  it('should wrap transport failures in a DescriptionError', async () => {
    const client = new RecordingClient(() => {
      throw new Error('socket hang up');
    });
    const describer = new VisionContentDescriber(
      visionConfig({ VISION_PROVIDER: 'openai', VISION_API_KEY: 'test-secret' }),
      CATEGORIES,
      client
    );

    const error = await describer.describe(imagePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DescriptionError);
    expect(error).toMatchObject({ message: 'Vision request failed: socket hang up', statusCode: 502 });
  });

  it('should reject a completion without message content', async () => {
    const client = new RecordingClient(() => chatReply(null));
    const describer = new VisionContentDescriber(
      visionConfig({ VISION_PROVIDER: 'openai', VISION_API_KEY: 'test-secret' }),
      CATEGORIES,
      client
    );

    await expect(describer.describe(imagePath)).rejects.toThrow(DescriptionFormatError);
  });

  it('should reject a reply that is not JSON', async () => {
    const client = new RecordingClient(() => chatReply('I think this is code.'));
    const describer = new VisionContentDescriber(
      visionConfig({ VISION_PROVIDER: 'openai', VISION_API_KEY: 'test-secret' }),
      CATEGORIES,
      client
    );

    await expect(describer.describe(imagePath)).rejects.toThrow('Invalid JSON response from vision model');
  });

  it('should map image extensions to MIME types', () => {
    expect(imageMimeType('/a/b.PNG')).toBe('image/png');
    expect(imageMimeType('/a/b.jpg')).toBe('image/jpeg');
    expect(imageMimeType('/a/b.tiff')).toBe('image/tiff');
  });
});

describe('DisabledContentDescriber', () => {
  it('should refuse to describe', async () => {
    await expect(new DisabledContentDescriber().describe('/shots/a.png')).rejects.toThrow(
      'Vision fallback is disabled; cannot describe a.png'
    );
  });
});
