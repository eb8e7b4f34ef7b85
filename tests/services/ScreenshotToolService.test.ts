import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'path';
import fs from 'fs/promises';
import fse from 'fs-extra';
import { ScreenshotToolService } from '../../src/services/tools/ScreenshotToolService.js';
import { createServiceContext } from '../../src/services/ServiceContext.js';
import { DEFAULT_KEYWORD_PATTERNS } from '../../src/services/classification/KeywordClassifier.js';
import { CATEGORY_DESCRIPTIONS } from '../../src/config/constants.js';
import { FileNotFoundError, SchemaValidationError } from '../../src/errors/index.js';
import { FakeDescriber, FakeExtractor, makeConfig, makeTempDir, removeDir, writeFile } from '../helpers.js';

const TEXT_BY_FILE: Record<string, string> = {
  'err.png': 'Error: NullPointerException at line 42',
  'chat.png': 'hi',
};

describe('ScreenshotToolService', () => {
  let tmpDir: string;
  let baseFolder: string;
  let inbox: string;
  let extractor: FakeExtractor;
  let describer: FakeDescriber;
  let service: ScreenshotToolService;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    baseFolder = path.join(tmpDir, 'organized');
    inbox = path.join(tmpDir, 'inbox');
    await fs.mkdir(inbox, { recursive: true });

    const failing = (imagePath: string) => path.basename(imagePath) === 'bad.png';
    extractor = new FakeExtractor(3, imagePath => TEXT_BY_FILE[path.basename(imagePath)] ?? '', failing);
    describer = new FakeDescriber(undefined, failing);
    service = new ScreenshotToolService(createServiceContext(makeConfig(baseFolder), { extractor, describer }));
  });

  afterEach(async () => {
    await removeDir(tmpDir);
  });

  describe('list_screenshots', () => {
    beforeEach(async () => {
      await writeFile(path.join(inbox, 'a.png'));
      await writeFile(path.join(inbox, 'b.jpg'));
      await writeFile(path.join(inbox, 'c.gif'));
      await writeFile(path.join(inbox, 'notes.txt'));
    });

    it('should list supported images with snake_case fields', async () => {
      const response = await service.listScreenshots({ directory: inbox, recursive: false });

      expect(response.total_count).toBe(3);
      expect(response.truncated).toBe(false);
      expect(response.files.map(f => f.filename)).toEqual(['a.png', 'b.jpg', 'c.gif']);
      expect(response.files[0]).toEqual({
        path: path.join(inbox, 'a.png'),
        filename: 'a.png',
        size_bytes: 1,
        modified_time: expect.any(String),
      });
    });

    it('should truncate to max_files but report the full count', async () => {
      const response = await service.listScreenshots({ directory: inbox, recursive: false, max_files: 2 });

      expect(response.files).toHaveLength(2);
      expect(response.total_count).toBe(3);
      expect(response.truncated).toBe(true);
    });

    it('should raise for a missing directory', async () => {
      const missing = path.join(tmpDir, 'nowhere');
      await expect(service.callTool('list_screenshots', { directory: missing })).rejects.toThrow(
        new FileNotFoundError(missing, `Directory not found: ${missing}`)
      );
    });

    it('should reject malformed arguments', async () => {
      await expect(service.callTool('list_screenshots', {})).rejects.toThrow(SchemaValidationError);
      await expect(service.callTool('list_screenshots', { directory: inbox, max_files: 0 })).rejects.toThrow(
        'Invalid arguments for list_screenshots'
      );
    });
  });

  describe('analyze_screenshot', () => {
    it('should classify from text when enough words are found', async () => {
      const file = await writeFile(path.join(inbox, 'err.png'));

      await expect(service.callTool('analyze_screenshot', { file_path: file })).resolves.toEqual({
        extracted_text: 'Error: NullPointerException at line 42',
        description: 'Error: NullPointerException line',
        category: 'errors',
        suggested_filename: 'error:_nullpointerexception_line',
        processing_method: 'ocr',
        processing_time_ms: expect.any(Number),
        confidence: 0.8,
        word_count: 5,
        success: true,
        error: null,
      });
    });

    it('should describe the image when vision is forced', async () => {
      const file = await writeFile(path.join(inbox, 'err.png'));

      const response = await service.analyzeScreenshot({ file_path: file, force_vision: true });

      expect(extractor.calls).toEqual([]);
      expect(response).toMatchObject({
        extracted_text: null,
        category: 'communication',
        suggested_filename: 'chat_window',
        processing_method: 'vision',
        confidence: 0.85,
        word_count: 0,
        success: true,
      });
    });

    it('should report a failed analysis in the payload', async () => {
      const file = await writeFile(path.join(inbox, 'bad.png'));

      const response = await service.analyzeScreenshot({ file_path: file, force_vision: false });

      expect(response).toMatchObject({
        extracted_text: null,
        description: null,
        category: 'other',
        suggested_filename: 'other_screenshot',
        confidence: 0,
        success: false,
        error: 'vision unavailable for bad.png',
      });
    });

    it('should raise for a missing file', async () => {
      await expect(
        service.callTool('analyze_screenshot', { file_path: path.join(inbox, 'gone.png') })
      ).rejects.toThrow(FileNotFoundError);
    });

    it('should only classify into the configured categories', async () => {
      const file = await writeFile(path.join(inbox, 'trace.png'));
      const restricted = new ScreenshotToolService(
        createServiceContext(makeConfig(baseFolder, { ORGANIZE_CATEGORIES: 'code,other' }), {
          extractor: new FakeExtractor(3, () => 'Error: NullPointerException at line 42 fatal exception'),
          describer,
        })
      );

      const response = await restricted.analyzeScreenshot({ file_path: file, force_vision: false });

      expect(response.processing_method).toBe('ocr');
      expect(response.category).toBe('other');
      expect(restricted.getCategories().categories.map(c => c.name)).toEqual(['code', 'other']);
    });
  });

  describe('get_categories', () => {
    it('should describe every configured category', async () => {
      const response = service.getCategories();

      expect(response.default_category).toBe('other');
      expect(response.categories.map(c => c.name)).toEqual([
        'code',
        'errors',
        'documentation',
        'design',
        'communication',
        'memes',
        'other',
      ]);
      expect(response.categories[0]).toEqual({
        name: 'code',
        description: CATEGORY_DESCRIPTIONS.code,
        keywords: [...DEFAULT_KEYWORD_PATTERNS.code],
      });
      expect(response.categories[6].keywords).toEqual([]);
    });

    it('should reject unexpected argument types', async () => {
      await expect(service.callTool('get_categories', 'all')).rejects.toThrow(SchemaValidationError);
    });
  });

  describe('create_category_folder', () => {
    it('should create the folder under the organization base', async () => {
      await expect(service.callTool('create_category_folder', { category: 'receipts' })).resolves.toEqual({
        folder_path: path.join(baseFolder, 'receipts'),
        created: true,
        success: true,
        error: null,
      });
      await expect(service.callTool('create_category_folder', { category: ' receipts ' })).resolves.toEqual({
        folder_path: path.join(baseFolder, 'receipts'),
        created: false,
        success: true,
        error: null,
      });
    });

    it('should honour base_dir', async () => {
      const elsewhere = path.join(tmpDir, 'elsewhere');

      await expect(
        service.callTool('create_category_folder', { category: 'code', base_dir: elsewhere })
      ).resolves.toMatchObject({ folder_path: path.join(elsewhere, 'code') });
    });

    it('should report a folder that cannot be created instead of raising', async () => {
      const blocker = await writeFile(path.join(tmpDir, 'blocker'), 'not a folder');

      await expect(
        service.callTool('create_category_folder', { category: 'code', base_dir: blocker })
      ).resolves.toEqual({
        folder_path: path.join(blocker, 'code'),
        created: false,
        success: false,
        error: expect.stringMatching(/^ENOTDIR/),
      });
    });

    it('should refuse a category that is not a single folder name', async () => {
      await expect(service.callTool('create_category_folder', { category: '../escape' })).rejects.toThrow(
        SchemaValidationError
      );
      await expect(service.callTool('create_category_folder', { category: '..' })).rejects.toThrow(
        SchemaValidationError
      );
    });
  });

  describe('move_screenshot', () => {
    let source: string;
    let dest: string;

    beforeEach(async () => {
      source = await writeFile(path.join(inbox, 'a.png'), 'image');
      dest = path.join(tmpDir, 'dest');
      await fs.mkdir(dest);
    });

    it('should copy by default and keep the source', async () => {
      await expect(
        service.callTool('move_screenshot', { source_path: source, dest_folder: dest })
      ).resolves.toEqual({
        original_path: source,
        new_path: path.join(dest, 'a.png'),
        operation: 'copy',
        success: true,
        error: null,
      });
      await expect(fse.pathExists(source)).resolves.toBe(true);
      await expect(fs.readFile(path.join(dest, 'a.png'), 'utf8')).resolves.toBe('image');
    });

    it('should rename and avoid collisions', async () => {
      await writeFile(path.join(dest, 'renamed.png'));

      const response = await service.moveScreenshot({
        source_path: source,
        dest_folder: dest,
        new_filename: 'renamed',
        keep_original: true,
      });

      expect(response.new_path).toBe(path.join(dest, 'renamed_1.png'));
    });

    it('should move when the original is not kept', async () => {
      const response = await service.moveScreenshot({ source_path: source, dest_folder: dest, keep_original: false });

      expect(response.operation).toBe('move');
      expect(response.new_path).toBe(path.join(dest, 'a.png'));
      await expect(fse.pathExists(source)).resolves.toBe(false);
    });

    it('should raise when source or destination is missing', async () => {
      await expect(
        service.callTool('move_screenshot', { source_path: path.join(inbox, 'gone.png'), dest_folder: dest })
      ).rejects.toThrow(FileNotFoundError);
      await expect(
        service.callTool('move_screenshot', { source_path: source, dest_folder: path.join(tmpDir, 'none') })
      ).rejects.toThrow(`Destination folder not found: ${path.join(tmpDir, 'none')}`);
    });

    it('should refuse a new filename containing a separator', async () => {
      await expect(
        service.callTool('move_screenshot', { source_path: source, dest_folder: dest, new_filename: 'x/y' })
      ).rejects.toThrow(SchemaValidationError);
    });
  });

  describe('categorize_screenshot', () => {
    it('should report the matched keywords and a confidence per match', async () => {
      await expect(service.callTool('categorize_screenshot', { text: 'def main(): import os' })).resolves.toEqual({
        suggested_category: 'code',
        confidence: 0.7,
        matched_keywords: ['\\bdef\\s+\\w+', '\\bimport\\s+'],
        method: 'keyword_classifier',
      });
    });

    it('should cap the confidence', () => {
      const response = service.categorizeScreenshot({ text: 'error exception failed warning fatal panic' });

      expect(response.suggested_category).toBe('errors');
      expect(response.matched_keywords).toHaveLength(6);
      expect(response.confidence).toBe(0.9);
    });

    it('should fall back to other outside the available categories', () => {
      const response = service.categorizeScreenshot({
        text: 'def main(): import os',
        available_categories: ['errors', 'memes'],
      });

      expect(response).toEqual({
        suggested_category: 'other',
        confidence: 0.5,
        matched_keywords: [],
        method: 'keyword_classifier',
      });
    });

    it('should give other for empty text', () => {
      expect(service.categorizeScreenshot({ text: '' })).toMatchObject({
        suggested_category: 'other',
        confidence: 0.5,
      });
    });
  });

  describe('generate_filename', () => {
    const now = new Date(2024, 2, 9, 10, 30, 0);

    it('should build the name from the leading words of the text', () => {
      expect(
        service.generateFilename(
          { original_filename: 'shot.png', category: 'code', text: 'Login page for the dashboard app' },
          now
        )
      ).toEqual({
        suggested_filename: 'login_page_for_the_dashboard_2024-03-09',
        extension: '.png',
        timestamp: '2024-03-09',
      });
    });

    it('should use the description when the text has no usable words', () => {
      expect(
        service.generateFilename(
          { original_filename: 'shot.jpg', category: 'design', text: 'ok', description: 'Color palette draft' },
          now
        ).suggested_filename
      ).toBe('color_palette_draft_2024-03-09');
    });

    it('should fall back to the category', () => {
      expect(service.generateFilename({ original_filename: 'shot', category: 'memes' }, now)).toEqual({
        suggested_filename: 'memes_screenshot_2024-03-09',
        extension: '',
        timestamp: '2024-03-09',
      });
    });
  });

  describe('organize_folder', () => {
    beforeEach(async () => {
      await writeFile(path.join(inbox, 'err.png'));
      await writeFile(path.join(inbox, 'chat.png'));
      await writeFile(path.join(inbox, 'bad.png'));
    });

    it('should organize every screenshot and report per-file failures', async () => {
      const response = await service.organizeFolder({ directory: inbox, recursive: false, force_vision: false });

      expect(response.stats).toMatchObject({
        total_files: 3,
        processed: 3,
        successful: 2,
        failed: 1,
        skipped: 0,
        errors: ['bad.png: vision unavailable for bad.png'],
      });
      expect(response.success_rate).toBeCloseTo(66.67, 1);
      expect(response.error_summary).toEqual({ errors: ['bad.png: vision unavailable for bad.png'], omitted: 0 });
      expect(response.report.split('\n')).toContain('Failed: 1');

      const errorsFolder = await fs.readdir(path.join(baseFolder, 'errors'));
      expect(errorsFolder).toHaveLength(1);
      expect(errorsFolder[0]).toMatch(/^error_nullpointerexception_line_\d{8}_\d{6}\.png$/);
      const chatFolder = await fs.readdir(path.join(baseFolder, 'communication'));
      expect(chatFolder[0]).toMatch(/^chat_window_\d{8}_\d{6}\.png$/);
      expect((await fs.readdir(path.join(baseFolder, '_originals'))).sort()).toEqual(['chat.png', 'err.png']);

      await expect(service.getStatistics()).resolves.toEqual({
        code: 0,
        errors: 1,
        documentation: 0,
        design: 0,
        communication: 1,
        memes: 0,
        other: 0,
      });
    });

    it('should apply the size filter before processing', async () => {
      const response = await service.organizeFolder({
        directory: inbox,
        recursive: false,
        force_vision: false,
        min_size_kb: 1,
      });

      expect(response.stats.total_files).toBe(0);
      expect(extractor.calls).toEqual([]);
    });

    it('should reject an inverted size range', async () => {
      await expect(
        service.callTool('organize_folder', { directory: inbox, min_size_kb: 10, max_size_kb: 1 })
      ).rejects.toThrow(SchemaValidationError);
    });

    it('should raise for a missing directory', async () => {
      await expect(
        service.callTool('organize_folder', { directory: path.join(tmpDir, 'missing') })
      ).rejects.toThrow(FileNotFoundError);
    });
  });
});
