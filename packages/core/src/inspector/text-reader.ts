import * as fs from 'fs';
import { DEEP_ANALYSIS_TEXT_PREVIEW_CHARS } from '../config/constants';
import type { ContentReader, ContentSignal } from './types';

const TEXT_EXTENSIONS = ['txt', 'md', 'markdown', 'csv', 'tsv', 'json', 'log', 'xml', 'yaml', 'yml', 'html', 'htm', 'ini'];

/**
 * Plain-text reader. Only the head of the file is read.
 */
export class TextReader implements ContentReader {
  readonly id = 'text-reader';
  readonly supportedExtensions = TEXT_EXTENSIONS;

  constructor(private readonly previewChars: number = DEEP_ANALYSIS_TEXT_PREVIEW_CHARS) {}

  canRead(extension: string): boolean {
    return this.supportedExtensions.includes(extension.toLowerCase());
  }

  async read(filePath: string, extension: string): Promise<ContentSignal> {
    const handle = await fs.promises.open(filePath, 'r');
    try {
      // UTF-8 needs at most 4 bytes per char
      const buffer = Buffer.alloc(this.previewChars * 4);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
      const text = buffer.subarray(0, bytesRead).toString('utf8').slice(0, this.previewChars).trim();
      const lineCount = text.length === 0 ? 0 : text.split(/\r?\n/).length;
      return {
        kind: 'text',
        textCue: text.length > 0 ? text : null,
        sceneTags: [],
        detectedObjects: [],
        duration: null,
        metadata: { extension, previewLines: lineCount },
      };
    } finally {
      await handle.close();
    }
  }
}
