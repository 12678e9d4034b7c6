import * as fs from 'fs';
import { DEEP_ANALYSIS_TEXT_PREVIEW_CHARS } from '../config/constants';
import type { ContentReader, ContentSignal } from './types';

/**
 * PDF reader - text layer via pdf-parse.
 *
 * pdf-parse is loaded on first use; its entry module runs a debug routine
 * when it is the main module.
 */
export class PdfReader implements ContentReader {
  readonly id = 'pdf-reader';
  readonly supportedExtensions = ['pdf'];

  constructor(private readonly previewChars: number = DEEP_ANALYSIS_TEXT_PREVIEW_CHARS) {}

  canRead(extension: string): boolean {
    return this.supportedExtensions.includes(extension.toLowerCase());
  }

  async read(filePath: string): Promise<ContentSignal> {
    const { default: pdf } = await import('pdf-parse');
    const dataBuffer = await fs.promises.readFile(filePath);
    const pdfData = await pdf(dataBuffer);
    const rawText = pdfData.text.trim();

    // No text layer: most likely a scan
    const isImageBased = rawText.length === 0;
    return {
      kind: 'pdf',
      textCue: isImageBased ? null : rawText.slice(0, this.previewChars),
      sceneTags: isImageBased ? ['scan'] : [],
      detectedObjects: [],
      duration: null,
      metadata: {
        pages: pdfData.numpages,
        title: typeof pdfData.info?.Title === 'string' ? pdfData.info.Title : null,
        author: typeof pdfData.info?.Author === 'string' ? pdfData.info.Author : null,
      },
    };
  }
}
