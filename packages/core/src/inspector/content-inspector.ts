import * as fs from 'fs';
import * as path from 'path';
import { INSPECTOR_MAX_FILE_SIZE_BYTES, INSPECTOR_TIMEOUT_MS } from '../config/constants';
import { errorMessage, InspectionError } from '../errors';
import { fileTypeFromExtension, normalizeExtension } from '../clustering/file-types';
import { abortable, withTimeout } from '../shared/async';
import type { FileRef } from '../taxonomy/contracts';
import { PdfReader } from './pdf-reader';
import { TextReader } from './text-reader';
import { emptySignal, type ContentKind, type ContentReader, type ContentSignal, type Inspector } from './types';

export interface ContentInspectorOptions {
  readers?: ContentReader[];
  maxFileSizeBytes?: number;
  timeoutMs?: number;
}

function kindFromExtension(extension: string): ContentKind {
  switch (fileTypeFromExtension(extension)) {
    case 'image':
      return 'image';
    case 'audio':
      return 'audio';
    case 'video':
      return 'video';
    case 'document':
      return 'document';
    default:
      return 'none';
  }
}

/**
 * ContentInspector - routes a file to the reader for its extension.
 *
 * Kinds without a reader (images, media, office formats) get an empty signal
 * of the right kind. Failures surface as InspectionError; the analyzer treats
 * them as "no signal".
 */
export class ContentInspector implements Inspector {
  readonly id = 'content-inspector';
  private readonly readers: ContentReader[];
  private readonly maxFileSizeBytes: number;
  private readonly timeoutMs: number;

  constructor(options: ContentInspectorOptions = {}) {
    this.readers = options.readers ?? [new TextReader(), new PdfReader()];
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? INSPECTOR_MAX_FILE_SIZE_BYTES;
    this.timeoutMs = options.timeoutMs ?? INSPECTOR_TIMEOUT_MS;
  }

  findReader(extension: string): ContentReader | null {
    return this.readers.find((reader) => reader.canRead(extension)) ?? null;
  }

  async inspect(file: FileRef, signal?: AbortSignal): Promise<ContentSignal> {
    const extension = normalizeExtension(path.extname(file.filename));
    const reader = this.findReader(extension);
    if (!reader) {
      return emptySignal(kindFromExtension(extension));
    }

    let size: number;
    try {
      size = (await fs.promises.stat(file.path)).size;
    } catch (error) {
      throw new InspectionError(`Cannot stat file: ${errorMessage(error)}`, file.path);
    }
    if (size > this.maxFileSizeBytes) {
      throw new InspectionError(
        `File too large (${Math.round(size / 1024 / 1024)}MB), skipping content inspection`,
        file.path,
      );
    }

    try {
      return await withTimeout(
        abortable(reader.read(file.path, extension), signal, () => new InspectionError('Inspection cancelled', file.path)),
        this.timeoutMs,
        () => new InspectionError(`Inspection timeout after ${this.timeoutMs}ms`, file.path),
      );
    } catch (error) {
      if (error instanceof InspectionError) throw error;
      throw new InspectionError(`${reader.id} failed: ${errorMessage(error)}`, file.path);
    }
  }
}
