/**
 * Types for content inspection
 */
import type { FileRef } from '../taxonomy/contracts';

export type ContentKind = 'text' | 'pdf' | 'image' | 'audio' | 'video' | 'document' | 'none';

/**
 * What an inspector could learn about a file beyond its name.
 */
export interface ContentSignal {
  kind: ContentKind;
  textCue: string | null; // Leading text, already truncated
  sceneTags: string[];
  detectedObjects: string[];
  duration: number | null; // Seconds, for audio/video
  metadata: Record<string, string | number | null>;
}

export interface Inspector {
  readonly id: string;
  inspect(file: FileRef, signal?: AbortSignal): Promise<ContentSignal>;
}

export interface ContentReader {
  readonly id: string;
  readonly supportedExtensions: readonly string[];

  canRead(extension: string): boolean;
  read(filePath: string, extension: string): Promise<ContentSignal>;
}

export function emptySignal(kind: ContentKind): ContentSignal {
  return { kind, textCue: null, sceneTags: [], detectedObjects: [], duration: null, metadata: {} };
}
