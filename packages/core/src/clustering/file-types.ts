import fileTypeTable from './data/file-types.json';

export const FILE_TYPE_HINTS = ['document', 'video', 'audio', 'image', 'archive', 'application', 'other'] as const;

export type FileTypeHint = (typeof FILE_TYPE_HINTS)[number];

const DISPLAY_NAMES: Record<FileTypeHint, string> = {
  document: 'Documents',
  video: 'Videos',
  audio: 'Audio',
  image: 'Images',
  archive: 'Archives',
  application: 'Applications',
  other: 'Other',
};

const EXTENSION_TO_TYPE = new Map<string, FileTypeHint>();
for (const hint of FILE_TYPE_HINTS) {
  const extensions: readonly string[] = hint === 'other' ? [] : fileTypeTable[hint];
  for (const extension of extensions) {
    EXTENSION_TO_TYPE.set(extension, hint);
  }
}

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\./, '').toLowerCase();
}

export function fileTypeFromExtension(extension: string): FileTypeHint {
  return EXTENSION_TO_TYPE.get(normalizeExtension(extension)) ?? 'other';
}

export function fileTypeDisplayName(hint: FileTypeHint): string {
  return DISPLAY_NAMES[hint];
}
