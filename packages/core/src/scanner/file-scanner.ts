import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { scannerConfig, type ScannerConfig } from '../config';
import { errorMessage } from '../errors';
import type { ScannedFile } from '../taxonomy/contracts';

/**
 * Stable file id from path, size and mtime.
 */
export function computeFileId(filePath: string, size: number, mtime: number): string {
  return crypto.createHash('sha1').update(`${filePath}|${size}|${mtime}`).digest('hex');
}

export interface ScannedFolder {
  name: string;
  path: string;
  /** Every file below the folder, at any depth. */
  files: ScannedFile[];
}

export interface HierarchyScan {
  folders: ScannedFolder[];
  looseFiles: ScannedFile[];
}

export interface ScanReport {
  files: ScannedFile[];
  skipped: number;
  truncated: boolean;
  errors: string[];
}

interface StackEntry {
  path: string;
  relativePath: string;
}

/**
 * FileScanner - iterative directory walk producing file records.
 *
 * Hidden entries and the configured folders are skipped, files under
 * `minFileSize` bytes are ignored and the walk stops at `maxFiles`. File
 * contents are never read.
 */
export class FileScanner {
  private readonly config: ScannerConfig;
  private readonly excluded: Set<string>;

  constructor(config?: ScannerConfig) {
    this.config = config ?? scannerConfig();
    this.excluded = new Set(this.config.excludedFolders);
  }

  private shouldExclude(name: string, isDirectory: boolean): boolean {
    if (!this.config.includeHidden && name.startsWith('.')) return true;
    return isDirectory && this.excluded.has(name);
  }

  async scan(root: string): Promise<ScannedFile[]> {
    return (await this.scanWithReport(root)).files;
  }

  async scanWithReport(root: string): Promise<ScanReport> {
    const sourceRoot = path.resolve(root);
    const files: ScannedFile[] = [];
    const errors: string[] = [];
    let skipped = 0;
    let truncated = false;
    const stack: StackEntry[] = [{ path: sourceRoot, relativePath: '' }];

    walk: while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;

      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(current.path, { withFileTypes: true });
      } catch (error) {
        const message = `Cannot read directory ${current.path}: ${errorMessage(error)}`;
        errors.push(message);
        console.warn(`[FileScanner] ${message}`);
        continue;
      }
      entries.sort((a, b) => a.name.localeCompare(b.name));

      const subdirectories: StackEntry[] = [];
      for (const entry of entries) {
        if (this.shouldExclude(entry.name, entry.isDirectory())) continue;
        const fullPath = path.join(current.path, entry.name);
        const relativePath = path.relative(sourceRoot, fullPath);

        if (entry.isDirectory()) {
          subdirectories.push({ path: fullPath, relativePath });
          continue;
        }
        if (!entry.isFile()) continue;

        let stats: fs.Stats;
        try {
          stats = await fs.promises.stat(fullPath);
        } catch (error) {
          const message = `Cannot stat ${fullPath}: ${errorMessage(error)}`;
          errors.push(message);
          console.warn(`[FileScanner] ${message}`);
          continue;
        }
        if (stats.size < this.config.minFileSize) {
          skipped++;
          continue;
        }
        if (files.length >= this.config.maxFiles) {
          truncated = true;
          break walk;
        }

        const parent = path.dirname(relativePath);
        files.push({
          id: computeFileId(fullPath, stats.size, stats.mtimeMs),
          filename: entry.name,
          path: fullPath,
          extension: path.extname(entry.name).replace(/^\./, '').toLowerCase(),
          size: stats.size,
          createdAt: stats.birthtimeMs,
          modifiedAt: stats.mtimeMs,
          relativePath,
          parentFolder: parent === '.' ? null : parent,
        });
      }
      // Reverse so the stack pops subdirectories in name order
      stack.push(...subdirectories.reverse());
    }

    if (truncated) {
      console.warn(`[FileScanner] Stopped at ${this.config.maxFiles} files in ${sourceRoot}`);
    }
    console.log(`[FileScanner] Scanned ${sourceRoot}: ${files.length} files (${skipped} too small)`);
    return { files, skipped, truncated, errors };
  }

  /**
   * Partition into top-level folders (with everything below them) and loose
   * files directly in the root.
   */
  async scanHierarchy(root: string): Promise<HierarchyScan> {
    const sourceRoot = path.resolve(root);
    const files = await this.scan(sourceRoot);
    const folders = new Map<string, ScannedFolder>();
    const looseFiles: ScannedFile[] = [];

    for (const file of files) {
      const relative = file.relativePath ?? path.relative(sourceRoot, file.path);
      const segments = relative.split(path.sep);
      if (segments.length === 1) {
        looseFiles.push(file);
        continue;
      }
      const name = segments[0];
      let folder = folders.get(name);
      if (!folder) {
        folder = { name, path: path.join(sourceRoot, name), files: [] };
        folders.set(name, folder);
      }
      folder.files.push(file);
    }

    return {
      folders: [...folders.values()].sort((a, b) => a.name.localeCompare(b.name)),
      looseFiles,
    };
  }
}
