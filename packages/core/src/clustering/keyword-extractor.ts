/**
 * KeywordExtractor - filename -> normalized keywords
 *
 * Splits a filename on delimiters and camelCase boundaries, normalizes case,
 * drops short, numeric and stopword tokens, and picks up a date hint and a
 * file-type hint. Pure and total: every filename produces a result.
 */
import * as path from 'path';
import { KEYWORD_MIN_LENGTH_FAST, KEYWORD_MIN_LENGTH_QUALITY } from '../config/constants';
import type { ScannedFile } from '../taxonomy/contracts';
import defaultStopwords from './data/stopwords.json';
import { fileTypeFromExtension, type FileTypeHint } from './file-types';

export interface DateInfo {
  year: number | null;
  month: number | null;
  quarter: string | null;
}

export interface ExtractedKeywords {
  /** Source file id, or the filename itself for bare names. */
  id: string;
  original: string;
  /** Sorted, unique. */
  keywords: string[];
  stemmedKeywords: string[];
  dateInfo: DateInfo | null;
  fileType: FileTypeHint;
  sourcePath: string | null;
}

export interface KeywordExtractorConfig {
  minKeywordLength: number;
  applyStemming: boolean;
  removeStopwords: boolean;
  stopwords: ReadonlySet<string>;
}

export const KEYWORD_EXTRACTOR_PRESETS = {
  fast: {
    minKeywordLength: KEYWORD_MIN_LENGTH_FAST,
    applyStemming: false,
    removeStopwords: true,
    stopwords: new Set(defaultStopwords),
  },
  quality: {
    minKeywordLength: KEYWORD_MIN_LENGTH_QUALITY,
    applyStemming: true,
    removeStopwords: true,
    stopwords: new Set(defaultStopwords),
  },
} satisfies Record<string, KeywordExtractorConfig>;

const DELIMITERS = /[_\-. ()[\]{}]+/;
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

function isUppercase(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

/**
 * Split camelCase/PascalCase. Runs of capitals stay together as acronyms and a
 * letter followed by a digit starts a new word.
 */
export function splitCamelCase(text: string): string[] {
  const words: string[] = [];
  let current = '';

  for (const char of text) {
    const last = current.length > 0 ? current[current.length - 1] : '';
    if (isUppercase(char) && current.length > 0) {
      if (isUppercase(last)) {
        current += char;
      } else {
        words.push(current);
        current = char;
      }
    } else if (isDigit(char) && current.length > 0 && !isDigit(last)) {
      words.push(current);
      current = char;
    } else {
      current += char;
    }
  }

  if (current.length > 0) words.push(current);
  return words;
}

export function tokenize(text: string): string[] {
  return text
    .split(DELIMITERS)
    .flatMap((part) => splitCamelCase(part))
    .filter((token) => token.length > 0);
}

/**
 * Suffix stripping for the quality preset. Deliberately small.
 */
export function lightStem(word: string): string {
  if (word.length > 4 && word.endsWith('ies')) return word.slice(0, -3) + 'y';
  if (word.length > 5 && word.endsWith('ing')) return word.slice(0, -3);
  if (word.length > 4 && word.endsWith('ed')) return word.slice(0, -2);
  if (word.length > 4 && (word.endsWith('ches') || word.endsWith('shes') || word.endsWith('xes'))) {
    return word.slice(0, -2);
  }
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

export function extractDateInfo(text: string): DateInfo | null {
  const year = text.match(/(19|20)\d{2}/);
  if (year) {
    return { year: Number(year[0]), month: null, quarter: null };
  }

  const quarter = text.match(/[Qq][1-4]/);
  if (quarter) {
    return { year: null, month: null, quarter: quarter[0].toUpperCase() };
  }

  const lower = text.toLowerCase();
  const monthIndex = MONTHS.findIndex((month) => lower.includes(month));
  if (monthIndex >= 0) {
    return { year: null, month: monthIndex + 1, quarter: null };
  }
  return null;
}

export class KeywordExtractor {
  constructor(private readonly config: KeywordExtractorConfig = KEYWORD_EXTRACTOR_PRESETS.fast) {}

  extract(filename: string, id: string = filename, sourcePath: string | null = null): ExtractedKeywords {
    const parsed = path.parse(filename);
    const baseName = parsed.name;

    let tokens = tokenize(baseName)
      .map((token) => token.toLowerCase())
      .filter((token) => token.length >= this.config.minKeywordLength)
      .filter((token) => !/^\d+$/.test(token));
    if (this.config.removeStopwords) {
      tokens = tokens.filter((token) => !this.config.stopwords.has(token));
    }

    const keywords = [...new Set(tokens)].sort();
    const stemmedKeywords = this.config.applyStemming ? [...new Set(keywords.map(lightStem))].sort() : [];

    return {
      id,
      original: filename,
      keywords,
      stemmedKeywords,
      dateInfo: extractDateInfo(baseName),
      fileType: fileTypeFromExtension(parsed.ext),
      sourcePath,
    };
  }

  extractFile(file: ScannedFile): ExtractedKeywords {
    return this.extract(file.filename, file.id, file.path);
  }

  extractBatch(filenames: readonly string[]): ExtractedKeywords[] {
    return filenames.map((filename) => this.extract(filename));
  }

  extractFiles(files: readonly ScannedFile[]): ExtractedKeywords[] {
    return files.map((file) => this.extractFile(file));
  }
}
