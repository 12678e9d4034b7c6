/**
 * SemanticThemeClusterer - keyword sets -> theme clusters
 *
 * Known semantic groups are scored first, then leftover high-frequency
 * keywords become themes of their own. Files join the theme with the best
 * keyword overlap; leftovers are regrouped by their dominant keyword or end
 * up in "Uncategorized". Large themes split into sub-themes, and every
 * (sub)theme can fan out by file type.
 *
 * Every map iteration is sorted first so the same input always yields the
 * same clusters.
 */
import {
  CLUSTER_MAX_LEFTOVER_THEMES,
  CLUSTER_MIN_ASSIGNMENT_SCORE,
  CLUSTER_SMALL_THEME_MERGE_SIMILARITY,
  OTHER_SUBTHEME_NAME,
  UNCATEGORIZED_NAME,
} from '../config/constants';
import { clustererConfig, type ClustererConfig } from '../config';
import semanticGroupTable from './data/semantic-groups.json';
import { FILE_TYPE_HINTS, fileTypeDisplayName, type FileTypeHint } from './file-types';
import type { ExtractedKeywords } from './keyword-extractor';

export interface FileTypeGroup {
  fileType: FileTypeHint;
  displayName: string;
  files: ExtractedKeywords[];
}

export interface ThemeCluster {
  name: string;
  /** Sorted. */
  keywords: string[];
  files: ExtractedKeywords[];
  subThemes: ThemeCluster[];
  fileTypeGroups: FileTypeGroup[];
  score: number;
  isUncategorized: boolean;
}

interface CandidateTheme {
  name: string;
  keywords: Set<string>;
  files: ExtractedKeywords[];
  score: number;
}

const SEMANTIC_GROUPS: ReadonlyArray<[string, readonly string[]]> = Object.entries(semanticGroupTable).sort(
  ([a], [b]) => a.localeCompare(b),
);

export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Character-level Jaccard similarity between two words.
 */
export function characterJaccard(a: string, b: string): number {
  return setJaccard(new Set(a), new Set(b));
}

export function setJaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Keyword frequency: number of files containing each keyword.
 */
export function buildKeywordFrequency(files: readonly ExtractedKeywords[]): Map<string, number> {
  const frequency = new Map<string, number>();
  for (const file of files) {
    for (const keyword of file.keywords) {
      frequency.set(keyword, (frequency.get(keyword) ?? 0) + 1);
    }
  }
  return frequency;
}

/**
 * Pick the keyword that best characterizes a file: most frequent in the
 * population, then longest, then alphabetical.
 */
export function dominantKeyword(keywords: Iterable<string>, frequency: ReadonlyMap<string, number>): string | null {
  let best: string | null = null;
  for (const keyword of keywords) {
    if (best === null) {
      best = keyword;
      continue;
    }
    const diff = (frequency.get(keyword) ?? 0) - (frequency.get(best) ?? 0);
    if (diff > 0) {
      best = keyword;
    } else if (diff === 0) {
      if (keyword.length > best.length || (keyword.length === best.length && keyword < best)) {
        best = keyword;
      }
    }
  }
  return best;
}

function sortedEntries(map: ReadonlyMap<string, number>): Array<[string, number]> {
  return [...map.entries()].sort(([a], [b]) => a.localeCompare(b));
}

export class SemanticThemeClusterer {
  private readonly config: ClustererConfig;

  constructor(config: ClustererConfig = clustererConfig()) {
    this.config = config;
  }

  get configuration(): ClustererConfig {
    return this.config;
  }

  cluster(files: readonly ExtractedKeywords[]): ThemeCluster[] {
    if (files.length === 0) return [];

    const frequency = buildKeywordFrequency(files);
    const candidates = this.identifyThemes(frequency);
    const unassigned = this.assignFiles(files, candidates);
    const { themes: regrouped, remaining } = this.regroupUnassigned(unassigned, frequency);
    const merged = this.mergeSmallThemes([...candidates, ...regrouped].filter((theme) => theme.files.length > 0));

    const subThemeLevels = Math.max(0, this.config.maxDepth - 1 - (this.config.separateFileTypes ? 1 : 0));
    const themes = merged.map((theme) => this.finalize(theme, subThemeLevels, false));

    themes.sort((a, b) => b.files.length - a.files.length || a.name.localeCompare(b.name));

    if (remaining.length > 0) {
      themes.push(
        this.finalize(
          { name: UNCATEGORIZED_NAME, keywords: new Set(), files: remaining, score: 0 },
          0,
          true,
        ),
      );
    }

    console.log(
      `[SemanticThemeClusterer] Clustered ${files.length} files into ${themes.length} themes ` +
        `(${remaining.length} uncategorized)`,
    );
    return themes;
  }

  // ============================================================================
  // Steps
  // ============================================================================

  private identifyThemes(frequency: ReadonlyMap<string, number>): CandidateTheme[] {
    const candidates: CandidateTheme[] = [];

    for (const [groupName, groupKeywords] of SEMANTIC_GROUPS) {
      const matching = groupKeywords.filter((keyword) => frequency.has(keyword));
      const total = matching.reduce((sum, keyword) => sum + (frequency.get(keyword) ?? 0), 0);
      if (total >= this.config.minFilesPerTheme) {
        candidates.push({ name: capitalize(groupName), keywords: new Set(matching), files: [], score: total });
      }
    }

    const used = new Set(candidates.flatMap((candidate) => [...candidate.keywords]));
    const leftovers = sortedEntries(frequency)
      .filter(([keyword, count]) => !used.has(keyword) && count >= this.config.minFilesPerTheme)
      .sort((a, b) => b[1] - a[1])
      .slice(0, CLUSTER_MAX_LEFTOVER_THEMES);

    for (const [keyword, count] of leftovers) {
      const related = new Set([keyword]);
      for (const [other] of sortedEntries(frequency)) {
        if (other !== keyword && !used.has(other) && characterJaccard(keyword, other) >= this.config.themeSimilarityThreshold) {
          related.add(other);
        }
      }
      candidates.push({ name: capitalize(keyword), keywords: related, files: [], score: count });
    }

    // Stable sort keeps semantic groups ahead of equally scored keyword themes
    return candidates.sort((a, b) => b.score - a.score).slice(0, this.config.targetThemeCount);
  }

  /**
   * Attach each file to its best-matching theme. Returns the files left over.
   */
  private assignFiles(files: readonly ExtractedKeywords[], themes: CandidateTheme[]): ExtractedKeywords[] {
    const unassigned: ExtractedKeywords[] = [];
    for (const file of files) {
      const fileKeywords = new Set(file.keywords);
      let best: CandidateTheme | null = null;
      let bestScore = 0;
      for (const theme of themes) {
        const score = setJaccard(fileKeywords, theme.keywords);
        if (score > bestScore && score > CLUSTER_MIN_ASSIGNMENT_SCORE) {
          best = theme;
          bestScore = score;
        }
      }
      if (best) {
        best.files.push(file);
      } else {
        unassigned.push(file);
      }
    }
    return unassigned;
  }

  private regroupUnassigned(
    unassigned: readonly ExtractedKeywords[],
    frequency: ReadonlyMap<string, number>,
  ): { themes: CandidateTheme[]; remaining: ExtractedKeywords[] } {
    const groups = new Map<string, ExtractedKeywords[]>();
    const remaining: ExtractedKeywords[] = [];

    for (const file of unassigned) {
      const keyword = dominantKeyword(file.keywords, frequency);
      if (keyword === null) {
        remaining.push(file);
        continue;
      }
      const group = groups.get(keyword) ?? [];
      group.push(file);
      groups.set(keyword, group);
    }

    const themes: CandidateTheme[] = [];
    for (const keyword of [...groups.keys()].sort()) {
      const groupFiles = groups.get(keyword) ?? [];
      if (groupFiles.length >= this.config.minFilesPerTheme) {
        themes.push({ name: capitalize(keyword), keywords: new Set([keyword]), files: groupFiles, score: groupFiles.length });
      } else {
        remaining.push(...groupFiles);
      }
    }
    return { themes, remaining };
  }

  private mergeSmallThemes(themes: readonly CandidateTheme[]): CandidateTheme[] {
    const result = themes.filter((theme) => theme.files.length >= this.config.minFilesPerTheme);
    const small = themes.filter((theme) => theme.files.length < this.config.minFilesPerTheme);

    for (const theme of small) {
      const target = result.find(
        (candidate) => setJaccard(theme.keywords, candidate.keywords) > CLUSTER_SMALL_THEME_MERGE_SIMILARITY,
      );
      if (target) {
        target.files.push(...theme.files);
        for (const keyword of theme.keywords) target.keywords.add(keyword);
      } else {
        result.push(theme);
      }
    }
    return result;
  }

  private finalize(theme: CandidateTheme, subThemeLevels: number, isUncategorized: boolean): ThemeCluster {
    const subThemes = subThemeLevels > 0 ? this.buildSubThemes(theme, subThemeLevels) : [];
    return {
      name: theme.name,
      keywords: [...theme.keywords].sort(),
      files: theme.files,
      subThemes,
      fileTypeGroups: this.config.separateFileTypes ? groupByFileType(theme.files) : [],
      score: theme.score,
      isUncategorized,
    };
  }

  /**
   * Split a theme by the dominant keyword its files do not share with the
   * parent. Kept only when more than one sub-theme results.
   */
  private buildSubThemes(theme: CandidateTheme, levels: number): ThemeCluster[] {
    if (theme.files.length < this.config.minFilesPerSubTheme * 2) return [];

    const localFrequency = buildKeywordFrequency(theme.files);
    const groups = new Map<string, ExtractedKeywords[]>();
    for (const file of theme.files) {
      const distinctive = file.keywords.filter((keyword) => !theme.keywords.has(keyword));
      const keyword = dominantKeyword(distinctive, localFrequency);
      if (keyword === null) continue;
      const group = groups.get(keyword) ?? [];
      group.push(file);
      groups.set(keyword, group);
    }

    const ordered = [...groups.entries()].sort(
      ([keywordA, filesA], [keywordB, filesB]) => filesB.length - filesA.length || keywordA.localeCompare(keywordB),
    );

    const subThemes: ThemeCluster[] = [];
    const placed = new Set<ExtractedKeywords>();
    for (const [keyword, groupFiles] of ordered) {
      if (groupFiles.length < this.config.minFilesPerSubTheme) continue;
      const candidate: CandidateTheme = {
        name: capitalize(keyword),
        keywords: new Set([...theme.keywords, keyword]),
        files: groupFiles,
        score: groupFiles.length,
      };
      const sub = this.finalize(candidate, levels - 1, false);
      sub.keywords = [keyword];
      subThemes.push(sub);
      for (const file of groupFiles) placed.add(file);
    }

    const rest = theme.files.filter((file) => !placed.has(file));
    if (rest.length > 0 && subThemes.length > 0) {
      subThemes.push(
        this.finalize({ name: OTHER_SUBTHEME_NAME, keywords: new Set(), files: rest, score: rest.length }, 0, false),
      );
    }

    return subThemes.length > 1 ? subThemes : [];
  }
}

export function groupByFileType(files: readonly ExtractedKeywords[]): FileTypeGroup[] {
  return FILE_TYPE_HINTS.map((fileType) => ({
    fileType,
    displayName: fileTypeDisplayName(fileType),
    files: files.filter((file) => file.fileType === fileType),
  })).filter((group) => group.files.length > 0);
}
