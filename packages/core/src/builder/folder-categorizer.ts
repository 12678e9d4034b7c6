/**
 * FolderCategorizer - places a top-level folder as one unit
 *
 * The folder keeps its internal structure: every file inside lands below
 * `<category path> / <folder name>`. quickCategorizeFolder is the rule-based
 * path used without an LLM; categorize() asks the LLM with the folder name,
 * a file listing and the categories that already exist.
 */
import * as path from 'path';
import { z } from 'zod';
import {
  FOLDER_FALLBACK_CONFIDENCE,
  FOLDER_MAX_CATEGORY_CONTEXT,
  FOLDER_MAX_FILES_IN_PROMPT,
  LLM_FOLDER_MAX_TOKENS,
  LLM_REFINEMENT_TEMPERATURE,
  UNCATEGORIZED_NAME,
} from '../config/constants';
import { errorMessage } from '../errors';
import { fileTypeFromExtension, type FileTypeHint } from '../clustering/file-types';
import { hasMalformedEncoding, parseJsonResponse } from '../llm/json-response';
import type { LLMProvider } from '../llm/types';
import type { ScannedFolder } from '../scanner/file-scanner';
import { fileRefFromScanned } from '../taxonomy/contracts';
import type { TaxonomyTree } from '../taxonomy/taxonomy-tree';

export interface FolderCategoryAssignment {
  folderName: string;
  folderPath: string;
  categoryPath: string[];
  confidence: number;
  rationale: string;
  alternativePaths: string[][];
}

interface NameRule {
  patterns: string[];
  categoryPath: string[];
  confidence: number;
  rationale: string;
}

const NAME_RULES: NameRule[] = [
  { patterns: ['resume', 'cv'], categoryPath: ['Work', 'Job Search', 'Application Materials'], confidence: 0.85, rationale: 'Folder name suggests job application materials' },
  { patterns: ['photo', 'picture', 'image'], categoryPath: ['Media', 'Photos'], confidence: 0.8, rationale: 'Folder name suggests a photo collection' },
  { patterns: ['video', 'movie', 'film'], categoryPath: ['Media', 'Videos'], confidence: 0.8, rationale: 'Folder name suggests a video collection' },
  { patterns: ['music', 'song', 'audio'], categoryPath: ['Media', 'Music'], confidence: 0.8, rationale: 'Folder name suggests a music collection' },
  { patterns: ['project', 'work'], categoryPath: ['Work', 'Projects'], confidence: 0.7, rationale: 'Folder name suggests a work project' },
  { patterns: ['document', 'doc'], categoryPath: ['Documents'], confidence: 0.7, rationale: 'Folder name suggests documents' },
  { patterns: ['backup', 'archive'], categoryPath: ['Archives'], confidence: 0.75, rationale: 'Folder name suggests a backup or archive' },
  { patterns: ['download'], categoryPath: ['Downloads'], confidence: 0.7, rationale: 'Folder name suggests downloads' },
];

type DominantType = Extract<FileTypeHint, 'image' | 'video' | 'audio' | 'document'> | 'other';

// Tie order for the dominant-type fallback
const DOMINANT_ORDER: DominantType[] = ['image', 'video', 'audio', 'document', 'other'];

const TYPE_RULES: Record<Exclude<DominantType, 'other'>, { categoryPath: string[]; rationale: string }> = {
  image: { categoryPath: ['Media', 'Photos'], rationale: 'Folder primarily contains images' },
  video: { categoryPath: ['Media', 'Videos'], rationale: 'Folder primarily contains videos' },
  audio: { categoryPath: ['Media', 'Music'], rationale: 'Folder primarily contains audio files' },
  document: { categoryPath: ['Documents'], rationale: 'Folder primarily contains documents' },
};

function dominantType(folder: ScannedFolder): DominantType {
  const counts = new Map<DominantType, number>();
  for (const file of folder.files) {
    const hint = fileTypeFromExtension(file.extension);
    const type: DominantType = hint === 'image' || hint === 'video' || hint === 'audio' || hint === 'document' ? hint : 'other';
    counts.set(type, (counts.get(type) ?? 0) + 1);
  }
  let best: DominantType = 'other';
  let bestCount = 0;
  for (const type of DOMINANT_ORDER) {
    const count = counts.get(type) ?? 0;
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Rule-based placement from the folder name, then from its dominant file type.
 */
export function quickCategorizeFolder(folder: ScannedFolder): FolderCategoryAssignment {
  const base = { folderName: folder.name, folderPath: folder.path, alternativePaths: [] };
  const lower = folder.name.toLowerCase();
  const rule = NAME_RULES.find((candidate) => candidate.patterns.some((pattern) => lower.includes(pattern)));
  if (rule) {
    return { ...base, categoryPath: [...rule.categoryPath], confidence: rule.confidence, rationale: rule.rationale };
  }

  const dominant = dominantType(folder);
  if (dominant === 'other') {
    return {
      ...base,
      categoryPath: [UNCATEGORIZED_NAME],
      confidence: 0.4,
      rationale: 'Could not determine category from folder name or contents',
    };
  }
  const typeRule = TYPE_RULES[dominant];
  return { ...base, categoryPath: [...typeRule.categoryPath], confidence: 0.65, rationale: typeRule.rationale };
}

// ============================================================================
// LLM path
// ============================================================================

const FolderResponseSchema = z.object({
  categoryPath: z
    .union([z.array(z.string()), z.string()])
    .transform((value) => (typeof value === 'string' ? value.split(/\s*\/\s*/) : value))
    .transform((segments) => segments.map((segment) => segment.trim()).filter((segment) => segment.length > 0))
    .refine((segments) => segments.length > 0, { message: 'categoryPath is empty' }),
  confidence: z.coerce.number().min(0).max(1),
  rationale: z.string().nullish().transform((value) => value ?? ''),
  alternatives: z.array(z.array(z.string())).nullish().transform((value) => value ?? []),
});

export function buildFolderPrompt(folder: ScannedFolder, existingCategories: readonly string[]): string {
  const listed = folder.files.slice(0, FOLDER_MAX_FILES_IN_PROMPT);
  const fileList = listed.map((file, index) => `${index + 1}. ${file.filename}`).join('\n');
  const more = folder.files.length > listed.length ? `\n... and ${folder.files.length - listed.length} more files` : '';

  const typeCounts = new Map<string, number>();
  for (const file of folder.files) {
    const hint = fileTypeFromExtension(file.extension);
    typeCounts.set(hint, (typeCounts.get(hint) ?? 0) + 1);
  }
  const typeSummary = [...typeCounts.entries()].map(([hint, count]) => `${count} ${hint}(s)`).join(', ');

  const categoryList =
    existingCategories.length === 0
      ? 'No existing categories - suggest new ones'
      : existingCategories.slice(0, FOLDER_MAX_CATEGORY_CONTEXT).join('\n');

  return `You are a file organization expert. Analyze this FOLDER and determine what category it belongs to.

The folder will be MOVED AS A UNIT - all files inside stay together in their current structure.

FOLDER NAME: ${folder.name}
FILE COUNT: ${folder.files.length} files${typeSummary ? `\nFILE TYPES: ${typeSummary}` : ''}

CONTAINED FILES:
${fileList}${more}

EXISTING CATEGORIES (prefer these if they fit):
${categoryList}

RULES:
1. Analyze the folder NAME and its CONTENTS together
2. Choose the category that fits the dominant theme
3. Confidence reflects how well the folder fits the category

Return ONLY valid JSON:
{
  "categoryPath": ["Top Level", "Sub Category"],
  "confidence": 0.85,
  "rationale": "Brief explanation",
  "alternatives": [["Alternative", "Path"]]
}`;
}

export class FolderCategorizer {
  constructor(
    private readonly llm: LLMProvider,
    private readonly model?: string,
  ) {}

  async categorize(
    folder: ScannedFolder,
    existingCategories: readonly string[],
    signal?: AbortSignal,
  ): Promise<FolderCategoryAssignment> {
    const response = await this.llm.completeJSON(buildFolderPrompt(folder, existingCategories), {
      model: this.model,
      temperature: LLM_REFINEMENT_TEMPERATURE,
      maxTokens: LLM_FOLDER_MAX_TOKENS,
      signal,
    });
    if (hasMalformedEncoding(response)) {
      throw new Error('Folder response contains malformed text encoding');
    }
    const parsed = parseJsonResponse(response, FolderResponseSchema);
    if (!parsed.success) {
      throw new Error(`Invalid folder categorization response: ${parsed.error}`);
    }
    return {
      folderName: folder.name,
      folderPath: folder.path,
      categoryPath: parsed.data.categoryPath,
      confidence: parsed.data.confidence,
      rationale: parsed.data.rationale,
      alternativePaths: parsed.data.alternatives,
    };
  }

  /**
   * One folder at a time. A failed folder gets a low-confidence Uncategorized
   * placement instead of failing the batch.
   */
  async categorizeBatch(
    folders: readonly ScannedFolder[],
    existingCategories: readonly string[],
    signal?: AbortSignal,
  ): Promise<FolderCategoryAssignment[]> {
    const assignments: FolderCategoryAssignment[] = [];
    for (const folder of folders) {
      try {
        assignments.push(await this.categorize(folder, existingCategories, signal));
      } catch (error) {
        console.error(`[FolderCategorizer] Failed to categorize '${folder.name}': ${errorMessage(error)}`);
        assignments.push({
          folderName: folder.name,
          folderPath: folder.path,
          categoryPath: [UNCATEGORIZED_NAME],
          confidence: FOLDER_FALLBACK_CONFIDENCE,
          rationale: `Categorization failed: ${errorMessage(error)}`,
          alternativePaths: [],
        });
      }
    }
    console.log(`[FolderCategorizer] Categorized ${assignments.length} folders`);
    return assignments;
  }
}

/**
 * Put every file of the folder below `<categoryPath> / <folder name>`,
 * recreating the folder's own sub-directories.
 */
export function placeFolder(
  tree: TaxonomyTree,
  folder: ScannedFolder,
  assignment: FolderCategoryAssignment,
  deepAnalysisThreshold: number,
): number {
  const base = [...assignment.categoryPath, folder.name];
  for (const file of folder.files) {
    const relative = path.relative(folder.path, file.path);
    const inner = relative.split(path.sep).slice(0, -1);
    tree.assignFile(fileRefFromScanned(file), [...base, ...inner], assignment.confidence, {
      source: 'filename',
      needsDeepAnalysis: assignment.confidence < deepAnalysisThreshold,
    });
  }
  return folder.files.length;
}
