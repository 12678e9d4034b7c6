/**
 * Prompt templates for the refinement pass.
 */

export interface MergeCandidateSummary {
  name: string;
  fileCount: number;
  sampleFilenames: string[];
}

export function buildRenamePrompt(currentName: string, filenames: readonly string[]): string {
  return `Suggest a SHORT, descriptive folder name (2-4 words max) for files like these:
${filenames.join('\n')}

Current name: ${currentName}

Return ONLY the suggested name, nothing else. Be concise.`;
}

export function buildMergePrompt(candidates: readonly MergeCandidateSummary[], maxSuggestions: number): string {
  const categoryList = candidates
    .map((candidate) => `- ${candidate.name} (${candidate.fileCount} files): ${candidate.sampleFilenames.join(', ')}`)
    .join('\n');

  return `Analyze these small categories and suggest which should be merged together.
Categories:
${categoryList}

Rules:
1. Only merge categories that are semantically related
2. Suggest a good name for the merged category
3. Return ONLY in this exact format, one per line:
   SOURCE1 + SOURCE2 -> MERGED_NAME
4. Maximum ${maxSuggestions} suggestions
5. If categories shouldn't be merged, return "NO_MERGES"

Examples:
Card Tricks + Card Magic -> Card Magic
Cooking + Recipes -> Cooking & Recipes`;
}

export function buildSubstructurePrompt(filenames: readonly string[]): string {
  return `Group these files into 2-4 logical subcategories:
${filenames.join('\n')}

Return ONLY in this JSON format:
{
  "subcategories": [
    {"name": "SubcategoryName", "files": ["file1.pdf", "file2.mp4"]}
  ]
}`;
}
