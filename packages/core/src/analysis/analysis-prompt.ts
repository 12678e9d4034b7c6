import { DEEP_ANALYSIS_MAX_TAGS } from '../config/constants';
import type { ContentSignal } from '../inspector/types';

export interface AnalysisPromptInput {
  filename: string;
  signal: ContentSignal | null;
  existingCategories: readonly string[];
  textPreviewChars: number;
  maxCategoryContext: number;
}

function formatDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  return `${minutes} minutes ${Math.floor(seconds % 60)} seconds`;
}

/**
 * Content-aware categorization prompt. Sections are omitted when the
 * inspector found nothing for them.
 */
export function buildAnalysisPrompt(input: AnalysisPromptInput): string {
  const { signal } = input;
  const sections: string[] = [
    `You are a file categorization expert. Analyze this file's CONTENT to determine its category.

FILE: ${input.filename}
TYPE: ${signal?.kind ?? 'unknown'}`,
  ];

  if (signal?.textCue) {
    sections.push(`EXTRACTED TEXT CONTENT:\n${signal.textCue.slice(0, input.textPreviewChars)}`);
  }
  if (signal && signal.sceneTags.length > 0) {
    sections.push(`VISUAL CONTENT TAGS: ${signal.sceneTags.slice(0, DEEP_ANALYSIS_MAX_TAGS).join(', ')}`);
  }
  if (signal && signal.detectedObjects.length > 0) {
    sections.push(`DETECTED OBJECTS: ${signal.detectedObjects.slice(0, DEEP_ANALYSIS_MAX_TAGS).join(', ')}`);
  }
  if (signal?.duration != null) {
    sections.push(`DURATION: ${formatDuration(signal.duration)}`);
  }
  if (input.existingCategories.length > 0) {
    sections.push(
      `EXISTING CATEGORIES (prefer these if content matches):\n` +
        input.existingCategories.slice(0, input.maxCategoryContext).join('\n'),
    );
  }
  if (!signal) {
    sections.push('No content could be extracted; judge from the filename alone and lower your confidence accordingly.');
  }

  sections.push(`Based on the actual CONTENT (not just filename), categorize this file.

Return JSON:
{
  "categoryPath": ["Main", "Sub1", "Sub2"],
  "confidence": 0.95,
  "rationale": "Why this category based on content",
  "contentSummary": "Brief summary of what the file contains",
  "suggestedTags": ["tag1", "tag2"]
}`);

  return sections.join('\n\n');
}
