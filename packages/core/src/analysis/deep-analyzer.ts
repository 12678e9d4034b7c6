/**
 * DeepAnalyzer - content-based categorization of a single file
 *
 * Inspector signal + existing categories -> one completeJSON() call ->
 * validated DeepAnalysisResult. Concurrency is bounded by a worker pool.
 */
import { z } from 'zod';
import { deepAnalyzerConfig, type DeepAnalyzerConfig } from '../config';
import { LLM_ANALYSIS_MAX_TOKENS, PATH_SEPARATOR } from '../config/constants';
import { DeepAnalysisError, DeepAnalysisErrorCode, errorMessage } from '../errors';
import type { ContentSignal, Inspector } from '../inspector/types';
import { hasMalformedEncoding, parseJsonResponse } from '../llm/json-response';
import type { LLMProvider } from '../llm/types';
import { abortable } from '../shared/async';
import { WorkerPool } from '../shared/worker-pool';
import type { FileRef } from '../taxonomy/contracts';
import { buildAnalysisPrompt } from './analysis-prompt';

const categoryPathSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (typeof value === 'string' ? value.split(/\s*\/\s*/) : value))
  .transform((segments) => segments.map((segment) => segment.trim()).filter((segment) => segment.length > 0))
  .refine((segments) => segments.length > 0, { message: 'categoryPath is empty' });

export const AnalysisResponseSchema = z.object({
  categoryPath: categoryPathSchema,
  confidence: z.coerce.number().min(0).max(1),
  rationale: z.string().nullish().transform((value) => value ?? ''),
  contentSummary: z.string().nullish().transform((value) => value ?? ''),
  suggestedTags: z.array(z.string()).nullish().transform((value) => value ?? []),
});

export type AnalysisResponse = z.infer<typeof AnalysisResponseSchema>;

export interface DeepAnalysisResult {
  fileId: string;
  categoryPath: string[];
  confidence: number;
  rationale: string;
  contentSummary: string;
  suggestedTags: string[];
  /** Null when inspection failed and only the filename was used. */
  signal: ContentSignal | null;
  analyzedAt: number;
}

export function resultPathString(result: Pick<DeepAnalysisResult, 'categoryPath'>): string {
  return result.categoryPath.join(PATH_SEPARATOR);
}

/**
 * The seam the task manager depends on.
 */
export interface FileAnalyzer {
  analyze(file: FileRef, existingCategories: readonly string[], signal?: AbortSignal): Promise<DeepAnalysisResult>;
}

export type BatchAnalysisOutcome =
  | { file: FileRef; success: true; result: DeepAnalysisResult }
  | { file: FileRef; success: false; error: string };

export function parseAnalysisResponse(fileId: string, response: string, signal: ContentSignal | null): DeepAnalysisResult {
  if (hasMalformedEncoding(response)) {
    throw new DeepAnalysisError(DeepAnalysisErrorCode.INVALID_ENCODING, 'Response contains malformed text encoding');
  }
  const parsed = parseJsonResponse(response, AnalysisResponseSchema);
  if (!parsed.success) {
    throw new DeepAnalysisError(DeepAnalysisErrorCode.INVALID_RESPONSE, parsed.error);
  }
  return {
    fileId,
    categoryPath: parsed.data.categoryPath,
    confidence: parsed.data.confidence,
    rationale: parsed.data.rationale,
    contentSummary: parsed.data.contentSummary,
    suggestedTags: parsed.data.suggestedTags,
    signal,
    analyzedAt: Date.now(),
  };
}

export class DeepAnalyzer implements FileAnalyzer {
  private readonly pool: WorkerPool;
  private readonly config: DeepAnalyzerConfig;

  constructor(
    private readonly llm: LLMProvider,
    private readonly inspector: Inspector | null,
    config?: DeepAnalyzerConfig,
  ) {
    this.config = config ?? deepAnalyzerConfig();
    this.pool = new WorkerPool(this.config.maxConcurrent, 'DeepAnalyzer');
  }

  get confidenceThreshold(): number {
    return this.config.confidenceThreshold;
  }

  analyze(file: FileRef, existingCategories: readonly string[], signal?: AbortSignal): Promise<DeepAnalysisResult> {
    const cancelled = (): Error => new DeepAnalysisError(DeepAnalysisErrorCode.CANCELLED, `Analysis of ${file.filename} cancelled`);
    return abortable(
      this.pool.execute(() => this.analyzeNow(file, existingCategories, signal)),
      signal,
      cancelled,
    );
  }

  private async analyzeNow(
    file: FileRef,
    existingCategories: readonly string[],
    signal: AbortSignal | undefined,
  ): Promise<DeepAnalysisResult> {
    if (signal?.aborted) {
      throw new DeepAnalysisError(DeepAnalysisErrorCode.CANCELLED, `Analysis of ${file.filename} cancelled`);
    }
    const startTime = Date.now();
    const contentSignal = await this.inspect(file, signal);

    const prompt = buildAnalysisPrompt({
      filename: file.filename,
      signal: contentSignal,
      existingCategories,
      textPreviewChars: this.config.textPreviewChars,
      maxCategoryContext: this.config.maxCategoryContext,
    });

    let response: string;
    try {
      response = await this.llm.completeJSON(prompt, {
        model: this.config.model,
        maxTokens: LLM_ANALYSIS_MAX_TOKENS,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new DeepAnalysisError(DeepAnalysisErrorCode.CANCELLED, `Analysis of ${file.filename} cancelled`);
      }
      throw new DeepAnalysisError(DeepAnalysisErrorCode.LLM_UNAVAILABLE, `LLM request failed: ${errorMessage(error)}`);
    }

    const result = parseAnalysisResponse(file.fileId, response, contentSignal);
    console.log(
      `[DeepAnalyzer] ${file.filename} -> ${resultPathString(result)} ` +
        `(${Math.round(result.confidence * 100)}%, ${Date.now() - startTime}ms)`,
    );
    return result;
  }

  private async inspect(file: FileRef, signal: AbortSignal | undefined): Promise<ContentSignal | null> {
    if (!this.inspector) return null;
    try {
      return await this.inspector.inspect(file, signal);
    } catch (error) {
      console.warn(`[DeepAnalyzer] Inspection failed for ${file.filename}, using filename only: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Analyze several files. One failure does not stop the batch.
   */
  async analyzeFiles(
    files: readonly FileRef[],
    existingCategories: readonly string[],
    onProgress?: (completed: number, total: number, outcome: BatchAnalysisOutcome) => void,
  ): Promise<BatchAnalysisOutcome[]> {
    let completed = 0;
    const outcomes = await Promise.all(
      files.map(async (file): Promise<BatchAnalysisOutcome> => {
        let outcome: BatchAnalysisOutcome;
        try {
          outcome = { file, success: true, result: await this.analyze(file, existingCategories) };
        } catch (error) {
          console.error(`[DeepAnalyzer] Failed ${file.filename}: ${errorMessage(error)}`);
          outcome = { file, success: false, error: errorMessage(error) };
        }
        completed++;
        onProgress?.(completed, files.length, outcome);
        return outcome;
      }),
    );
    const failures = outcomes.filter((outcome) => !outcome.success).length;
    console.log(`[DeepAnalyzer] Batch complete: ${outcomes.length - failures} succeeded, ${failures} failed`);
    return outcomes;
  }
}
