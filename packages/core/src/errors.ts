/**
 * Error types shared across the taxonomy pipeline.
 *
 * Each family carries a string code so callers can branch without
 * matching on message text.
 */

export const TaxonomyErrorCode = {
  NO_FILES_PROVIDED: 'NO_FILES_PROVIDED',
  CATEGORY_NOT_FOUND: 'CATEGORY_NOT_FOUND',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  INVALID_MOVE: 'INVALID_MOVE',
  USER_EDITED: 'USER_EDITED',
} as const;

export type TaxonomyErrorCode = (typeof TaxonomyErrorCode)[keyof typeof TaxonomyErrorCode];

export class TaxonomyError extends Error {
  constructor(
    public code: TaxonomyErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TaxonomyError';
  }
}

export function noFilesProvidedError(): TaxonomyError {
  return new TaxonomyError(TaxonomyErrorCode.NO_FILES_PROVIDED, 'No files provided for taxonomy inference');
}

export function categoryNotFoundError(path: string): TaxonomyError {
  return new TaxonomyError(TaxonomyErrorCode.CATEGORY_NOT_FOUND, `Category not found: ${path}`);
}

export function fileNotFoundError(fileId: string): TaxonomyError {
  return new TaxonomyError(TaxonomyErrorCode.FILE_NOT_FOUND, `File not found in taxonomy: ${fileId}`);
}

// ============================================================================
// Gatekeeper
// ============================================================================

export const GatekeeperErrorCode = {
  SUGGESTION_NOT_FOUND: 'SUGGESTION_NOT_FOUND',
  SUGGESTION_ALREADY_PROCESSED: 'SUGGESTION_ALREADY_PROCESSED',
  GUARDRAIL_VETO: 'GUARDRAIL_VETO',
} as const;

export type GatekeeperErrorCode = (typeof GatekeeperErrorCode)[keyof typeof GatekeeperErrorCode];

export class GatekeeperError extends Error {
  constructor(
    public code: GatekeeperErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'GatekeeperError';
  }
}

export function suggestionNotFoundError(id: string): GatekeeperError {
  return new GatekeeperError(GatekeeperErrorCode.SUGGESTION_NOT_FOUND, `Suggestion not found: ${id}`);
}

export function suggestionAlreadyProcessedError(id: string): GatekeeperError {
  return new GatekeeperError(
    GatekeeperErrorCode.SUGGESTION_ALREADY_PROCESSED,
    `Suggestion already processed: ${id}`,
  );
}

// ============================================================================
// Task manager
// ============================================================================

export const TaskManagerErrorCode = {
  TIMEOUT: 'TIMEOUT',
  QUEUE_FULL: 'QUEUE_FULL',
  TASK_NOT_FOUND: 'TASK_NOT_FOUND',
  INVALID_STATE: 'INVALID_STATE',
  RETRY_LIMIT_EXCEEDED: 'RETRY_LIMIT_EXCEEDED',
  CANCELLED: 'CANCELLED',
} as const;

export type TaskManagerErrorCode = (typeof TaskManagerErrorCode)[keyof typeof TaskManagerErrorCode];

export class TaskManagerError extends Error {
  constructor(
    public code: TaskManagerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TaskManagerError';
  }
}

export function taskTimeoutError(timeoutMs: number): TaskManagerError {
  return new TaskManagerError(TaskManagerErrorCode.TIMEOUT, `Task timed out after ${timeoutMs}ms`);
}

export function queueFullError(limit: number): TaskManagerError {
  return new TaskManagerError(TaskManagerErrorCode.QUEUE_FULL, `Task queue is full (limit ${limit})`);
}

export function taskNotFoundError(taskId: string): TaskManagerError {
  return new TaskManagerError(TaskManagerErrorCode.TASK_NOT_FOUND, `Task not found: ${taskId}`);
}

// ============================================================================
// Deep analysis
// ============================================================================

export const DeepAnalysisErrorCode = {
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  INVALID_ENCODING: 'INVALID_ENCODING',
  TIMEOUT: 'TIMEOUT',
  LLM_UNAVAILABLE: 'LLM_UNAVAILABLE',
  CANCELLED: 'CANCELLED',
} as const;

export type DeepAnalysisErrorCode = (typeof DeepAnalysisErrorCode)[keyof typeof DeepAnalysisErrorCode];

export class DeepAnalysisError extends Error {
  constructor(
    public code: DeepAnalysisErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'DeepAnalysisError';
  }
}

// ============================================================================
// Depth / inspection
// ============================================================================

export class DepthConstraintError extends Error {
  constructor(
    message: string,
    public violations: string[],
  ) {
    super(message);
    this.name = 'DepthConstraintError';
  }
}

export class InspectionError extends Error {
  constructor(
    message: string,
    public filePath: string,
  ) {
    super(message);
    this.name = 'InspectionError';
  }
}

/**
 * Best-effort message extraction for logging and task ledgers.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
