import { z } from 'zod';
import * as C from './constants';

export * from './constants';

// ============================================================================
// Clustering
// ============================================================================

export const ClustererConfigSchema = z.object({
  targetThemeCount: z.number().int().min(1).default(C.CLUSTER_TARGET_THEME_COUNT),
  separateFileTypes: z.boolean().default(true),
  minFilesPerTheme: z.number().int().min(1).default(C.CLUSTER_MIN_FILES_PER_THEME),
  themeSimilarityThreshold: z.number().min(0).max(1).default(C.CLUSTER_THEME_SIMILARITY_THRESHOLD),
  minFilesPerSubTheme: z.number().int().min(1).default(C.CLUSTER_MIN_FILES_PER_SUBTHEME),
  maxDepth: z.number().int().min(1).default(C.CLUSTER_MAX_DEPTH),
});

export type ClustererConfig = z.infer<typeof ClustererConfigSchema>;

export function clustererConfig(overrides: z.input<typeof ClustererConfigSchema> = {}): ClustererConfig {
  return ClustererConfigSchema.parse(overrides);
}

/**
 * Same configuration with the theme count clamped to the supported range.
 */
export function withTargetCount(config: ClustererConfig, count: number): ClustererConfig {
  const clamped = Math.max(C.CLUSTER_MIN_TARGET_THEMES, Math.min(count, C.CLUSTER_MAX_TARGET_THEMES));
  return { ...config, targetThemeCount: clamped };
}

// ============================================================================
// Builder
// ============================================================================

export const BuilderConfigSchema = z.object({
  rootName: z.string().min(1).default(C.DEFAULT_ROOT_NAME),
  refinementModel: z.string().optional(),
  refinementDelayMs: z.number().int().min(0).default(C.REFINEMENT_DELAY_MS),
  applySuggestedNames: z.boolean().default(false),
  enableMerges: z.boolean().default(true),
  deepAnalysisThreshold: z.number().min(0).max(1).default(C.DEEP_ANALYSIS_CONFIDENCE_THRESHOLD),
});

export type BuilderConfig = z.infer<typeof BuilderConfigSchema>;

export function builderConfig(overrides: z.input<typeof BuilderConfigSchema> = {}): BuilderConfig {
  return BuilderConfigSchema.parse(overrides);
}

// ============================================================================
// Deep analysis
// ============================================================================

export const DeepAnalyzerConfigSchema = z.object({
  confidenceThreshold: z.number().min(0).max(1).default(C.DEEP_ANALYSIS_CONFIDENCE_THRESHOLD),
  maxConcurrent: z.number().int().min(1).default(C.DEEP_ANALYSIS_MAX_CONCURRENT),
  timeoutPerFileMs: z.number().int().positive().default(C.DEEP_ANALYSIS_TIMEOUT_MS),
  textPreviewChars: z.number().int().positive().default(C.DEEP_ANALYSIS_TEXT_PREVIEW_CHARS),
  maxCategoryContext: z.number().int().min(0).default(C.DEEP_ANALYSIS_MAX_CATEGORY_CONTEXT),
  model: z.string().optional(),
});

export type DeepAnalyzerConfig = z.infer<typeof DeepAnalyzerConfigSchema>;

export function deepAnalyzerConfig(overrides: z.input<typeof DeepAnalyzerConfigSchema> = {}): DeepAnalyzerConfig {
  return DeepAnalyzerConfigSchema.parse(overrides);
}

// ============================================================================
// Task manager
// ============================================================================

export const TaskManagerConfigSchema = z.object({
  maxConcurrentTasks: z.number().int().min(1).default(C.TASK_MAX_CONCURRENT),
  taskStartDelayMs: z.number().int().min(0).default(C.TASK_START_DELAY_MS),
  autoRecategorize: z.boolean().default(true),
  minConfidenceImprovement: z.number().min(0).max(1).default(C.TASK_MIN_CONFIDENCE_IMPROVEMENT),
  respectUserApprovals: z.boolean().default(true),
  maxRetries: z.number().int().min(0).default(C.TASK_MAX_RETRIES),
  taskTimeoutMs: z.number().int().positive().default(C.TASK_TIMEOUT_MS),
  persistQueue: z.boolean().default(false),
  maxQueueSize: z.number().int().positive().default(C.TASK_MAX_QUEUE_SIZE),
  idlePollMs: z.number().int().positive().default(C.TASK_IDLE_POLL_MS),
});

export type TaskManagerConfig = z.infer<typeof TaskManagerConfigSchema>;

export function taskManagerConfig(overrides: z.input<typeof TaskManagerConfigSchema> = {}): TaskManagerConfig {
  return TaskManagerConfigSchema.parse(overrides);
}

export const TASK_MANAGER_PRESETS = {
  default: taskManagerConfig(),
  aggressive: taskManagerConfig({
    maxConcurrentTasks: 4,
    taskStartDelayMs: 50,
    minConfidenceImprovement: 0.1,
    maxRetries: 1,
    taskTimeoutMs: 60000,
  }),
  conservative: taskManagerConfig({
    maxConcurrentTasks: 1,
    taskStartDelayMs: 500,
    autoRecategorize: false,
    minConfidenceImprovement: 0.2,
    maxRetries: 3,
    taskTimeoutMs: 180000,
    persistQueue: true,
  }),
} satisfies Record<string, TaskManagerConfig>;

export type TaskManagerPreset = keyof typeof TASK_MANAGER_PRESETS;

// ============================================================================
// Depth
// ============================================================================

export const DepthEnforcementModeSchema = z.enum(['strict', 'advisory', 'flatten']);
export type DepthEnforcementMode = z.infer<typeof DepthEnforcementModeSchema>;

export const DepthConfigSchema = z
  .object({
    minDepth: z.number().int().min(0).default(C.DEPTH_MIN),
    maxDepth: z.number().int().min(1).default(C.DEPTH_MAX),
    mode: DepthEnforcementModeSchema.default('advisory'),
    showDepthWarnings: z.boolean().default(true),
  })
  .refine((value) => value.minDepth <= value.maxDepth, { message: 'minDepth must not exceed maxDepth' });

export type DepthConfig = z.infer<typeof DepthConfigSchema>;

export function depthConfig(overrides: z.input<typeof DepthConfigSchema> = {}): DepthConfig {
  return DepthConfigSchema.parse(overrides);
}

export const DEPTH_PRESETS = {
  default: depthConfig(),
  strict: depthConfig({ minDepth: C.DEPTH_STRICT_MIN, maxDepth: C.DEPTH_STRICT_MAX, mode: 'strict' }),
} satisfies Record<string, DepthConfig>;

// ============================================================================
// Scanner
// ============================================================================

export const ScannerConfigSchema = z.object({
  maxFiles: z.number().int().positive().default(C.SCANNER_MAX_FILES),
  minFileSize: z.number().int().min(0).default(C.SCANNER_MIN_FILE_SIZE),
  includeHidden: z.boolean().default(false),
  excludedFolders: z
    .array(z.string())
    .default(['node_modules', '.git', '.svn', '.hg', '__pycache__', '.cache', 'build', 'dist']),
});

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;

export function scannerConfig(overrides: z.input<typeof ScannerConfigSchema> = {}): ScannerConfig {
  return ScannerConfigSchema.parse(overrides);
}

// ============================================================================
// Engine (environment)
// ============================================================================

export interface EngineConfig {
  clusterer: ClustererConfig;
  builder: BuilderConfig;
  analyzer: DeepAnalyzerConfig;
  taskManager: TaskManagerConfig;
  depth: DepthConfig;
  scanner: ScannerConfig;
  databasePath: string | null;
}

const numberFromEnv = z.coerce.number();

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const parsed = numberFromEnv.safeParse(raw);
  if (!parsed.success || Number.isNaN(parsed.data)) {
    console.warn(`[Config] Ignoring non-numeric ${key}="${raw}"`);
    return undefined;
  }
  return parsed.data;
}

function readPreset(env: NodeJS.ProcessEnv): TaskManagerConfig {
  const raw = env.TAXONOMY_TASK_PRESET?.trim();
  if (raw === 'aggressive' || raw === 'conservative' || raw === 'default') {
    return TASK_MANAGER_PRESETS[raw];
  }
  if (raw) {
    console.warn(`[Config] Unknown TAXONOMY_TASK_PRESET="${raw}", using default`);
  }
  return TASK_MANAGER_PRESETS.default;
}

/**
 * Build the engine configuration from environment variables.
 *
 * Recognised: TAXONOMY_TARGET_THEMES, TAXONOMY_ROOT_NAME, TAXONOMY_TASK_PRESET,
 * TAXONOMY_MAX_CONCURRENT_TASKS, TAXONOMY_DEPTH_MODE, TAXONOMY_MAX_DEPTH,
 * TAXONOMY_DB_PATH. LLM_MODEL applies to refinement and analysis.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const baseClusterer = clustererConfig();
  const targetThemes = readNumber(env, 'TAXONOMY_TARGET_THEMES');
  const clusterer = targetThemes === undefined ? baseClusterer : withTargetCount(baseClusterer, targetThemes);

  const model = env.LLM_MODEL?.trim() || undefined;
  const builder = builderConfig({
    rootName: env.TAXONOMY_ROOT_NAME?.trim() || C.DEFAULT_ROOT_NAME,
    refinementModel: model,
  });
  const analyzer = deepAnalyzerConfig({ model });

  const preset = readPreset(env);
  const maxConcurrent = readNumber(env, 'TAXONOMY_MAX_CONCURRENT_TASKS');
  const taskManager = maxConcurrent === undefined
    ? preset
    : taskManagerConfig({ ...preset, maxConcurrentTasks: Math.max(1, Math.floor(maxConcurrent)) });

  const modeResult = DepthEnforcementModeSchema.safeParse(env.TAXONOMY_DEPTH_MODE?.trim());
  const maxDepth = readNumber(env, 'TAXONOMY_MAX_DEPTH');
  const depth = depthConfig({
    mode: modeResult.success ? modeResult.data : 'advisory',
    maxDepth: maxDepth === undefined ? C.DEPTH_MAX : Math.max(C.DEPTH_MIN, Math.floor(maxDepth)),
  });

  return {
    clusterer,
    builder,
    analyzer,
    taskManager,
    depth,
    scanner: scannerConfig(),
    databasePath: env.TAXONOMY_DB_PATH?.trim() || null,
  };
}
