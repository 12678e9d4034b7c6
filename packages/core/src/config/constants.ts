/**
 * Configuration constants for the taxonomy pipeline.
 * Thresholds, limits and timings are defined here and referenced by the
 * component configurations in ./index.ts.
 */

// ============================================================================
// TAXONOMY TREE
// ============================================================================

export const DEFAULT_ROOT_NAME = 'Files';
export const UNCATEGORIZED_NAME = 'Uncategorized';
export const OTHER_SUBTHEME_NAME = 'Other';
export const PATH_SEPARATOR = ' / '; // Display separator for category paths

// ============================================================================
// KEYWORD EXTRACTION & CLUSTERING
// ============================================================================

export const KEYWORD_MIN_LENGTH_FAST = 3;
export const KEYWORD_MIN_LENGTH_QUALITY = 2;

export const CLUSTER_TARGET_THEME_COUNT = 7;
export const CLUSTER_MIN_TARGET_THEMES = 3; // withTargetCount lower clamp
export const CLUSTER_MAX_TARGET_THEMES = 15; // withTargetCount upper clamp
export const CLUSTER_MIN_FILES_PER_THEME = 3;
export const CLUSTER_THEME_SIMILARITY_THRESHOLD = 0.15;
export const CLUSTER_MIN_FILES_PER_SUBTHEME = 2;
export const CLUSTER_MAX_DEPTH = 3;
export const CLUSTER_MIN_ASSIGNMENT_SCORE = 0.1; // Jaccard floor for file -> theme
export const CLUSTER_SMALL_THEME_MERGE_SIMILARITY = 0.2;
export const CLUSTER_MAX_LEFTOVER_THEMES = 20; // Leftover keywords considered as theme seeds

// ============================================================================
// BUILDER
// ============================================================================

export const INSTANT_NODE_CONFIDENCE = 0.7;
export const INSTANT_FILE_CONFIDENCE = 0.7;
export const UNCATEGORIZED_FILE_CONFIDENCE = 0.3;
export const LEARNED_PATTERN_CONFIDENCE = 0.6; // Placement from a user move pattern; still below the deep-analysis threshold

export const REFINEMENT_DELAY_MS = 100; // Pause between rename calls
export const REFINEMENT_SAMPLE_FILES = 20; // Filenames shown per rename prompt
export const MERGE_CANDIDATE_MAX_FILES = 5; // Categories below this are merge candidates
export const MERGE_MAX_SUGGESTIONS = 5;
export const MERGE_SAMPLE_FILES = 5;
export const SUBSTRUCTURE_MIN_FILES = 3; // Merged nodes above this get sub-structure inference
export const SUBSTRUCTURE_SAMPLE_FILES = 30;

// ============================================================================
// FOLDER UNITS
// ============================================================================

export const FOLDER_MAX_FILES_IN_PROMPT = 50;
export const FOLDER_MAX_CATEGORY_CONTEXT = 30;
export const FOLDER_FALLBACK_CONFIDENCE = 0.3; // LLM categorization failed
export const LLM_FOLDER_MAX_TOKENS = 400;

// ============================================================================
// DEEP ANALYSIS
// ============================================================================

export const DEEP_ANALYSIS_CONFIDENCE_THRESHOLD = 0.75;
export const DEEP_ANALYSIS_MAX_CONCURRENT = 2;
export const DEEP_ANALYSIS_TIMEOUT_MS = 120000;
export const DEEP_ANALYSIS_TEXT_PREVIEW_CHARS = 2000;
export const DEEP_ANALYSIS_MAX_TAGS = 10; // Scene tags / objects per prompt
export const DEEP_ANALYSIS_MAX_CATEGORY_CONTEXT = 20;

// ============================================================================
// TASK MANAGER
// ============================================================================

export const TASK_MAX_CONCURRENT = 2;
export const TASK_START_DELAY_MS = 100;
export const TASK_MIN_CONFIDENCE_IMPROVEMENT = 0.15;
export const TASK_MAX_RETRIES = 2;
export const TASK_TIMEOUT_MS = 120000;
export const TASK_MAX_QUEUE_SIZE = 10000;
export const TASK_IDLE_POLL_MS = 100; // Upper bound on how long the loop sleeps without a signal
export const TASK_DURATION_SMOOTHING = 0.3; // EMA weight of the newest duration
export const TASK_LEDGER_LIMIT = 1000; // Completed tasks kept in memory

// ============================================================================
// DEPTH
// ============================================================================

export const DEPTH_MIN = 2;
export const DEPTH_MAX = 5;
export const DEPTH_STRICT_MIN = 3;
export const DEPTH_STRICT_MAX = 7;

// ============================================================================
// SCANNER & INSPECTOR
// ============================================================================

export const SCANNER_MAX_FILES = 10000;
export const SCANNER_MIN_FILE_SIZE = 100; // Bytes; smaller files are skipped
export const INSPECTOR_MAX_FILE_SIZE_BYTES = 50 * 1024 * 1024; // 50MB
export const INSPECTOR_TIMEOUT_MS = 30000;

// ============================================================================
// WORKER POOL & LLM
// ============================================================================

export const WORKER_POOL_DEFAULT_MAX_WORKERS = 8;
export const WORKER_POOL_CHECK_INTERVAL_MS = 50;
export const WORKER_POOL_MAX_ITERATIONS = 10000;
export const WORKER_POOL_SLOW_TASK_MS = 30000;

export const LLM_DEFAULT_MAX_TOKENS = 5000;
export const LLM_RENAME_MAX_TOKENS = 50;
export const LLM_MERGE_MAX_TOKENS = 300;
export const LLM_SUBSTRUCTURE_MAX_TOKENS = 500;
export const LLM_ANALYSIS_MAX_TOKENS = 800;
export const LLM_REFINEMENT_TEMPERATURE = 0.3;
