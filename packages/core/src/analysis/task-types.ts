import type { FileRef } from '../taxonomy/contracts';
import type { DeepAnalysisResult } from './deep-analyzer';

export type TaskPriority = 'low' | 'normal' | 'high' | 'critical';

export const TASK_PRIORITY_RANK: Record<TaskPriority, number> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3,
};

export type TaskStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface AnalysisTask {
  id: string;
  file: FileRef;
  currentCategoryPath: string[];
  currentConfidence: number;
  priority: TaskPriority;
  status: TaskStatus;
  /** The current placement was confirmed by a human. */
  isUserApproved: boolean;
  /** 1 for the first run, incremented by each explicit requeue. */
  attempt: number;
  sequence: number;
  enqueuedAt: number;
  startedAt: number | null;
  completedAt: number | null;
  result: DeepAnalysisResult | null;
  error: string | null;
  recategorized: boolean;
}

export interface EnqueueTaskInput {
  file: FileRef;
  currentCategoryPath: string[];
  currentConfidence: number;
  priority?: TaskPriority;
  isUserApproved?: boolean;
}

export interface RunningTaskInfo {
  id: string;
  filename: string;
  startedAt: number;
}

export interface TaskManagerStatus {
  isRunning: boolean;
  isPaused: boolean;
  queued: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
  /** Finished / (finished + queued + running); 1 when nothing was ever enqueued. */
  progress: number;
  runningTasks: RunningTaskInfo[];
  averageDurationMs: number | null;
  estimatedRemainingMs: number | null;
  updatedAt: number;
}

export type TaskManagerEvent =
  | { type: 'status'; status: TaskManagerStatus }
  | { type: 'taskCompleted'; task: AnalysisTask; error: string | null }
  | { type: 'recategorized'; task: AnalysisTask; fromPath: string[]; toPath: string[]; confidence: number }
  | { type: 'recategorizationBlocked'; task: AnalysisTask; reason: string }
  | { type: 'finished'; status: TaskManagerStatus };

/**
 * Launch order: priority descending, then least confident first, then FIFO.
 */
export function compareTasks(a: AnalysisTask, b: AnalysisTask): number {
  const byPriority = TASK_PRIORITY_RANK[b.priority] - TASK_PRIORITY_RANK[a.priority];
  if (byPriority !== 0) return byPriority;
  if (a.currentConfidence !== b.currentConfidence) return a.currentConfidence - b.currentConfidence;
  return a.sequence - b.sequence;
}
