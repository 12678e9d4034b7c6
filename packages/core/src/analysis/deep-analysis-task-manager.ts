/**
 * DeepAnalysisTaskManager - background scheduler for deep analysis
 *
 * Task lifecycle: queued -> running -> completed | failed | cancelled.
 *
 * A management loop launches the best queued task (see compareTasks) while
 * fewer than `maxConcurrentTasks` are running, waiting `taskStartDelayMs`
 * between launches. Each task races the analyzer against `taskTimeoutMs`;
 * the loser is aborted. The manager stops itself once the queue and the
 * running set are both empty.
 *
 * Failures are terminal for the task only. There is no automatic retry:
 * `requeueFailed` is the explicit path, bounded by `maxRetries`.
 *
 * Progress is published as events on `subscribe()` channels; `getStatus()`
 * returns the same snapshot on demand.
 */
import { randomUUID } from 'crypto';
import { DEEP_ANALYSIS_CONFIDENCE_THRESHOLD, PATH_SEPARATOR, TASK_DURATION_SMOOTHING, TASK_LEDGER_LIMIT } from '../config/constants';
import { taskManagerConfig, type TaskManagerConfig } from '../config';
import {
  errorMessage,
  queueFullError,
  TaskManagerError,
  TaskManagerErrorCode,
  taskNotFoundError,
  taskTimeoutError,
} from '../errors';
import type { UserEditGuardrails } from '../guardrails/user-edit-guardrails';
import { sleep, withTimeout } from '../shared/async';
import { EventHub, type EventChannel } from '../shared/event-channel';
import type { TreeWriter } from '../taxonomy/tree-writer';
import type { DeepAnalysisResult, FileAnalyzer } from './deep-analyzer';
import {
  compareTasks,
  type AnalysisTask,
  type EnqueueTaskInput,
  type TaskManagerEvent,
  type TaskManagerStatus,
  type TaskStatus,
} from './task-types';

type RecategorizationTask = Pick<AnalysisTask, 'isUserApproved' | 'currentConfidence' | 'currentCategoryPath'>;
type RecategorizationConfig = Pick<TaskManagerConfig, 'autoRecategorize' | 'respectUserApprovals' | 'minConfidenceImprovement'>;

function samePath(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((segment, index) => segment === b[index]);
}

/**
 * A user-approved placement is never touched when approvals are respected.
 * Otherwise move the file when the confidence jumps by more than the minimum
 * improvement, or the category changes, and only ever towards higher
 * confidence.
 */
export function shouldRecategorize(
  task: RecategorizationTask,
  result: Pick<DeepAnalysisResult, 'confidence' | 'categoryPath'>,
  config: RecategorizationConfig,
): boolean {
  if (task.isUserApproved && config.respectUserApprovals) return false;
  if (!config.autoRecategorize) return false;

  const confidenceImproved = result.confidence > task.currentConfidence + config.minConfidenceImprovement;
  const categoryChanged = !samePath(result.categoryPath, task.currentCategoryPath);
  return (confidenceImproved || categoryChanged) && result.confidence > task.currentConfidence;
}

export interface DeepAnalysisTaskManagerDeps {
  analyzer: FileAnalyzer;
  config?: TaskManagerConfig;
  /** When present, accepted recategorizations are applied to the tree. */
  writer?: TreeWriter;
  guardrails?: UserEditGuardrails;
  deepAnalysisThreshold?: number;
}

type ReassignOutcome = { kind: 'applied' } | { kind: 'blocked'; reason: string } | { kind: 'stale' };

interface RunningEntry {
  task: AnalysisTask;
  controller: AbortController;
}

export class DeepAnalysisTaskManager {
  private readonly analyzer: FileAnalyzer;
  private readonly config: TaskManagerConfig;
  private readonly writer: TreeWriter | null;
  private readonly guardrails: UserEditGuardrails | null;
  private readonly deepAnalysisThreshold: number;
  private readonly hub = new EventHub<TaskManagerEvent>();

  private queue: AnalysisTask[] = [];
  private running = new Map<string, RunningEntry>();
  private ledger: AnalysisTask[] = [];
  private counts: Record<'completed' | 'failed' | 'cancelled', number> = { completed: 0, failed: 0, cancelled: 0 };
  private averageDurationMs: number | null = null;
  private sequence = 0;

  private started = false;
  private paused = false;
  private generation = 0;
  private wake: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private lastStatus: TaskManagerStatus;

  constructor(deps: DeepAnalysisTaskManagerDeps) {
    this.analyzer = deps.analyzer;
    this.config = deps.config ?? taskManagerConfig();
    this.writer = deps.writer ?? null;
    this.guardrails = deps.guardrails ?? null;
    this.deepAnalysisThreshold = deps.deepAnalysisThreshold ?? DEEP_ANALYSIS_CONFIDENCE_THRESHOLD;
    this.lastStatus = this.computeStatus();
  }

  get isRunning(): boolean {
    return this.started;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  // ============================================================================
  // Queue
  // ============================================================================

  enqueueTask(input: EnqueueTaskInput): AnalysisTask | null {
    return this.enqueueTasks([input])[0] ?? null;
  }

  /**
   * Queue tasks and start the manager. Files already queued or running are
   * skipped. Nothing is queued when the batch would exceed `maxQueueSize`.
   */
  enqueueTasks(inputs: readonly EnqueueTaskInput[]): AnalysisTask[] {
    const active = new Set([...this.queue, ...[...this.running.values()].map((entry) => entry.task)].map((task) => task.file.fileId));
    const fresh = inputs.filter((input) => {
      if (active.has(input.file.fileId)) return false;
      active.add(input.file.fileId);
      return true;
    });
    if (this.queue.length + fresh.length > this.config.maxQueueSize) {
      throw queueFullError(this.config.maxQueueSize);
    }

    const tasks = fresh.map((input) => this.createTask(input, 1));
    if (tasks.length === 0) return [];

    this.queue.push(...tasks);
    this.queue.sort(compareTasks);
    console.log(`[DeepAnalysisTaskManager] Enqueued ${tasks.length} tasks (${this.queue.length} queued)`);
    this.publishStatus();
    this.start();
    this.signal();
    return tasks;
  }

  private createTask(input: EnqueueTaskInput, attempt: number): AnalysisTask {
    return {
      id: randomUUID(),
      file: { ...input.file },
      currentCategoryPath: [...input.currentCategoryPath],
      currentConfidence: input.currentConfidence,
      priority: input.priority ?? 'normal',
      status: 'queued',
      isUserApproved: input.isUserApproved ?? false,
      attempt,
      sequence: this.sequence++,
      enqueuedAt: Date.now(),
      startedAt: null,
      completedAt: null,
      result: null,
      error: null,
      recategorized: false,
    };
  }

  cancelTask(taskId: string): AnalysisTask {
    const index = this.queue.findIndex((task) => task.id === taskId);
    if (index !== -1) {
      const [task] = this.queue.splice(index, 1);
      this.finishTask(task, 'cancelled', 'Cancelled');
      return task;
    }
    const entry = this.running.get(taskId);
    if (entry) {
      entry.controller.abort();
      this.finishTask(entry.task, 'cancelled', 'Cancelled');
      return entry.task;
    }
    throw taskNotFoundError(taskId);
  }

  /**
   * Cancel queued and running tasks for the given files.
   */
  removeTasksForFiles(fileIds: readonly string[]): number {
    const ids = new Set(fileIds);
    const matching = [
      ...this.queue.filter((task) => ids.has(task.file.fileId)),
      ...[...this.running.values()].map((entry) => entry.task).filter((task) => ids.has(task.file.fileId)),
    ];
    for (const task of matching) this.cancelTask(task.id);
    return matching.length;
  }

  clearQueue(): number {
    const dropped = this.queue.splice(0);
    for (const task of dropped) this.recordCancelled(task);
    if (dropped.length > 0) {
      console.log(`[DeepAnalysisTaskManager] Cleared ${dropped.length} queued tasks`);
      this.publishStatus();
      this.signal();
    }
    return dropped.length;
  }

  /**
   * Explicit retry of a failed task. Each retry is a new task with the next
   * attempt number.
   */
  requeueFailed(taskId: string): AnalysisTask {
    const failed = this.ledger.find((task) => task.id === taskId);
    if (!failed) throw taskNotFoundError(taskId);
    if (failed.status !== 'failed') {
      throw new TaskManagerError(TaskManagerErrorCode.INVALID_STATE, `Task ${taskId} is ${failed.status}, not failed`);
    }
    if (failed.attempt > this.config.maxRetries) {
      throw new TaskManagerError(
        TaskManagerErrorCode.RETRY_LIMIT_EXCEEDED,
        `Task for ${failed.file.filename} already retried ${failed.attempt - 1} times (max ${this.config.maxRetries})`,
      );
    }
    const alreadyActive =
      this.queue.some((task) => task.file.fileId === failed.file.fileId) ||
      [...this.running.values()].some((entry) => entry.task.file.fileId === failed.file.fileId);
    if (alreadyActive) {
      throw new TaskManagerError(TaskManagerErrorCode.INVALID_STATE, `${failed.file.filename} is already queued`);
    }
    if (this.queue.length + 1 > this.config.maxQueueSize) {
      throw queueFullError(this.config.maxQueueSize);
    }

    const retry = this.createTask(
      {
        file: failed.file,
        currentCategoryPath: failed.currentCategoryPath,
        currentConfidence: failed.currentConfidence,
        priority: failed.priority,
        isUserApproved: failed.isUserApproved,
      },
      failed.attempt + 1,
    );
    this.queue.push(retry);
    this.queue.sort(compareTasks);
    this.publishStatus();
    this.start();
    this.signal();
    return retry;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  start(): void {
    if (this.started) return;
    this.started = true;
    this.paused = false;
    const generation = ++this.generation;
    void this.runLoop(generation);
  }

  /**
   * Stop launching new tasks; running tasks finish.
   */
  pause(): void {
    if (this.paused) return;
    this.paused = true;
    console.log('[DeepAnalysisTaskManager] Paused');
    this.publishStatus();
  }

  resume(): void {
    if (!this.paused && this.started) return;
    this.paused = false;
    console.log('[DeepAnalysisTaskManager] Resumed');
    this.publishStatus();
    if (!this.started) this.start();
    this.signal();
  }

  /**
   * Cancel running tasks and drop the queue. Not resumable; enqueue again.
   */
  stop(): void {
    const wasActive = this.started || this.queue.length > 0 || this.running.size > 0;
    this.started = false;
    this.paused = false;
    this.generation++;

    for (const entry of [...this.running.values()]) {
      entry.controller.abort();
      this.running.delete(entry.task.id);
      this.recordCancelled(entry.task);
    }
    for (const task of this.queue.splice(0)) this.recordCancelled(task);

    this.signal();
    if (wasActive) {
      console.log('[DeepAnalysisTaskManager] Stopped');
      this.publishStatus();
    }
    this.resolveIdleWaiters();
  }

  /**
   * Stop and close every subscriber channel.
   */
  dispose(): void {
    this.stop();
    this.hub.closeAll();
  }

  /**
   * Resolves once the queue and running set are empty. Stays pending while
   * paused with work queued.
   */
  waitForIdle(): Promise<void> {
    if (this.queue.length === 0 && this.running.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  // ============================================================================
  // Observation
  // ============================================================================

  subscribe(): EventChannel<TaskManagerEvent> {
    return this.hub.subscribe();
  }

  unsubscribe(channel: EventChannel<TaskManagerEvent>): void {
    this.hub.unsubscribe(channel);
  }

  getStatus(): TaskManagerStatus {
    return { ...this.lastStatus, runningTasks: [...this.lastStatus.runningTasks] };
  }

  getQueuedTasks(): AnalysisTask[] {
    return [...this.queue];
  }

  getRunningTasks(): AnalysisTask[] {
    return [...this.running.values()].map((entry) => entry.task);
  }

  /**
   * Finished tasks (completed, failed and cancelled), oldest first.
   */
  getCompletedTasks(): AnalysisTask[] {
    return [...this.ledger];
  }

  // ============================================================================
  // Loop
  // ============================================================================

  private async runLoop(generation: number): Promise<void> {
    const active = (): boolean => this.started && this.generation === generation;
    console.log('[DeepAnalysisTaskManager] Started');

    while (active()) {
      if (!this.paused && this.running.size < this.config.maxConcurrentTasks && this.queue.length > 0) {
        const task = this.queue.shift();
        if (task) this.launch(task);
        if (this.config.taskStartDelayMs > 0) await sleep(this.config.taskStartDelayMs);
        continue;
      }
      if (this.queue.length === 0 && this.running.size === 0) {
        this.finish();
        return;
      }
      // Paused: only resume, stop, enqueue or a finishing task wakes the loop
      await this.waitForSignal(this.paused ? null : this.config.idlePollMs);
    }
  }

  private waitForSignal(timeoutMs: number | null): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        if (timer) clearTimeout(timer);
        if (this.wake === done) this.wake = null;
        resolve();
      };
      const timer = timeoutMs === null ? null : setTimeout(done, timeoutMs);
      this.wake = done;
    });
  }

  private signal(): void {
    this.wake?.();
  }

  private finish(): void {
    this.started = false;
    this.paused = false;
    const status = this.publishStatus();
    console.log(
      `[DeepAnalysisTaskManager] Finished: ${status.completed} completed, ${status.failed} failed, ${status.cancelled} cancelled`,
    );
    this.hub.publish({ type: 'finished', status });
    this.resolveIdleWaiters();
  }

  private resolveIdleWaiters(): void {
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }

  private launch(task: AnalysisTask): void {
    const controller = new AbortController();
    task.status = 'running';
    task.startedAt = Date.now();
    this.running.set(task.id, { task, controller });
    this.publishStatus();
    void this.execute(task, controller);
  }

  private isCurrent(task: AnalysisTask, controller: AbortController): boolean {
    return this.running.get(task.id)?.controller === controller;
  }

  private async execute(task: AnalysisTask, controller: AbortController): Promise<void> {
    const context = this.existingCategoryContext();
    try {
      const result = await withTimeout(
        this.analyzer.analyze(task.file, context, controller.signal),
        this.config.taskTimeoutMs,
        () => taskTimeoutError(this.config.taskTimeoutMs),
        () => controller.abort(),
      );
      // Cancelled or stopped while the analyzer ran
      if (!this.isCurrent(task, controller)) return;

      task.result = result;
      await this.applyResult(task, result, controller);
      if (!this.isCurrent(task, controller)) return;
      this.finishTask(task, 'completed', null);
    } catch (error) {
      if (!this.isCurrent(task, controller)) return;
      const message = errorMessage(error);
      console.error(`[DeepAnalysisTaskManager] Task for ${task.file.filename} failed: ${message}`);
      this.finishTask(task, 'failed', message);
    }
  }

  private existingCategoryContext(): string[] {
    const paths = new Set<string>();
    for (const task of this.queue) {
      if (task.currentCategoryPath.length > 0) paths.add(task.currentCategoryPath.join(PATH_SEPARATOR));
    }
    if (this.writer) {
      for (const categoryPath of this.writer.tree.categoryPaths()) paths.add(categoryPath);
    }
    return [...paths].sort();
  }

  private async applyResult(task: AnalysisTask, result: DeepAnalysisResult, controller: AbortController): Promise<void> {
    if (task.isUserApproved && this.config.respectUserApprovals) {
      this.hub.publish({ type: 'recategorizationBlocked', task, reason: 'Placement was approved by the user' });
      return;
    }
    if (!shouldRecategorize(task, result, this.config)) return;

    const fromPath = task.currentCategoryPath;
    if (!this.writer) {
      task.recategorized = true;
      this.hub.publish({ type: 'recategorized', task, fromPath, toPath: result.categoryPath, confidence: result.confidence });
      return;
    }

    const writer = this.writer;
    const guardrails = this.guardrails;
    let outcome: ReassignOutcome;
    try {
      outcome = await writer.write((tree): ReassignOutcome => {
        // Cancelled while waiting for the writer
        if (!this.isCurrent(task, controller)) return { kind: 'stale' };
        if (guardrails) {
          const check = guardrails.validateReassign(tree, task.file.fileId, result.categoryPath);
          if (!check.allowed) return { kind: 'blocked', reason: check.reason ?? 'Blocked by guardrails' };
        }
        tree.reassignFile(task.file.fileId, result.categoryPath, result.confidence, {
          source: 'content',
          needsDeepAnalysis: result.confidence < this.deepAnalysisThreshold,
          file: task.file,
        });
        return { kind: 'applied' };
      });
    } catch (error) {
      outcome = { kind: 'blocked', reason: `Reassignment failed: ${errorMessage(error)}` };
    }

    if (outcome.kind === 'stale') return;
    if (outcome.kind === 'blocked') {
      console.log(`[DeepAnalysisTaskManager] Recategorization of ${task.file.filename} blocked: ${outcome.reason}`);
      this.hub.publish({ type: 'recategorizationBlocked', task, reason: outcome.reason });
      return;
    }
    task.recategorized = true;
    console.log(
      `[DeepAnalysisTaskManager] Recategorized ${task.file.filename}: ` +
        `${fromPath.join(PATH_SEPARATOR)} -> ${result.categoryPath.join(PATH_SEPARATOR)}`,
    );
    this.hub.publish({ type: 'recategorized', task, fromPath, toPath: result.categoryPath, confidence: result.confidence });
  }

  // ============================================================================
  // Bookkeeping
  // ============================================================================

  private finishTask(task: AnalysisTask, status: Exclude<TaskStatus, 'queued' | 'running'>, error: string | null): void {
    this.running.delete(task.id);
    task.status = status;
    task.error = error;
    task.completedAt = Date.now();

    if (status !== 'cancelled' && task.startedAt !== null) {
      const duration = task.completedAt - task.startedAt;
      this.averageDurationMs =
        this.averageDurationMs === null
          ? duration
          : TASK_DURATION_SMOOTHING * duration + (1 - TASK_DURATION_SMOOTHING) * this.averageDurationMs;
    }

    this.record(task);
    this.hub.publish({ type: 'taskCompleted', task, error });
    this.publishStatus();
    this.signal();
  }

  private recordCancelled(task: AnalysisTask): void {
    task.status = 'cancelled';
    task.error = 'Cancelled';
    task.completedAt = Date.now();
    this.record(task);
    this.hub.publish({ type: 'taskCompleted', task, error: task.error });
  }

  private record(task: AnalysisTask): void {
    if (task.status === 'completed' || task.status === 'failed' || task.status === 'cancelled') {
      this.counts[task.status]++;
    }
    this.ledger.push(task);
    if (this.ledger.length > TASK_LEDGER_LIMIT) {
      this.ledger.splice(0, this.ledger.length - TASK_LEDGER_LIMIT);
    }
  }

  private computeStatus(): TaskManagerStatus {
    const queued = this.queue.length;
    const running = this.running.size;
    const finished = this.counts.completed + this.counts.failed + this.counts.cancelled;
    const total = finished + queued + running;
    const estimatedRemainingMs =
      this.averageDurationMs === null
        ? null
        : (this.averageDurationMs * (queued + running)) / this.config.maxConcurrentTasks;

    return {
      isRunning: this.started,
      isPaused: this.paused,
      queued,
      running,
      completed: this.counts.completed,
      failed: this.counts.failed,
      cancelled: this.counts.cancelled,
      progress: total === 0 ? 1 : finished / total,
      runningTasks: [...this.running.values()].map(({ task }) => ({
        id: task.id,
        filename: task.file.filename,
        startedAt: task.startedAt ?? Date.now(),
      })),
      averageDurationMs: this.averageDurationMs,
      estimatedRemainingMs,
      updatedAt: Date.now(),
    };
  }

  private publishStatus(): TaskManagerStatus {
    this.lastStatus = this.computeStatus();
    this.hub.publish({ type: 'status', status: this.getStatus() });
    return this.lastStatus;
  }
}
