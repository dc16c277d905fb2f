/**
 * Scheduler Module
 *
 * Cron-based task scheduling using node-cron. Each task runs an in-process
 * handler; a task never overlaps itself.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { EventEmitter } from 'events';
import { Logger, createLogger } from '../logger';

export type TaskHandler = () => Promise<unknown>;

export interface TaskConfig {
  id: string;
  name: string;
  cronExpression: string;
  handler: TaskHandler;
  enabled: boolean;
  description?: string;
  /** milliseconds */
  timeout?: number;
}

export interface TaskStatus {
  id: string;
  lastRun: Date | null;
  isScheduled: boolean;
  isRunning: boolean;
  lastError: string | null;
  runCount: number;
  successCount: number;
  failureCount: number;
  skippedCount: number;
  /** milliseconds */
  lastRunDuration?: number;
}

export interface SchedulerOptions {
  maxConcurrentTasks: number;
  /** Default handler timeout (ms) */
  taskTimeout: number;
  timezone: string;
  /** Executions kept per task */
  historySize: number;
}

export interface SchedulerConfig {
  maxConcurrentTasks?: number;
  taskTimeout?: number;
  timezone?: string;
  tasks: TaskConfig[];
}

export interface TaskExecutionResult {
  success: boolean;
  skipped?: boolean;
  output?: unknown;
  error?: string;
  /** milliseconds */
  duration: number;
}

export interface ExecutionRecord extends TaskExecutionResult {
  taskId: string;
  timestamp: Date;
  /** true if triggered by cron, false if manual */
  scheduled: boolean;
}

export class Scheduler extends EventEmitter {
  private tasks: Map<string, TaskConfig> = new Map();
  private status: Map<string, TaskStatus> = new Map();
  private cronJobs: Map<string, ScheduledTask> = new Map();
  private runningTasks: Set<string> = new Set();
  private history: Map<string, ExecutionRecord[]> = new Map();
  private options: SchedulerOptions;
  private started = false;
  private readonly logger: Logger;

  constructor(options: Partial<SchedulerOptions> = {}, logger?: Logger) {
    super();
    this.options = {
      maxConcurrentTasks: 5,
      taskTimeout: 300000,
      timezone: 'UTC',
      historySize: 10,
      ...options
    };
    this.logger = logger ?? createLogger('scheduler');
  }

  setOptions(options: Partial<SchedulerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): SchedulerOptions {
    return { ...this.options };
  }

  /**
   * Replace all tasks with the configured ones.
   */
  loadFromConfig(config: SchedulerConfig): void {
    for (const taskId of [...this.tasks.keys()]) {
      this.removeTask(taskId);
    }

    this.setOptions({
      maxConcurrentTasks: config.maxConcurrentTasks ?? this.options.maxConcurrentTasks,
      taskTimeout: config.taskTimeout ?? this.options.taskTimeout,
      timezone: config.timezone ?? this.options.timezone
    });

    for (const task of config.tasks) {
      this.addTask(task);
    }
  }

  addTask(config: TaskConfig): void {
    if (this.tasks.has(config.id)) {
      throw new Error(`Task already exists: ${config.id}`);
    }
    if (!cron.validate(config.cronExpression)) {
      throw new Error(`Invalid cron expression for task ${config.id}: ${config.cronExpression}`);
    }

    this.tasks.set(config.id, config);
    this.status.set(config.id, {
      id: config.id,
      lastRun: null,
      isScheduled: false,
      isRunning: false,
      lastError: null,
      runCount: 0,
      successCount: 0,
      failureCount: 0,
      skippedCount: 0
    });

    if (config.enabled && this.started) {
      this.scheduleTask(config);
    }

    this.emit('taskAdded', config);
  }

  updateTask(taskId: string, updates: Partial<Omit<TaskConfig, 'id'>>): void {
    const existing = this.tasks.get(taskId);
    if (!existing) {
      throw new Error(`Task not found: ${taskId}`);
    }
    if (updates.cronExpression !== undefined && !cron.validate(updates.cronExpression)) {
      throw new Error(`Invalid cron expression for task ${taskId}: ${updates.cronExpression}`);
    }

    const updated = { ...existing, ...updates };
    this.tasks.set(taskId, updated);

    if (this.started) {
      this.unscheduleTask(taskId);
      if (updated.enabled) {
        this.scheduleTask(updated);
      }
    }

    this.emit('taskUpdated', updated);
  }

  removeTask(taskId: string): void {
    this.unscheduleTask(taskId);
    this.tasks.delete(taskId);
    this.status.delete(taskId);
    this.history.delete(taskId);
    this.emit('taskRemoved', taskId);
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    for (const task of this.tasks.values()) {
      if (task.enabled) {
        this.scheduleTask(task);
      }
    }

    this.emit('schedulerStarted');
    this.logger.info(`Scheduler started with ${this.cronJobs.size} task(s)`);
  }

  /**
   * Stop scheduling. Running handlers are left to finish.
   */
  stop(): void {
    for (const taskId of [...this.cronJobs.keys()]) {
      this.unscheduleTask(taskId);
    }

    if (this.started) {
      this.started = false;
      this.emit('schedulerStopped');
      this.logger.info('Scheduler stopped');
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Run a task immediately (manual trigger).
   */
  async executeTask(taskId: string): Promise<TaskExecutionResult> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new Error(`Task not found: ${taskId}`);
    }

    return this.runTask(task, false);
  }

  getTaskStatus(taskId: string): TaskStatus | undefined {
    const status = this.status.get(taskId);
    return status ? { ...status } : undefined;
  }

  getAllStatuses(): TaskStatus[] {
    return Array.from(this.status.values(), status => ({ ...status }));
  }

  getExecutionHistory(taskId: string): ExecutionRecord[] {
    return [...(this.history.get(taskId) ?? [])];
  }

  getAllTasks(): TaskConfig[] {
    return Array.from(this.tasks.values());
  }

  private scheduleTask(task: TaskConfig): void {
    this.unscheduleTask(task.id);

    const job = cron.schedule(
      task.cronExpression,
      () => {
        this.runTask(task, true).catch(error => {
          this.logger.error(`Unexpected failure running task ${task.id}`, error instanceof Error ? error : undefined);
        });
      },
      {
        scheduled: true,
        timezone: this.options.timezone
      }
    );

    this.cronJobs.set(task.id, job);
    this.updateTaskStatus(task.id, { isScheduled: true });
    this.emit('taskScheduled', task);
  }

  private unscheduleTask(taskId: string): void {
    const job = this.cronJobs.get(taskId);
    if (job) {
      job.stop();
      this.cronJobs.delete(taskId);
      this.updateTaskStatus(taskId, { isScheduled: false });
      this.emit('taskUnscheduled', taskId);
    }
  }

  private async runTask(task: TaskConfig, scheduled: boolean): Promise<TaskExecutionResult> {
    const skipReason = this.runningTasks.has(task.id)
      ? 'Task already running'
      : this.runningTasks.size >= this.options.maxConcurrentTasks
        ? 'Concurrency limit reached'
        : null;

    if (skipReason) {
      this.logger.warn(`Skipping task ${task.id}: ${skipReason}`);
      this.updateTaskStatus(task.id, { skippedCount: (this.status.get(task.id)?.skippedCount ?? 0) + 1 });
      this.emit('taskSkipped', task.id, skipReason);
      return { success: false, skipped: true, error: skipReason, duration: 0 };
    }

    this.runningTasks.add(task.id);
    this.updateTaskStatus(task.id, { isRunning: true });

    const startTime = Date.now();
    let result: TaskExecutionResult;

    // The task stays marked as running until its handler settles, even after a timeout.
    const run = new Promise<unknown>(resolve => resolve(task.handler()));
    const release = (): void => {
      this.runningTasks.delete(task.id);
      this.updateTaskStatus(task.id, { isRunning: false });
    };
    run.then(release, release);

    try {
      this.emit('taskStarted', task.id);

      const output = await this.runWithTimeout(run, task.timeout ?? this.options.taskTimeout);
      result = { success: true, output, duration: Date.now() - startTime };

      const current = this.status.get(task.id);
      this.updateTaskStatus(task.id, {
        lastRun: new Date(),
        runCount: (current?.runCount ?? 0) + 1,
        successCount: (current?.successCount ?? 0) + 1,
        lastRunDuration: result.duration,
        lastError: null
      });

      this.emit('taskCompleted', task.id, result);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      result = { success: false, error: errorMessage, duration: Date.now() - startTime };

      const current = this.status.get(task.id);
      this.updateTaskStatus(task.id, {
        lastRun: new Date(),
        runCount: (current?.runCount ?? 0) + 1,
        failureCount: (current?.failureCount ?? 0) + 1,
        lastRunDuration: result.duration,
        lastError: errorMessage
      });

      this.logger.error(`Task ${task.id} failed: ${errorMessage}`);
      this.emit('taskFailed', task.id, errorMessage);
    }

    this.recordExecution(task.id, result, scheduled);
    return result;
  }

  private runWithTimeout(run: Promise<unknown>, timeout: number): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        reject(new Error(`Task timed out after ${timeout}ms`));
      }, timeout);

      run.then(
        value => {
          clearTimeout(timeoutId);
          resolve(value);
        },
        error => {
          clearTimeout(timeoutId);
          reject(error);
        }
      );
    });
  }

  private recordExecution(taskId: string, result: TaskExecutionResult, scheduled: boolean): void {
    if (!this.tasks.has(taskId)) {
      return;
    }

    const history = this.history.get(taskId) ?? [];
    history.push({
      ...result,
      taskId,
      timestamp: new Date(),
      scheduled
    });

    while (history.length > this.options.historySize) {
      history.shift();
    }

    this.history.set(taskId, history);
  }

  private updateTaskStatus(taskId: string, updates: Partial<TaskStatus>): void {
    const current = this.status.get(taskId);
    if (current) {
      this.status.set(taskId, { ...current, ...updates });
    }
  }
}
