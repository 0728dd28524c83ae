import type Database from 'better-sqlite3';
import { CheckpointStore } from '../checkpoint/store.js';
import type { Config } from '../config.js';
import { TaskRepository } from '../db/task-repository.js';
import type { SpawnEngine } from '../engine/worker.js';
import { TaskLogger } from '../logging/task-log.js';
import type { TaskCommand, TaskLogEntry, TaskStatus, TaskSummary } from '../types/task.js';
import { UnknownTaskError, errorMessage } from '../utils/errors.js';
import { generateTaskId } from '../utils/hash.js';
import { Mutex } from '../utils/mutex.js';
import { Task } from './task.js';
import type { RemoveOptions, TaskDeps } from './task.js';
import { resolveTaskConfig } from './task-config.js';

export interface TaskManagerOptions {
  db: Database.Database;
  config: Config;
  spawn?: SpawnEngine;
  locateEngine?: (enginePath: string) => string;
  clock?: () => number;
}

export interface AddTaskOptions {
  // Start right away instead of leaving the task queued
  start?: boolean;
}

/**
 * Owns the task collection and the monitor loop.
 *
 * Lock discipline: `structure` guards adding and removing tasks; each Task
 * guards its own status, process handle and snapshot. Process work for one
 * task never waits on another task's lock.
 */
export class TaskManager {
  private readonly tasks = new Map<string, Task>();
  private readonly structure = new Mutex();
  private readonly repository: TaskRepository;
  private readonly history: TaskLogger;
  private readonly deps: TaskDeps;
  private monitorTimer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(private readonly options: TaskManagerOptions) {
    const { config } = options;
    this.repository = new TaskRepository(options.db);
    this.history = new TaskLogger(options.db, options.clock);
    this.deps = {
      settings: {
        enginePath: config.enginePath,
        terminateGraceMs: config.terminateGraceMs,
        progressLogIntervalMs: config.progressLogIntervalMs,
        stopDiscardsCheckpoint: config.stopDiscardsCheckpoint,
        debug: config.debug,
      },
      checkpoints: new CheckpointStore(),
      history: this.history,
      repository: this.repository,
      spawn: options.spawn,
      locateEngine: options.locateEngine,
      clock: options.clock,
    };
  }

  /**
   * Validate and register a new task. With `start`, spawn errors propagate
   * after the task has been registered (it is then listed as failed).
   */
  async addTask(input: unknown, options: AddTaskOptions = {}): Promise<string> {
    const config = resolveTaskConfig(input, this.options.config);

    const task = await this.structure.runExclusive(() => {
      let id = generateTaskId(config.url);
      while (this.tasks.has(id)) {
        id = generateTaskId(config.url);
      }
      const created = Task.create(id, config, this.deps);
      this.tasks.set(id, created);
      return created;
    });
    console.log(`[TaskManager] Added task ${task.id}: ${config.filename}`);

    if (options.start) {
      await task.start();
    }
    return task.id;
  }

  /**
   * Dispatch a command by name. Resolves to the task summary, or null for remove.
   */
  async command(taskId: string, command: TaskCommand, options: RemoveOptions = {}): Promise<TaskSummary | null> {
    switch (command) {
      case 'start':
        return this.start(taskId);
      case 'pause':
        return this.pause(taskId);
      case 'resume':
        return this.resume(taskId);
      case 'stop':
        return this.stop(taskId);
      case 'remove':
        await this.remove(taskId, options);
        return null;
    }
  }

  async start(taskId: string): Promise<TaskSummary> {
    return this.requireTask(taskId).start();
  }

  async pause(taskId: string): Promise<TaskSummary> {
    return this.requireTask(taskId).pause();
  }

  async resume(taskId: string): Promise<TaskSummary> {
    return this.requireTask(taskId).resume();
  }

  async stop(taskId: string): Promise<TaskSummary> {
    return this.requireTask(taskId).stop();
  }

  async remove(taskId: string, options: RemoveOptions = {}): Promise<void> {
    const task = this.requireTask(taskId);
    // Terminate outside the structural lock so other tasks can still be added or removed
    await task.remove(options);
    await this.structure.runExclusive(() => {
      this.tasks.delete(taskId);
    });
    console.log(`[TaskManager] Removed task ${taskId}`);
  }

  async updateTask(taskId: string, patch: unknown): Promise<TaskSummary> {
    return this.requireTask(taskId).update(patch);
  }

  /**
   * All tasks in creation order, optionally filtered by status.
   */
  listSnapshot(status?: TaskStatus): TaskSummary[] {
    const summaries: TaskSummary[] = [];
    for (const task of this.tasks.values()) {
      if (task.isRemoved()) continue;
      if (status && task.getStatus() !== status) continue;
      summaries.push(task.summary());
    }
    return summaries;
  }

  getTask(taskId: string): TaskSummary {
    return this.requireTask(taskId).summary();
  }

  readLog(taskId: string, tail?: number): TaskLogEntry[] {
    this.requireTask(taskId);
    return tail !== undefined ? this.history.tail(taskId, tail) : this.history.read(taskId);
  }

  /**
   * Load persisted tasks. Tasks that were running when the previous instance
   * went down come back paused.
   */
  rehydrate(): Promise<number> {
    return this.structure.runExclusive(() => {
      const records = this.repository.findAll();
      let interrupted = 0;
      for (const record of records) {
        if (this.tasks.has(record.id)) continue;
        const task = new Task(record, this.deps);
        if (task.recoverInterrupted()) {
          interrupted++;
        }
        this.tasks.set(record.id, task);
      }
      console.log(`[TaskManager] Loaded ${records.length} task(s), ${interrupted} interrupted`);
      return records.length;
    });
  }

  startMonitor(): void {
    if (this.monitorTimer) return;

    const interval = this.options.config.monitorIntervalMs;
    this.monitorTimer = setInterval(() => {
      this.tick().catch((error) => {
        console.error('[TaskManager] Monitor tick failed:', error);
      });
    }, interval);
    console.log(`[TaskManager] Monitor started (every ${interval}ms)`);
  }

  stopMonitor(): void {
    if (!this.monitorTimer) return;
    clearInterval(this.monitorTimer);
    this.monitorTimer = null;
    console.log('[TaskManager] Monitor stopped');
  }

  /**
   * Observe every running task once. Tasks busy with a command are skipped.
   */
  async tick(): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;

    try {
      const running = [...this.tasks.values()].filter((task) => task.getStatus() === 'running');
      const results = await Promise.allSettled(running.map((task) => task.observe()));

      results.forEach((result, index) => {
        const taskId = running[index]?.id ?? '?';
        if (result.status === 'rejected') {
          console.error(`[TaskManager] Failed to observe task ${taskId}: ${errorMessage(result.reason)}`);
        } else if (!result.value && this.options.config.debug) {
          console.debug(`[TaskManager] Task ${taskId} busy, skipped this tick`);
        }
      });
    } finally {
      this.ticking = false;
    }
  }

  /**
   * Stop monitoring and pause every running task so it can be resumed later.
   */
  async shutdown(): Promise<void> {
    this.stopMonitor();

    const tasks = [...this.tasks.values()];
    const results = await Promise.allSettled(tasks.map((task) => task.suspendForShutdown()));

    let paused = 0;
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        console.error(`[TaskManager] Failed to pause task ${tasks[index]?.id ?? '?'}: ${errorMessage(result.reason)}`);
      } else if (result.value) {
        paused++;
      }
    });
    console.log(`[TaskManager] Shutdown complete, ${paused} task(s) paused`);
  }

  private requireTask(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task || task.isRemoved()) {
      throw new UnknownTaskError(taskId);
    }
    return task;
  }
}
