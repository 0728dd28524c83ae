import type { CheckpointStore } from '../checkpoint/store.js';
import type { TaskRepository } from '../db/task-repository.js';
import { buildEngineArgs, formatCommandLine } from '../engine/args.js';
import { describeExitStatus } from '../engine/exit-codes.js';
import { resolveEnginePath } from '../engine/locate.js';
import { WorkerProcess } from '../engine/worker.js';
import type { SpawnEngine, WorkerPollResult } from '../engine/worker.js';
import type { TaskLogger } from '../logging/task-log.js';
import { ProgressSampler, completedSnapshot, idleSnapshot } from '../progress/sampler.js';
import type {
  ProgressSnapshot,
  TaskAction,
  TaskConfig,
  TaskLogKind,
  TaskLogLevel,
  TaskRecord,
  TaskStatus,
  TaskSummary,
} from '../types/task.js';
import {
  EngineSpawnError,
  InvalidTransitionError,
  ProgressParseError,
  UnknownTaskError,
  WorkerExitedError,
  errorMessage,
} from '../utils/errors.js';
import { formatBytes, formatProgress, formatRate } from '../utils/format.js';
import { Mutex } from '../utils/mutex.js';
import { applyTaskConfigPatch } from './task-config.js';

export interface TaskSettings {
  enginePath: string;
  terminateGraceMs: number;
  progressLogIntervalMs: number;
  stopDiscardsCheckpoint: boolean;
  debug: boolean;
}

export interface TaskDeps {
  settings: TaskSettings;
  checkpoints: CheckpointStore;
  history: TaskLogger;
  repository: TaskRepository;
  spawn?: SpawnEngine;
  locateEngine?: (enginePath: string) => string;
  clock?: () => number;
}

export interface RemoveOptions {
  deleteFiles?: boolean;
}

type WorkerExit = Exclude<WorkerPollResult, { state: 'alive' }>;

// Output lines copied into the task log when aria2c fails
const FAILURE_TAIL_LINES = 10;

/**
 * One download and its aria2c process.
 *
 * Every command and every monitor observation runs under the task's own lock,
 * so at most one transition is in flight. Process work (spawn, terminate) is
 * awaited first; the resulting state is then assigned in a single synchronous
 * step, so readers never see a half-applied transition.
 */
export class Task {
  readonly id: string;
  readonly createdAt: number;

  private config: TaskConfig;
  private status: TaskStatus;
  private snapshot: ProgressSnapshot | null;
  private errorMessage: string | null;
  private lastExitCode: number | null;
  private startedAt: number | null;
  private completedAt: number | null;

  private worker: WorkerProcess | null = null;
  private sampler: ProgressSampler | null = null;
  private lastProgressNoteAt = 0;
  private parseErrorLogged = false;
  private removed = false;
  private readonly lock = new Mutex();
  private readonly clock: () => number;

  constructor(record: TaskRecord, private readonly deps: TaskDeps) {
    this.id = record.id;
    this.createdAt = record.createdAt;
    this.config = record.config;
    this.status = record.status;
    this.snapshot = record.snapshot;
    this.errorMessage = record.errorMessage;
    this.lastExitCode = record.lastExitCode;
    this.startedAt = record.startedAt;
    this.completedAt = record.completedAt;
    this.clock = deps.clock ?? Date.now;
  }

  static create(id: string, config: TaskConfig, deps: TaskDeps): Task {
    const task = new Task(
      {
        id,
        config,
        status: 'queued',
        snapshot: null,
        errorMessage: null,
        lastExitCode: null,
        createdAt: (deps.clock ?? Date.now)(),
        startedAt: null,
        completedAt: null,
      },
      deps
    );
    task.persist();
    task.record('info', 'transition', `Task added: ${config.url} -> ${deps.checkpoints.outputPath(config)}`);
    return task;
  }

  getStatus(): TaskStatus {
    return this.status;
  }

  isRemoved(): boolean {
    return this.removed;
  }

  start(): Promise<TaskSummary> {
    return this.lock.runExclusive(async () => {
      this.beginCommand();
      switch (this.status) {
        case 'queued':
        case 'stopped':
        case 'failed':
          await this.launch('start');
          break;
        case 'running':
          throw new InvalidTransitionError(this.id, 'start', this.status, 'Task is already running');
        case 'paused':
          throw new InvalidTransitionError(this.id, 'start', this.status, 'Task is paused; use resume to continue it');
        case 'completed':
          throw new InvalidTransitionError(this.id, 'start', this.status);
      }
      return this.summary();
    });
  }

  pause(): Promise<TaskSummary> {
    return this.lock.runExclusive(async () => {
      if (this.beginCommand()) {
        // aria2c already finished; report where it settled
        return this.summary();
      }
      if (this.status === 'running') {
        await this.halt('paused', 'pause');
      } else if (this.status === 'queued') {
        // Nothing to suspend yet
        this.moveTo('stopped', 'paused before it was started');
      } else {
        throw new InvalidTransitionError(this.id, 'pause', this.status);
      }
      return this.summary();
    });
  }

  resume(): Promise<TaskSummary> {
    return this.lock.runExclusive(async () => {
      this.beginCommand();
      if (this.status === 'paused') {
        await this.launch('resume');
      } else if (this.status === 'running') {
        throw new InvalidTransitionError(this.id, 'resume', this.status, 'Task is already running');
      } else {
        throw new InvalidTransitionError(this.id, 'resume', this.status);
      }
      return this.summary();
    });
  }

  stop(): Promise<TaskSummary> {
    return this.lock.runExclusive(async () => {
      if (this.beginCommand()) {
        return this.summary();
      }
      let settled: TaskStatus;
      if (this.status === 'running') {
        settled = await this.halt('stopped', 'stop');
      } else if (this.status === 'queued' || this.status === 'paused') {
        settled = this.moveTo('stopped', 'stopped by request');
      } else {
        throw new InvalidTransitionError(this.id, 'stop', this.status);
      }

      if (settled === 'stopped' && this.deps.settings.stopDiscardsCheckpoint) {
        const removed = this.deps.checkpoints.discard(this.config, false);
        if (removed.length > 0) {
          this.record('info', 'note', `Discarded checkpoint ${removed.join(', ')}`);
        }
      }
      return this.summary();
    });
  }

  /**
   * Terminate any live process, optionally delete the files, and drop the
   * task's row and history. The task refuses every command afterwards.
   */
  remove(options: RemoveOptions = {}): Promise<void> {
    return this.lock.runExclusive(async () => {
      this.beginCommand();
      if (this.status === 'running') {
        await this.halt('stopped', 'remove');
      }
      if (options.deleteFiles) {
        this.deps.checkpoints.discard(this.config, true);
      }
      this.removed = true;
      this.deps.repository.delete(this.id);
      this.deps.history.purge(this.id);
      console.log(`[Task ${this.id}] Removed${options.deleteFiles ? ' with its files' : ''}`);
    });
  }

  update(patch: unknown): Promise<TaskSummary> {
    return this.lock.runExclusive(() => {
      this.beginCommand();
      if (this.status === 'running') {
        throw new InvalidTransitionError(this.id, 'update', this.status, 'Cannot edit a running task; pause or stop it first');
      }

      const next = applyTaskConfigPatch(this.config, patch);
      const previousOutput = this.deps.checkpoints.outputPath(this.config);
      const nextOutput = this.deps.checkpoints.outputPath(next);
      this.config = next;
      this.persist();
      this.record('info', 'note', 'Configuration updated');
      if (previousOutput !== nextOutput && this.status === 'paused') {
        this.record('warn', 'note', `Output moved to ${nextOutput}; the checkpoint for ${previousOutput} will not be used`);
      }
      return this.summary();
    });
  }

  /**
   * One monitor pass. Skipped (returns false) when a command holds the lock.
   */
  async observe(): Promise<boolean> {
    const result = await this.lock.tryRunExclusive(() => this.observeLocked(this.clock()));
    return result.ran;
  }

  /**
   * Pause a running task because the service is going down.
   */
  suspendForShutdown(): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (this.removed) return false;
      this.reconcileExit();
      if (this.status !== 'running') return false;

      this.record('warn', 'note', 'Service shutting down');
      await this.halt('paused', 'pause');
      return true;
    });
  }

  /**
   * A task loaded as running has lost its process with the previous service instance.
   */
  recoverInterrupted(): boolean {
    if (this.status !== 'running') return false;

    const now = this.clock();
    this.status = 'paused';
    this.snapshot = this.snapshot ? idleSnapshot(this.snapshot, now) : null;
    this.persist();
    this.record('warn', 'transition', 'running -> paused: interrupted by a service restart, resume to continue');
    return true;
  }

  summary(): TaskSummary {
    return {
      ...this.toRecord(),
      outputPath: this.deps.checkpoints.outputPath(this.config),
      pid: this.worker?.pid ?? null,
    };
  }

  toRecord(): TaskRecord {
    return {
      id: this.id,
      config: { ...this.config, headers: [...this.config.headers], extraArgs: [...this.config.extraArgs] },
      status: this.status,
      snapshot: this.snapshot ? { ...this.snapshot } : null,
      errorMessage: this.errorMessage,
      lastExitCode: this.lastExitCode,
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    };
  }

  /**
   * Returns true when the process had already exited and the task was settled here.
   */
  private beginCommand(): boolean {
    if (this.removed) {
      throw new UnknownTaskError(this.id);
    }
    return this.reconcileExit();
  }

  private async launch(command: 'start' | 'resume'): Promise<void> {
    const from = this.status;
    const checkpoint = this.deps.checkpoints.inspect(this.config);
    const continuing = command === 'resume' || checkpoint.hasControlFile;

    let worker: WorkerProcess;
    try {
      const enginePath = (this.deps.locateEngine ?? resolveEnginePath)(this.deps.settings.enginePath);
      this.deps.checkpoints.prepare(this.config);
      const args = buildEngineArgs(this.config, { resume: continuing });
      this.record('info', 'engine', `Launching ${formatCommandLine(enginePath, args)}`);
      worker = await WorkerProcess.launch({
        enginePath,
        args,
        cwd: this.config.directory,
        spawn: this.deps.spawn,
      });
    } catch (error) {
      const failure = error instanceof EngineSpawnError
        ? error
        : new EngineSpawnError(
          `Failed to launch ${this.deps.settings.enginePath}: ${errorMessage(error)}`,
          this.deps.settings.enginePath,
          error instanceof Error ? error : undefined
        );

      this.status = 'failed';
      this.errorMessage = failure.message;
      this.lastExitCode = null;
      this.persist();
      this.record('error', 'error', `${from} -> failed: ${failure.message}`);
      console.error(`[Task ${this.id}] ${failure.message}`);
      throw failure;
    }

    const now = this.clock();
    const sampler = new ProgressSampler(continuing ? this.snapshot : null);
    sampler.attach(worker);

    this.worker = worker;
    this.sampler = sampler;
    this.status = 'running';
    this.snapshot = sampler.current();
    this.errorMessage = null;
    this.lastExitCode = null;
    this.startedAt = now;
    this.completedAt = null;
    this.lastProgressNoteAt = now;
    this.parseErrorLogged = false;
    this.persist();

    const detail = checkpoint.hasControlFile
      ? `, continuing from ${checkpoint.controlFilePath} with ${formatBytes(checkpoint.partialBytes)} on disk`
      : '';
    this.record('info', 'transition', `${from} -> running (pid ${worker.pid ?? '?'}${detail})`);
    if (command === 'resume' && !checkpoint.hasControlFile) {
      this.record('warn', 'note', `No control file at ${checkpoint.controlFilePath}; aria2c continues from the partial file if there is one`);
    }
  }

  /**
   * Terminate the live process and settle on `target`, unless the process
   * turns out to have finished on its own first. A process that outlives
   * SIGKILL stays attached and the task stays running.
   */
  private async halt(target: 'paused' | 'stopped', command: TaskAction): Promise<TaskStatus> {
    const worker = this.worker;
    const sampler = this.sampler;
    if (!worker || !sampler) {
      return this.moveTo(target, 'no process was attached');
    }

    const graceMs = this.deps.settings.terminateGraceMs;
    const outcome = await worker.terminate(graceMs);
    if (outcome === 'forced') {
      this.record('warn', 'engine', `aria2c ignored SIGTERM for ${graceMs}ms and was killed`);
    } else if (outcome === 'unresponsive') {
      const message = `aria2c (pid ${worker.pid ?? '?'}) did not exit after SIGKILL; the task is still running`;
      this.record('error', 'engine', message);
      console.error(`[Task ${this.id}] ${message}`);
      throw new InvalidTransitionError(this.id, command, this.status, message);
    }

    const now = this.clock();
    const latest = this.drain(sampler, now);
    const exit = worker.poll();
    if (exit.state === 'exited-ok') {
      this.settleExit(exit, worker, latest, now);
      return this.status;
    }

    const from = this.status;
    this.worker = null;
    this.sampler = null;
    this.status = target;
    this.snapshot = latest ? idleSnapshot(latest, now) : null;
    this.persist();
    this.record('info', 'transition', `${from} -> ${target} at ${formatProgress(this.snapshot)}`);
    return target;
  }

  private moveTo(target: TaskStatus, reason: string): TaskStatus {
    const from = this.status;
    this.status = target;
    this.persist();
    this.record('info', 'transition', `${from} -> ${target}: ${reason}`);
    return target;
  }

  private reconcileExit(): boolean {
    const worker = this.worker;
    const sampler = this.sampler;
    if (this.status !== 'running' || !worker || !sampler) return false;

    const exit = worker.poll();
    if (exit.state === 'alive') return false;

    const now = this.clock();
    this.settleExit(exit, worker, this.drain(sampler, now), now);
    return true;
  }

  private observeLocked(now: number): void {
    const worker = this.worker;
    const sampler = this.sampler;
    if (this.removed || this.status !== 'running' || !worker || !sampler) return;

    const result = sampler.sample(now);
    if (result.error) {
      this.reportUnreadableProgress(result.error);
    }
    if (result.snapshot) {
      this.snapshot = result.snapshot;
    }

    const exit = worker.poll();
    if (exit.state !== 'alive') {
      sampler.detach();
      this.settleExit(exit, worker, this.snapshot, now);
      return;
    }

    if (this.snapshot && now - this.lastProgressNoteAt >= this.deps.settings.progressLogIntervalMs) {
      this.lastProgressNoteAt = now;
      this.persist();
      this.record(
        'info',
        'progress',
        `${formatProgress(this.snapshot)}, ${formatRate(this.snapshot)}, ${this.snapshot.connections} connections`
      );
    }
  }

  private drain(sampler: ProgressSampler, now: number): ProgressSnapshot | null {
    const result = sampler.sample(now);
    if (result.error) {
      this.reportUnreadableProgress(result.error);
    }
    sampler.detach();
    return result.snapshot ?? this.snapshot;
  }

  private settleExit(exit: WorkerExit, worker: WorkerProcess, latest: ProgressSnapshot | null, now: number): void {
    const from = this.status;
    this.worker = null;
    this.sampler = null;

    if (exit.state === 'exited-ok') {
      this.status = 'completed';
      this.snapshot = completedSnapshot(latest, now);
      this.completedAt = now;
      this.lastExitCode = 0;
      this.errorMessage = null;
      this.persist();
      this.record('info', 'transition', `${from} -> completed: ${formatProgress(this.snapshot)}`);
      console.log(`[Task ${this.id}] Completed: ${this.config.filename}`);
      return;
    }

    const failure = new WorkerExitedError(
      `aria2c ${describeExitStatus(exit.code, exit.signal)}`,
      exit.code,
      exit.signal
    );
    this.status = 'failed';
    this.snapshot = latest ? idleSnapshot(latest, now) : null;
    this.errorMessage = failure.message;
    this.lastExitCode = failure.exitCode;
    this.persist();
    this.record('error', 'transition', `${from} -> failed: ${failure.message}; last progress: ${formatProgress(this.snapshot)}`);

    const tail = worker.outputTail(FAILURE_TAIL_LINES);
    if (tail.length > 0) {
      this.record('error', 'engine', `Last output:\n${tail.join('\n')}`);
    }
    console.error(`[Task ${this.id}] Failed: ${failure.message}`);
  }

  private reportUnreadableProgress(error: ProgressParseError): void {
    if (this.deps.settings.debug) {
      console.debug(`[Task ${this.id}] ${error.message}: ${error.line}`);
    }
    // Once per run, the readout format does not change mid-download
    if (!this.parseErrorLogged) {
      this.parseErrorLogged = true;
      this.record('debug', 'progress', `Ignoring unreadable progress line: ${error.line}`);
    }
  }

  private persist(): void {
    this.deps.repository.save(this.toRecord());
  }

  private record(level: TaskLogLevel, kind: TaskLogKind, message: string): void {
    this.deps.history.append(this.id, { level, kind, message });
  }
}
