import type { TaskAction, TaskStatus } from '../types/task.js';

export type TaskErrorCode =
  | 'ENGINE_SPAWN'
  | 'INVALID_TRANSITION'
  | 'UNKNOWN_TASK'
  | 'PROGRESS_PARSE'
  | 'WORKER_EXITED'
  | 'VALIDATION';

export class TaskManagerError extends Error {
  constructor(
    message: string,
    public readonly code: TaskErrorCode,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'TaskManagerError';
  }
}

/**
 * The aria2c executable could not be located or the OS refused to launch it.
 */
export class EngineSpawnError extends TaskManagerError {
  constructor(
    message: string,
    public readonly enginePath: string,
    originalError?: Error
  ) {
    super(message, 'ENGINE_SPAWN', originalError);
    this.name = 'EngineSpawnError';
  }
}

export class InvalidTransitionError extends TaskManagerError {
  constructor(
    public readonly taskId: string,
    public readonly command: TaskAction,
    public readonly status: TaskStatus,
    reason?: string
  ) {
    super(reason ?? `Cannot ${command} a task that is ${status}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class UnknownTaskError extends TaskManagerError {
  constructor(public readonly taskId: string) {
    super(`Unknown task: ${taskId}`, 'UNKNOWN_TASK');
    this.name = 'UnknownTaskError';
  }
}

/**
 * A readout line looked like aria2 progress but could not be read. Never fatal.
 */
export class ProgressParseError extends TaskManagerError {
  constructor(message: string, public readonly line: string) {
    super(message, 'PROGRESS_PARSE');
    this.name = 'ProgressParseError';
  }
}

export class WorkerExitedError extends TaskManagerError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null
  ) {
    super(message, 'WORKER_EXITED');
    this.name = 'WorkerExitedError';
  }
}

export class ValidationError extends TaskManagerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
