import { spawn as nodeSpawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import { EngineSpawnError } from '../utils/errors.js';

/**
 * The slice of ChildProcess the worker relies on. Tests provide an in-process stand-in.
 */
export interface EngineProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnEngine = (command: string, args: string[], options: SpawnOptions) => EngineProcess;

export type WorkerPollResult =
  | { state: 'alive' }
  | { state: 'exited-ok' }
  | { state: 'exited-error'; code: number | null; signal: NodeJS.Signals | null };

export type TerminateOutcome = 'already-exited' | 'graceful' | 'forced' | 'unresponsive';

export type OutputListener = (line: string) => void;

export interface LaunchOptions {
  enginePath: string;
  args: string[];
  cwd?: string;
  spawn?: SpawnEngine;
}

const OUTPUT_TAIL_LINES = 50;

const defaultSpawn: SpawnEngine = (command, args, options) => nodeSpawn(command, args, options);

/**
 * Handle on one running aria2c process.
 */
export class WorkerProcess {
  private exitStatus: { code: number | null; signal: NodeJS.Signals | null } | null = null;
  private readonly tail: string[] = [];
  private readonly listeners = new Set<OutputListener>();

  private constructor(private readonly child: EngineProcess) {
    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.exitStatus = { code, signal };
      console.log(`[Worker] pid ${this.pid ?? '?'} exited (code=${code}, signal=${signal})`);
    });

    child.on('error', (error: Error) => {
      // Post-spawn errors (e.g. a failed kill) do not change the exit status
      console.error(`[Worker] pid ${this.pid ?? '?'} process error: ${error.message}`);
      this.pushLine(`process error: ${error.message}`);
    });

    this.attachStream(child.stdout);
    this.attachStream(child.stderr);
  }

  /**
   * Spawn aria2c and resolve once the OS has started it.
   */
  static launch(options: LaunchOptions): Promise<WorkerProcess> {
    const spawn = options.spawn ?? defaultSpawn;

    return new Promise<WorkerProcess>((resolve, reject) => {
      let child: EngineProcess;
      try {
        child = spawn(options.enginePath, options.args, {
          cwd: options.cwd,
          env: { ...process.env, LANG: 'en_US.UTF-8', LC_ALL: 'en_US.UTF-8' },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        reject(new EngineSpawnError(`Failed to launch ${options.enginePath}: ${cause.message}`, options.enginePath, cause));
        return;
      }

      const onSpawn = () => {
        child.off('error', onError);
        resolve(new WorkerProcess(child));
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(new EngineSpawnError(`Failed to launch ${options.enginePath}: ${error.message}`, options.enginePath, error));
      };

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  /**
   * Non-blocking liveness check.
   */
  poll(): WorkerPollResult {
    if (!this.exitStatus) {
      return { state: 'alive' };
    }
    if (this.exitStatus.code === 0) {
      return { state: 'exited-ok' };
    }
    return { state: 'exited-error', code: this.exitStatus.code, signal: this.exitStatus.signal };
  }

  /**
   * SIGTERM, then SIGKILL after `graceMs`. Files on disk are left untouched.
   */
  async terminate(graceMs: number): Promise<TerminateOutcome> {
    if (this.exitStatus) {
      return 'already-exited';
    }

    this.child.kill('SIGTERM');
    if (await this.waitForExit(graceMs)) {
      return 'graceful';
    }

    console.warn(`[Worker] pid ${this.pid ?? '?'} ignored SIGTERM for ${graceMs}ms, sending SIGKILL`);
    this.child.kill('SIGKILL');
    if (await this.waitForExit(graceMs)) {
      return 'forced';
    }

    console.error(`[Worker] pid ${this.pid ?? '?'} still alive after SIGKILL`);
    return 'unresponsive';
  }

  /**
   * Subscribe to output lines. Lines already seen are replayed from the tail first.
   */
  onOutput(listener: OutputListener): () => void {
    for (const line of this.tail) {
      listener(line);
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  outputTail(lines: number = OUTPUT_TAIL_LINES): string[] {
    return this.tail.slice(-lines);
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      if (this.exitStatus) {
        resolve(true);
        return;
      }
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.child.off('exit', onExit);
        resolve(false);
      }, timeoutMs);
      this.child.once('exit', onExit);
    });
  }

  private attachStream(stream: Readable | null): void {
    if (!stream) return;

    let pending = '';
    stream.setEncoding('utf-8');
    stream.on('data', (chunk: string) => {
      const parts = (pending + chunk).split(/\r\n|\r|\n/);
      pending = parts.pop() ?? '';
      for (const part of parts) {
        this.pushLine(part);
      }
    });
    stream.on('end', () => {
      if (pending) {
        this.pushLine(pending);
        pending = '';
      }
    });
  }

  private pushLine(raw: string): void {
    const line = raw.trimEnd();
    if (!line) return;

    this.tail.push(line);
    if (this.tail.length > OUTPUT_TAIL_LINES) {
      this.tail.shift();
    }
    for (const listener of this.listeners) {
      listener(line);
    }
  }
}
