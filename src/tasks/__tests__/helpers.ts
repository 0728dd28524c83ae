// Test utilities: an in-process stand-in for aria2c and a manager wired to it

import type { SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import type { Config } from '../../config.js';
import { openDatabase } from '../../db/schema.js';
import type { EngineProcess, SpawnEngine } from '../../engine/worker.js';
import { TaskManager } from '../task-manager.js';

export class FakeEngineProcess extends EventEmitter implements EngineProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  exited = false;
  // false: SIGTERM is ignored, SIGKILL still ends the process
  honourSigterm = true;
  // true: every signal is ignored
  ignoreSignals = false;

  constructor(
    readonly pid: number,
    readonly command: string,
    readonly args: string[],
    readonly options: SpawnOptions
  ) {
    super();
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (this.exited) return false;
    if (this.ignoreSignals) return true;
    if (signal === 'SIGTERM' && !this.honourSigterm) return true;

    const received: NodeJS.Signals = typeof signal === 'string' ? signal : 'SIGTERM';
    setImmediate(() => this.exit(null, received));
    return true;
  }

  emitLine(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  emitErrorLine(line: string): void {
    this.stderr.write(`${line}\n`);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.emit('exit', code, signal);
  }
}

export interface FakeSpawn {
  spawn: SpawnEngine;
  processes: FakeEngineProcess[];
  latest(): FakeEngineProcess;
}

export function createFakeSpawn(): FakeSpawn {
  const processes: FakeEngineProcess[] = [];
  let nextPid = 4000;

  const spawn: SpawnEngine = (command, args, options) => {
    const child = new FakeEngineProcess(nextPid++, command, [...args], options);
    processes.push(child);
    process.nextTick(() => child.emit('spawn'));
    return child;
  };

  return {
    spawn,
    processes,
    latest() {
      const child = processes[processes.length - 1];
      if (!child) {
        throw new Error('No engine process has been spawned');
      }
      return child;
    },
  };
}

/**
 * Let pending stream data and timers scheduled with setImmediate run.
 */
export async function flush(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
  await new Promise<void>((resolve) => setImmediate(resolve));
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'aria2-tasks-'));
}

export function makeConfig(downloadPath: string, overrides: Partial<Config> = {}): Config {
  return {
    port: 0,
    host: '127.0.0.1',
    dataPath: ':memory:',
    downloadPath,
    enginePath: '/usr/bin/aria2c',
    monitorIntervalMs: 1000,
    terminateGraceMs: 50,
    progressLogIntervalMs: 30000,
    stopDiscardsCheckpoint: false,
    debug: false,
    defaults: {
      split: 4,
      maxConnectionsPerServer: 16,
      maxTries: 5,
    },
    ...overrides,
  };
}

export interface TestContext {
  manager: TaskManager;
  fake: FakeSpawn;
  config: Config;
  downloadDir: string;
  clock: { now: number };
  cleanup(): void;
}

/**
 * A TaskManager on an in-memory database, a temp download directory and the fake engine.
 */
export function createTestManager(overrides: Partial<Config> = {}): TestContext {
  const downloadDir = makeTempDir();
  const config = makeConfig(downloadDir, overrides);
  const db = openDatabase(':memory:');
  const fake = createFakeSpawn();
  const clock = { now: 1_700_000_000_000 };

  const manager = new TaskManager({
    db,
    config,
    spawn: fake.spawn,
    locateEngine: (enginePath) => enginePath,
    clock: () => clock.now,
  });

  return {
    manager,
    fake,
    config,
    downloadDir,
    clock,
    cleanup() {
      manager.stopMonitor();
      db.close();
      fs.rmSync(downloadDir, { recursive: true, force: true });
    },
  };
}
