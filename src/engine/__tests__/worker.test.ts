import { describe, expect, it } from 'vitest';
import { createFakeSpawn, flush } from '../../tasks/__tests__/helpers.js';
import { FakeEngineProcess } from '../../tasks/__tests__/helpers.js';
import { EngineSpawnError } from '../../utils/errors.js';
import { WorkerProcess } from '../worker.js';

async function launchFake() {
  const fake = createFakeSpawn();
  const worker = await WorkerProcess.launch({
    enginePath: '/usr/bin/aria2c',
    args: ['--split=4', 'http://x/file.bin'],
    cwd: '/downloads',
    spawn: fake.spawn,
  });
  return { worker, child: fake.latest() };
}

describe('WorkerProcess', () => {
  describe('launch', () => {
    it('should spawn the engine with piped output and the given arguments', async () => {
      const { worker, child } = await launchFake();

      expect(worker.pid).toBe(4000);
      expect(child.command).toBe('/usr/bin/aria2c');
      expect(child.args).toEqual(['--split=4', 'http://x/file.bin']);
      expect(child.options.cwd).toBe('/downloads');
      expect(child.options.stdio).toEqual(['ignore', 'pipe', 'pipe']);
    });

    it('should reject with EngineSpawnError when the process emits an error', async () => {
      const launching = WorkerProcess.launch({
        enginePath: '/opt/aria2c',
        args: [],
        spawn: (command, args, options) => {
          const child = new FakeEngineProcess(1, command, args, options);
          process.nextTick(() => child.emit('error', new Error('spawn /opt/aria2c ENOENT')));
          return child;
        },
      });

      await expect(launching).rejects.toBeInstanceOf(EngineSpawnError);
      await expect(launching).rejects.toThrow('Failed to launch /opt/aria2c: spawn /opt/aria2c ENOENT');
    });

    it('should reject with EngineSpawnError when spawn throws', async () => {
      const launching = WorkerProcess.launch({
        enginePath: '/opt/aria2c',
        args: [],
        spawn: () => {
          throw new Error('EACCES');
        },
      });

      await expect(launching).rejects.toThrow('Failed to launch /opt/aria2c: EACCES');
    });
  });

  describe('output', () => {
    it('should split output on newlines and carriage returns', async () => {
      const { worker, child } = await launchFake();

      child.stdout.write('first\npart');
      child.stdout.write('ial\r[#1 0B/0B CN:1 DL:0B]\r\n');
      child.stderr.write('warning line\n');
      await flush();

      expect(worker.outputTail()).toEqual(['first', 'partial', '[#1 0B/0B CN:1 DL:0B]', 'warning line']);
    });

    it('should flush a trailing line without newline when the stream ends', async () => {
      const { worker, child } = await launchFake();

      child.stdout.end('last words');
      await flush();

      expect(worker.outputTail()).toEqual(['last words']);
    });

    it('should replay the tail to a new listener and then stream', async () => {
      const { worker, child } = await launchFake();
      child.emitLine('one');
      await flush();

      const seen: string[] = [];
      const unsubscribe = worker.onOutput((line) => seen.push(line));
      child.emitLine('two');
      await flush();
      unsubscribe();
      child.emitLine('three');
      await flush();

      expect(seen).toEqual(['one', 'two']);
    });

    it('should keep only the most recent lines', async () => {
      const { worker, child } = await launchFake();
      for (let i = 1; i <= 60; i++) {
        child.emitLine(`line ${i}`);
      }
      await flush();

      const tail = worker.outputTail(100);
      expect(tail).toHaveLength(50);
      expect(tail[0]).toBe('line 11');
      expect(worker.outputTail(2)).toEqual(['line 59', 'line 60']);
    });
  });

  describe('poll', () => {
    it('should report alive, then the exit status', async () => {
      const { worker, child } = await launchFake();
      expect(worker.poll()).toEqual({ state: 'alive' });

      child.exit(0);
      expect(worker.poll()).toEqual({ state: 'exited-ok' });
    });

    it('should report an error exit with code and signal', async () => {
      const { worker, child } = await launchFake();

      child.exit(null, 'SIGKILL');
      expect(worker.poll()).toEqual({ state: 'exited-error', code: null, signal: 'SIGKILL' });
    });
  });

  describe('terminate', () => {
    it('should stop a cooperative process with SIGTERM', async () => {
      const { worker, child } = await launchFake();

      await expect(worker.terminate(50)).resolves.toBe('graceful');
      expect(child.signals).toEqual(['SIGTERM']);
    });

    it('should escalate to SIGKILL after the grace period', async () => {
      const { worker, child } = await launchFake();
      child.honourSigterm = false;

      await expect(worker.terminate(20)).resolves.toBe('forced');
      expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
    });

    it('should give up on a process that ignores SIGKILL', async () => {
      const { worker, child } = await launchFake();
      child.ignoreSignals = true;

      await expect(worker.terminate(20)).resolves.toBe('unresponsive');
      expect(worker.poll()).toEqual({ state: 'alive' });
    });

    it('should do nothing for a process that already exited', async () => {
      const { worker, child } = await launchFake();
      child.exit(7);

      await expect(worker.terminate(20)).resolves.toBe('already-exited');
      expect(child.signals).toEqual([]);
    });
  });
});
