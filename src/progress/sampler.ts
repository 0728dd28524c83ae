import type { WorkerProcess } from '../engine/worker.js';
import type { ProgressSnapshot } from '../types/task.js';
import { ProgressParseError } from '../utils/errors.js';
import { isReadoutLine, parseReadout } from './readout.js';
import type { ProgressReading } from './readout.js';

export interface SampleResult {
  // null means no progress has been reported yet
  snapshot: ProgressSnapshot | null;
  error?: ProgressParseError;
}

function percentOf(downloaded: number, total: number | null): number | null {
  if (!total) return null;
  return Math.min(100, Math.floor((downloaded / total) * 100));
}

/**
 * Snapshot kept while no process runs: bytes retained, nothing in flight.
 */
export function idleSnapshot(snapshot: ProgressSnapshot, now: number = Date.now()): ProgressSnapshot {
  return { ...snapshot, speedBytesPerSec: 0, etaSeconds: null, connections: 0, updatedAt: now };
}

/**
 * Final snapshot after a successful exit: the byte count is filled to the known total.
 */
export function completedSnapshot(snapshot: ProgressSnapshot | null, now: number = Date.now()): ProgressSnapshot {
  const total = snapshot?.totalBytes ?? null;
  const downloaded = total ?? snapshot?.downloadedBytes ?? 0;
  return {
    downloadedBytes: downloaded,
    totalBytes: total ?? (downloaded > 0 ? downloaded : null),
    percent: 100,
    speedBytesPerSec: 0,
    etaSeconds: 0,
    connections: 0,
    updatedAt: now,
  };
}

/**
 * Best-effort progress for one run of the engine.
 *
 * Output lines are remembered as they arrive; `sample()` turns the newest readout
 * into a snapshot. Downloaded bytes never go backwards within a run, and a run
 * seeded with a baseline (resume) never reports less than that baseline.
 */
export class ProgressSampler {
  private latestReadout: string | null = null;
  private snapshot: ProgressSnapshot | null;
  private unsubscribe: (() => void) | null = null;

  constructor(baseline: ProgressSnapshot | null = null) {
    this.snapshot = baseline ? idleSnapshot(baseline, baseline.updatedAt) : null;
  }

  attach(worker: WorkerProcess): void {
    this.detach();
    this.unsubscribe = worker.onOutput((line) => this.observe(line));
  }

  detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  observe(line: string): void {
    if (isReadoutLine(line)) {
      this.latestReadout = line;
    }
  }

  current(): ProgressSnapshot | null {
    return this.snapshot;
  }

  sample(now: number = Date.now()): SampleResult {
    const line = this.latestReadout;
    this.latestReadout = null;
    if (line === null) {
      return { snapshot: this.snapshot };
    }

    let reading: ProgressReading;
    try {
      reading = parseReadout(line);
    } catch (error) {
      if (error instanceof ProgressParseError) {
        return { snapshot: this.snapshot, error };
      }
      throw error;
    }

    const previous = this.snapshot;
    const downloadedBytes = Math.max(reading.completedBytes, previous?.downloadedBytes ?? 0);
    const totalBytes = reading.totalBytes ?? previous?.totalBytes ?? null;

    this.snapshot = {
      downloadedBytes,
      totalBytes,
      percent: percentOf(downloadedBytes, totalBytes),
      speedBytesPerSec: reading.speedBytesPerSec,
      etaSeconds: reading.etaSeconds,
      connections: reading.connections,
      updatedAt: now,
    };
    return { snapshot: this.snapshot };
  }
}
