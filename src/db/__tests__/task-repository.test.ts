import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { TaskConfig, TaskRecord } from '../../types/task.js';
import { openDatabase } from '../schema.js';
import { TaskRepository } from '../task-repository.js';

const config: TaskConfig = {
  url: 'https://example.com/file.bin',
  directory: '/downloads',
  filename: 'file.bin',
  split: 4,
  maxConnectionsPerServer: 16,
  maxTries: 5,
  retryWait: null,
  maxDownloadLimit: '1M',
  maxUploadLimit: null,
  fileAllocation: 'none',
  continueDownload: true,
  referer: null,
  userAgent: null,
  headers: ['X-Token: test-token'],
  extraArgs: [],
};

function makeRecord(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id: 'task-1',
    config,
    status: 'queued',
    snapshot: null,
    errorMessage: null,
    lastExitCode: null,
    createdAt: 1000,
    startedAt: null,
    completedAt: null,
    ...overrides,
  };
}

describe('TaskRepository', () => {
  let db: Database.Database;
  let repository: TaskRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repository = new TaskRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should round-trip a task record', () => {
    repository.save(makeRecord());

    expect(repository.findAll()).toEqual([makeRecord()]);
  });

  it('should update an existing row and keep byte counts', () => {
    repository.save(makeRecord());
    repository.save(makeRecord({
      status: 'paused',
      startedAt: 2000,
      snapshot: {
        downloadedBytes: 250,
        totalBytes: 1000,
        percent: 25,
        speedBytesPerSec: 100,
        etaSeconds: 8,
        connections: 2,
        updatedAt: 2500,
      },
    }));

    const [record] = repository.findAll();
    expect(record?.status).toBe('paused');
    expect(record?.startedAt).toBe(2000);
    expect(record?.snapshot).toMatchObject({
      downloadedBytes: 250,
      totalBytes: 1000,
      percent: 25,
      speedBytesPerSec: 0,
      etaSeconds: null,
      connections: 0,
    });
  });

  it('should list rows in creation order', () => {
    repository.save(makeRecord({ id: 'later', createdAt: 3000 }));
    repository.save(makeRecord({ id: 'earlier', createdAt: 1000 }));

    expect(repository.findAll().map((record) => record.id)).toEqual(['earlier', 'later']);
  });

  it('should skip rows it cannot read', () => {
    repository.save(makeRecord({ id: 'good' }));
    db.prepare(`
      INSERT INTO tasks (id, config, status, created_at, updated_at)
      VALUES ('bad-json', '{not json', 'queued', 2000, 2000),
             ('bad-status', ?, 'exploded', 3000, 3000)
    `).run(JSON.stringify(config));

    expect(repository.findAll().map((record) => record.id)).toEqual(['good']);
  });

  it('should delete a row', () => {
    repository.save(makeRecord());

    repository.delete('task-1');

    expect(repository.findAll()).toEqual([]);
  });
});
