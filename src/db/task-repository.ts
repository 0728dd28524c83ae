import type Database from 'better-sqlite3';
import { taskConfigSchema } from '../tasks/task-config.js';
import type { TaskRecord, TaskStatus } from '../types/task.js';

interface TaskRow {
  id: string;
  config: string;
  status: string;
  downloaded_bytes: number;
  total_bytes: number | null;
  error_message: string | null;
  last_exit_code: number | null;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  updated_at: number;
}

const TASK_STATUSES: readonly TaskStatus[] = ['queued', 'running', 'paused', 'stopped', 'completed', 'failed'];

function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

/**
 * Persisted task metadata. The in-memory Task stays authoritative while the
 * service runs; rows exist so tasks can be rebuilt after a restart.
 */
export class TaskRepository {
  constructor(private readonly db: Database.Database) {}

  save(record: TaskRecord): void {
    this.db.prepare(`
      INSERT INTO tasks (id, config, status, downloaded_bytes, total_bytes, error_message,
                         last_exit_code, created_at, started_at, completed_at, updated_at)
      VALUES (@id, @config, @status, @downloadedBytes, @totalBytes, @errorMessage,
              @lastExitCode, @createdAt, @startedAt, @completedAt, @updatedAt)
      ON CONFLICT(id) DO UPDATE SET
        config = excluded.config,
        status = excluded.status,
        downloaded_bytes = excluded.downloaded_bytes,
        total_bytes = excluded.total_bytes,
        error_message = excluded.error_message,
        last_exit_code = excluded.last_exit_code,
        started_at = excluded.started_at,
        completed_at = excluded.completed_at,
        updated_at = excluded.updated_at
    `).run({
      id: record.id,
      config: JSON.stringify(record.config),
      status: record.status,
      downloadedBytes: record.snapshot?.downloadedBytes ?? 0,
      totalBytes: record.snapshot?.totalBytes ?? null,
      errorMessage: record.errorMessage,
      lastExitCode: record.lastExitCode,
      createdAt: record.createdAt,
      startedAt: record.startedAt,
      completedAt: record.completedAt,
      updatedAt: Date.now(),
    });
  }

  findAll(): TaskRecord[] {
    const rows = this.db.prepare<[], TaskRow>(`
      SELECT id, config, status, downloaded_bytes, total_bytes, error_message, last_exit_code,
             created_at, started_at, completed_at, updated_at
      FROM tasks
      ORDER BY created_at ASC, rowid ASC
    `).all();

    const records: TaskRecord[] = [];
    for (const row of rows) {
      const record = this.mapRow(row);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  delete(id: string): void {
    this.db.prepare('DELETE FROM tasks WHERE id = ?').run(id);
  }

  private mapRow(row: TaskRow): TaskRecord | null {
    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(row.config);
    } catch (error) {
      console.error(`[DB] Task ${row.id} has unreadable config, skipping:`, error);
      return null;
    }

    const config = taskConfigSchema.safeParse(rawConfig);
    if (!config.success || !isTaskStatus(row.status)) {
      console.error(`[DB] Task ${row.id} has an invalid row, skipping`);
      return null;
    }

    const hasProgress = row.downloaded_bytes > 0 || row.total_bytes !== null;
    return {
      id: row.id,
      config: config.data,
      status: row.status,
      snapshot: hasProgress
        ? {
          downloadedBytes: row.downloaded_bytes,
          totalBytes: row.total_bytes,
          percent: row.total_bytes ? Math.min(100, Math.floor((row.downloaded_bytes / row.total_bytes) * 100)) : null,
          speedBytesPerSec: 0,
          etaSeconds: null,
          connections: 0,
          updatedAt: row.updated_at,
        }
        : null,
      errorMessage: row.error_message,
      lastExitCode: row.last_exit_code,
      createdAt: row.created_at,
      startedAt: row.started_at,
      completedAt: row.completed_at,
    };
  }
}
