import type Database from 'better-sqlite3';
import type { TaskLogEntry, TaskLogKind, TaskLogLevel } from '../types/task.js';

export interface TaskLogInput {
  level: TaskLogLevel;
  kind: TaskLogKind;
  message: string;
}

interface TaskLogRow {
  task_id: string;
  seq: number;
  timestamp: number;
  level: TaskLogLevel;
  kind: TaskLogKind;
  message: string;
}

interface LastEntryRow {
  seq: number;
  timestamp: number;
}

function toEntry(row: TaskLogRow): TaskLogEntry {
  return Object.freeze({
    seq: row.seq,
    taskId: row.task_id,
    timestamp: row.timestamp,
    level: row.level,
    kind: row.kind,
    message: row.message,
  });
}

/**
 * Append-only history per task, kept in SQLite so it outlives the service process.
 * Timestamps are strictly increasing within one task's history.
 */
export class TaskLogger {
  private readonly lastByTask = new Map<string, LastEntryRow>();

  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => number = Date.now
  ) {}

  append(taskId: string, input: TaskLogInput): TaskLogEntry {
    const last = this.lastEntry(taskId);
    const now = this.clock();
    const row: TaskLogRow = {
      task_id: taskId,
      seq: last ? last.seq + 1 : 1,
      timestamp: last && now <= last.timestamp ? last.timestamp + 1 : now,
      level: input.level,
      kind: input.kind,
      message: input.message,
    };

    this.db.prepare(`
      INSERT INTO task_logs (task_id, seq, timestamp, level, kind, message)
      VALUES (@task_id, @seq, @timestamp, @level, @kind, @message)
    `).run(row);

    this.lastByTask.set(taskId, { seq: row.seq, timestamp: row.timestamp });
    return toEntry(row);
  }

  read(taskId: string): TaskLogEntry[] {
    const rows = this.db.prepare<[string], TaskLogRow>(`
      SELECT task_id, seq, timestamp, level, kind, message
      FROM task_logs
      WHERE task_id = ?
      ORDER BY seq ASC
    `).all(taskId);
    return rows.map(toEntry);
  }

  tail(taskId: string, count: number): TaskLogEntry[] {
    const rows = this.db.prepare<[string, number], TaskLogRow>(`
      SELECT task_id, seq, timestamp, level, kind, message
      FROM task_logs
      WHERE task_id = ?
      ORDER BY seq DESC
      LIMIT ?
    `).all(taskId, count);
    return rows.reverse().map(toEntry);
  }

  purge(taskId: string): void {
    this.db.prepare('DELETE FROM task_logs WHERE task_id = ?').run(taskId);
    this.lastByTask.delete(taskId);
  }

  private lastEntry(taskId: string): LastEntryRow | null {
    const cached = this.lastByTask.get(taskId);
    if (cached) return cached;

    const row = this.db.prepare<[string], LastEntryRow>(`
      SELECT seq, timestamp FROM task_logs
      WHERE task_id = ?
      ORDER BY seq DESC
      LIMIT 1
    `).get(taskId);
    return row ?? null;
  }
}
