export type TaskStatus =
  | 'queued'     // Added, never started
  | 'running'    // aria2c process alive
  | 'paused'     // Process terminated, checkpoint kept for resume
  | 'stopped'    // Abandoned by the user (can still be restarted)
  | 'completed'  // aria2c exited 0
  | 'failed';    // Spawn error or non-zero exit

export type TaskCommand = 'start' | 'pause' | 'resume' | 'stop' | 'remove';

// Anything that can be refused for the task's current status
export type TaskAction = TaskCommand | 'update';

export type FileAllocation = 'none' | 'prealloc' | 'trunc' | 'falloc';

export interface TaskConfig {
  url: string;
  directory: string;
  filename: string;
  split: number;
  maxConnectionsPerServer: number;
  maxTries: number;
  retryWait: number | null;        // seconds
  maxDownloadLimit: string | null; // aria2 speed, e.g. "500K", "2M"
  maxUploadLimit: string | null;
  fileAllocation: FileAllocation;
  continueDownload: boolean;
  referer: string | null;
  userAgent: string | null;
  headers: string[];               // "Name: value"
  extraArgs: string[];
}

export interface ProgressSnapshot {
  downloadedBytes: number;
  totalBytes: number | null;
  percent: number | null;          // 0-100
  speedBytesPerSec: number;
  etaSeconds: number | null;
  connections: number;
  updatedAt: number;               // epoch ms
}

export type TaskLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TaskLogKind = 'transition' | 'progress' | 'error' | 'engine' | 'note';

export interface TaskLogEntry {
  seq: number;
  taskId: string;
  timestamp: number;
  level: TaskLogLevel;
  kind: TaskLogKind;
  message: string;
}

export interface TaskRecord {
  id: string;
  config: TaskConfig;
  status: TaskStatus;
  snapshot: ProgressSnapshot | null;
  errorMessage: string | null;
  lastExitCode: number | null;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
}

export interface TaskSummary extends TaskRecord {
  outputPath: string;
  pid: number | null;
}
