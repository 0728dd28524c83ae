import type { ProgressSnapshot } from '../types/task.js';

export const formatBytes = (bytes: number) => {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
};

export const formatDuration = (seconds: number | null): string => {
  if (seconds === null || !isFinite(seconds) || seconds < 0) return '--';

  if (seconds < 60) {
    return `${Math.round(seconds)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m ${Math.round(seconds % 60)}s`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
};

/**
 * One-line progress description for task log entries.
 */
export function formatProgress(snapshot: ProgressSnapshot | null): string {
  if (!snapshot) return 'no progress reported';

  const done = formatBytes(snapshot.downloadedBytes);
  if (snapshot.totalBytes === null) {
    return `${done} downloaded`;
  }
  const percent = snapshot.percent !== null ? ` (${snapshot.percent}%)` : '';
  return `${done} of ${formatBytes(snapshot.totalBytes)}${percent}`;
}

export function formatRate(snapshot: ProgressSnapshot): string {
  return `${formatBytes(snapshot.speedBytesPerSec)}/s, ETA ${formatDuration(snapshot.etaSeconds)}`;
}
