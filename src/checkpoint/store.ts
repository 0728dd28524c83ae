import * as fs from 'fs';
import * as path from 'path';
import type { TaskConfig } from '../types/task.js';

// aria2 keeps its resume metadata beside the output as "<output>.aria2"
export const CONTROL_FILE_SUFFIX = '.aria2';

export interface CheckpointInfo {
  outputPath: string;
  controlFilePath: string;
  hasControlFile: boolean;
  partialBytes: number;
}

type OutputLocation = Pick<TaskConfig, 'directory' | 'filename'>;

function fileSize(filePath: string): number | null {
  try {
    const stats = fs.statSync(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

/**
 * Location and inspection of the on-disk artifacts that let aria2c resume.
 * The control file is written by aria2c; this store only finds, reports and
 * (on explicit request) deletes it.
 */
export class CheckpointStore {
  outputPath(config: OutputLocation): string {
    return path.join(config.directory, config.filename);
  }

  controlFilePath(config: OutputLocation): string {
    return this.outputPath(config) + CONTROL_FILE_SUFFIX;
  }

  inspect(config: OutputLocation): CheckpointInfo {
    const outputPath = this.outputPath(config);
    const controlFilePath = this.controlFilePath(config);
    return {
      outputPath,
      controlFilePath,
      hasControlFile: fileSize(controlFilePath) !== null,
      partialBytes: fileSize(outputPath) ?? 0,
    };
  }

  /**
   * Make sure the output directory exists before aria2c runs.
   */
  prepare(config: OutputLocation): void {
    if (!fs.existsSync(config.directory)) {
      fs.mkdirSync(config.directory, { recursive: true });
      console.log(`[Checkpoint] Created directory: ${config.directory}`);
    }
  }

  /**
   * Delete the control file, and the output too when `includeOutput` is set.
   * Returns the paths that were removed.
   */
  discard(config: OutputLocation, includeOutput: boolean): string[] {
    const targets = [this.controlFilePath(config)];
    if (includeOutput) {
      targets.push(this.outputPath(config));
    }

    const removed: string[] = [];
    for (const target of targets) {
      if (!fs.existsSync(target)) continue;
      try {
        fs.unlinkSync(target);
        removed.push(target);
        console.log(`[Checkpoint] Deleted: ${target}`);
      } catch (error) {
        console.error(`[Checkpoint] Failed to delete ${target}:`, error);
      }
    }
    return removed;
  }
}
