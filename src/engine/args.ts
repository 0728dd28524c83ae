import type { TaskConfig } from '../types/task.js';

export interface EngineArgsOptions {
  // Force --continue=true regardless of the task setting (resume from checkpoint)
  resume: boolean;
}

/**
 * Build the aria2c argument list for one task.
 * Output location is always explicit (-d/-o) so the control file path is predictable.
 */
export function buildEngineArgs(config: TaskConfig, options: EngineArgsOptions): string[] {
  const args: string[] = [];

  if (options.resume || config.continueDownload) {
    args.push('--continue=true');
  }

  args.push(
    `--file-allocation=${config.fileAllocation}`,
    `--split=${config.split}`,
    `--max-connection-per-server=${config.maxConnectionsPerServer}`,
    `--max-tries=${config.maxTries}`,
  );

  if (config.retryWait !== null) {
    args.push(`--retry-wait=${config.retryWait}`);
  }
  if (config.maxDownloadLimit) {
    args.push(`--max-download-limit=${config.maxDownloadLimit}`);
  }
  if (config.maxUploadLimit) {
    args.push(`--max-upload-limit=${config.maxUploadLimit}`);
  }
  if (config.referer) {
    args.push(`--referer=${config.referer}`);
  }
  if (config.userAgent) {
    args.push(`--user-agent=${config.userAgent}`);
  }
  for (const header of config.headers) {
    const trimmed = header.trim();
    if (trimmed) {
      args.push(`--header=${trimmed}`);
    }
  }

  // Caller options first; the service-owned ones below take precedence
  args.push(...config.extraArgs);

  args.push(
    '--allow-overwrite=true',
    '--auto-file-renaming=false',
    // One readout per second on stdout, quiet otherwise
    '--summary-interval=1',
    '--console-log-level=warn',
    '-d', config.directory,
    '-o', config.filename,
  );

  args.push(config.url);

  return args;
}

/**
 * Render an argument list for the task log. Arguments with spaces are quoted.
 */
export function formatCommandLine(enginePath: string, args: string[]): string {
  return [enginePath, ...args]
    .map((arg) => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg))
    .join(' ');
}
