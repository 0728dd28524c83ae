import * as fs from 'fs';
import * as path from 'path';
import { EngineSpawnError } from '../utils/errors.js';

function isExecutableFile(candidate: string): boolean {
  try {
    const stats = fs.statSync(candidate);
    if (!stats.isFile()) return false;
    if (process.platform === 'win32') return true;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve the aria2c executable.
 * A value containing a path separator is taken as a file path; a bare name is searched in PATH.
 */
export function resolveEnginePath(enginePath: string, env: NodeJS.ProcessEnv = process.env): string {
  const trimmed = enginePath.trim();
  if (!trimmed) {
    throw new EngineSpawnError('No engine executable configured', enginePath);
  }

  if (trimmed.includes('/') || trimmed.includes('\\')) {
    const absolute = path.resolve(trimmed);
    if (isExecutableFile(absolute)) {
      return absolute;
    }
    throw new EngineSpawnError(`Engine executable not found or not executable: ${absolute}`, enginePath);
  }

  const extensions = process.platform === 'win32'
    ? ['', ...(env.PATHEXT || '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
    : [''];
  const dirs = (env.PATH || '').split(path.delimiter).filter(Boolean);

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, trimmed + ext);
      if (isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  throw new EngineSpawnError(`Engine executable "${trimmed}" not found in PATH`, enginePath);
}
