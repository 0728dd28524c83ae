import * as fs from 'fs';
import { z } from 'zod';

const EXIT_CODES_FILE = new URL('../../data/aria2-exit-codes.json', import.meta.url);

let descriptions: Record<string, string> | null = null;

function loadDescriptions(): Record<string, string> {
  if (!descriptions) {
    try {
      const raw = JSON.parse(fs.readFileSync(EXIT_CODES_FILE, 'utf-8'));
      descriptions = z.record(z.string()).parse(raw);
    } catch (error) {
      console.error('[Engine] Could not load exit code descriptions:', error);
      descriptions = {};
    }
  }
  return descriptions;
}

/**
 * Describe an aria2c exit status for the task log.
 */
export function describeExitStatus(code: number | null, signal: NodeJS.Signals | null = null): string {
  if (code === null) {
    return signal ? `terminated by signal ${signal}` : 'exited without a status';
  }
  const description = loadDescriptions()[String(code)];
  return description ? `exit code ${code} (${description})` : `exit code ${code}`;
}
