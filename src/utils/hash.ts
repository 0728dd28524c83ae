import * as crypto from 'crypto';

/**
 * Generate a unique task id from the download URL.
 * Uses url + timestamp + random so the same URL can be queued twice.
 */
export function generateTaskId(url: string): string {
  const data = `${url}:${Date.now()}:${Math.random()}`;
  return crypto.createHash('sha1').update(data).digest('hex').substring(0, 16);
}
