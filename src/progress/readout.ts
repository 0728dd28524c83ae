import { ProgressParseError } from '../utils/errors.js';

export interface ProgressReading {
  gid: string;
  completedBytes: number;
  totalBytes: number | null;
  percent: number | null;
  connections: number;
  speedBytesPerSec: number;
  etaSeconds: number | null;
}

// [#2089b0 400KiB/1.0MiB(39%) CN:1 DL:115KiB ETA:5s]
// [#2089b0 0B/0B CN:1 DL:0B]
const SIZE = '[\\d.]+(?:[KMGT]i?)?B';
const READOUT_RE = new RegExp(
  `\\[#([0-9a-f]+)\\s+(${SIZE})\\/(${SIZE})(?:\\((\\d{1,3})%\\))?` +
  `\\s+CN:(\\d+)(?:\\s+SD:\\d+)?(?:\\s+DL:(${SIZE}))?(?:\\s+UL:[^\\s\\]]+)?(?:\\s+ETA:([\\dhms]+))?\\]`,
  'i'
);

const UNIT_POWERS: Record<string, number> = { '': 0, K: 1, M: 2, G: 3, T: 4 };

/**
 * True for lines that carry an aria2 console readout (even a truncated one).
 */
export function isReadoutLine(line: string): boolean {
  return line.includes('[#');
}

/**
 * Parse "1.5MiB", "300KiB", "12B" to bytes (aria2 uses binary units).
 */
export function parseSize(sizeStr: string): number | null {
  const match = sizeStr.trim().match(/^([\d.]+)\s*([KMGT]?)(?:i?B)?$/i);
  if (!match) return null;

  const value = parseFloat(match[1]);
  if (Number.isNaN(value)) return null;

  const power = UNIT_POWERS[match[2].toUpperCase()] ?? 0;
  return Math.round(value * Math.pow(1024, power));
}

/**
 * Parse an aria2 ETA like "1h2m3s", "45s" or "2m" to seconds.
 */
export function parseEta(etaStr: string): number | null {
  const match = etaStr.trim().match(/^(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/);
  if (!match || !match.slice(1).some((part) => part !== undefined)) return null;

  const [days, hours, minutes, seconds] = match.slice(1).map((part) => (part ? parseInt(part, 10) : 0));
  return ((days * 24 + hours) * 60 + minutes) * 60 + seconds;
}

/**
 * Parse one readout line. Throws ProgressParseError when the line looks like a
 * readout but does not follow the expected layout.
 */
export function parseReadout(line: string): ProgressReading {
  const match = line.match(READOUT_RE);
  if (!match) {
    throw new ProgressParseError('Unrecognised progress readout', line);
  }

  const completedBytes = parseSize(match[2]);
  const totalBytes = parseSize(match[3]);
  if (completedBytes === null || totalBytes === null) {
    throw new ProgressParseError('Unreadable size in progress readout', line);
  }

  const speed = match[6] ? parseSize(match[6]) : 0;

  return {
    gid: match[1],
    completedBytes,
    totalBytes: totalBytes > 0 ? totalBytes : null,
    percent: match[4] !== undefined ? parseInt(match[4], 10) : null,
    connections: parseInt(match[5], 10),
    speedBytesPerSec: speed ?? 0,
    etaSeconds: match[7] ? parseEta(match[7]) : null,
  };
}
