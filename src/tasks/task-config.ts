import * as path from 'path';
import { z } from 'zod';
import type { Config } from '../config.js';
import type { TaskConfig } from '../types/task.js';
import { ValidationError } from '../utils/errors.js';

const SUPPORTED_PROTOCOLS = ['http:', 'https:', 'ftp:', 'sftp:'];

function protocolOf(value: string): string {
  try {
    return new URL(value).protocol;
  } catch {
    return '';
  }
}

// aria2 speed values: plain bytes or a K/M suffix
const speedLimit = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?[KkMm]?$/, 'must be a number of bytes with an optional K or M suffix');

const header = z
  .string()
  .trim()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+:\s?.*$/, 'must look like "Name: value"');

// Set by the service, or able to run commands, read other inputs or detach the process
const RESERVED_OPTIONS = [
  '--dir',
  '--out',
  '--input-file',
  '--conf-path',
  '--save-session',
  '--log',
  '--daemon',
  '--enable-rpc',
  '--on-',
];

function optionName(arg: string): string {
  const eq = arg.indexOf('=');
  return eq === -1 ? arg : arg.slice(0, eq);
}

/**
 * aria2c accepts unambiguous abbreviations of long options, so a name that is
 * a prefix of a reserved option is rejected as well.
 */
export function isReservedOption(arg: string): boolean {
  const name = optionName(arg);
  return RESERVED_OPTIONS.some((reserved) =>
    reserved.endsWith('-') ? name.startsWith(reserved) || reserved.startsWith(name) : reserved.startsWith(name)
  );
}

const extraArg = z
  .string()
  .trim()
  .regex(/^--[a-z0-9][a-z0-9-]*(=.*)?$/, 'must be a long option such as "--name=value"')
  .refine((value) => !isReservedOption(value), (value) => ({
    message: `${optionName(value)} cannot be set per task`,
  }));

export const taskConfigInputSchema = z.object({
  url: z
    .string()
    .trim()
    .url('must be a valid URL')
    .refine((value) => SUPPORTED_PROTOCOLS.includes(protocolOf(value)), {
      message: `protocol must be one of ${SUPPORTED_PROTOCOLS.join(', ')}`,
    }),
  directory: z.string().trim().min(1).optional(),
  filename: z
    .string()
    .trim()
    .min(1)
    .refine((value) => path.basename(value) === value && value !== '.' && value !== '..', {
      message: 'must be a plain file name',
    })
    .optional(),
  split: z.number().int().min(1).max(16).optional(),
  maxConnectionsPerServer: z.number().int().min(1).max(16).optional(),
  maxTries: z.number().int().min(0).optional(),
  retryWait: z.number().int().min(0).max(600).nullable().optional(),
  maxDownloadLimit: speedLimit.nullable().optional(),
  maxUploadLimit: speedLimit.nullable().optional(),
  fileAllocation: z.enum(['none', 'prealloc', 'trunc', 'falloc']).optional(),
  continueDownload: z.boolean().optional(),
  referer: z.string().trim().min(1).nullable().optional(),
  userAgent: z.string().trim().min(1).nullable().optional(),
  headers: z.array(header).optional(),
  extraArgs: z.array(extraArg).optional(),
});

export type TaskConfigInput = z.input<typeof taskConfigInputSchema>;

export const taskConfigPatchSchema = taskConfigInputSchema.partial();

export type TaskConfigPatch = z.input<typeof taskConfigPatchSchema>;

// Shape of a fully resolved config, used to read persisted rows back
export const taskConfigSchema = z.object({
  url: z.string(),
  directory: z.string(),
  filename: z.string(),
  split: z.number().int(),
  maxConnectionsPerServer: z.number().int(),
  maxTries: z.number().int(),
  retryWait: z.number().int().nullable(),
  maxDownloadLimit: z.string().nullable(),
  maxUploadLimit: z.string().nullable(),
  fileAllocation: z.enum(['none', 'prealloc', 'trunc', 'falloc']),
  continueDownload: z.boolean(),
  referer: z.string().nullable(),
  userAgent: z.string().nullable(),
  headers: z.array(z.string()),
  extraArgs: z.array(z.string()),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
}

/**
 * Derive the output file name from the URL path, falling back to a timestamped name.
 */
export function deriveFilename(url: string, now: number = Date.now()): string {
  try {
    const urlObj = new URL(url);
    const name = decodeURIComponent(urlObj.pathname.split('/').pop() || '');
    if (name && name !== '.' && name !== '..' && !name.includes('/') && !name.includes('\\')) {
      return name;
    }
  } catch {
    // Malformed escapes fall through to the generated name
  }
  return `download_${now}`;
}

/**
 * Validate caller input and fill in service defaults.
 */
export function resolveTaskConfig(input: unknown, config: Config): TaskConfig {
  const parsed = taskConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`Invalid task configuration: ${issues.join('; ')}`, issues);
  }

  const value = parsed.data;
  return {
    url: value.url,
    directory: path.resolve(value.directory ?? config.downloadPath),
    filename: value.filename ?? deriveFilename(value.url),
    split: value.split ?? config.defaults.split,
    maxConnectionsPerServer: value.maxConnectionsPerServer ?? config.defaults.maxConnectionsPerServer,
    maxTries: value.maxTries ?? config.defaults.maxTries,
    retryWait: value.retryWait ?? null,
    maxDownloadLimit: value.maxDownloadLimit ?? null,
    maxUploadLimit: value.maxUploadLimit ?? null,
    fileAllocation: value.fileAllocation ?? 'none',
    continueDownload: value.continueDownload ?? true,
    referer: value.referer ?? null,
    userAgent: value.userAgent ?? null,
    headers: value.headers ?? [],
    extraArgs: value.extraArgs ?? [],
  };
}

/**
 * Apply a partial edit to an existing config. Omitted fields keep their value;
 * a changed URL without an explicit filename keeps the current filename.
 */
export function applyTaskConfigPatch(current: TaskConfig, patch: unknown): TaskConfig {
  const parsed = taskConfigPatchSchema.safeParse(patch);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`Invalid task configuration: ${issues.join('; ')}`, issues);
  }

  const value = parsed.data;
  return {
    url: value.url ?? current.url,
    directory: value.directory !== undefined ? path.resolve(value.directory) : current.directory,
    filename: value.filename ?? current.filename,
    split: value.split ?? current.split,
    maxConnectionsPerServer: value.maxConnectionsPerServer ?? current.maxConnectionsPerServer,
    maxTries: value.maxTries ?? current.maxTries,
    retryWait: value.retryWait !== undefined ? value.retryWait : current.retryWait,
    maxDownloadLimit: value.maxDownloadLimit !== undefined ? value.maxDownloadLimit : current.maxDownloadLimit,
    maxUploadLimit: value.maxUploadLimit !== undefined ? value.maxUploadLimit : current.maxUploadLimit,
    fileAllocation: value.fileAllocation ?? current.fileAllocation,
    continueDownload: value.continueDownload ?? current.continueDownload,
    referer: value.referer !== undefined ? value.referer : current.referer,
    userAgent: value.userAgent !== undefined ? value.userAgent : current.userAgent,
    headers: value.headers ?? current.headers,
    extraArgs: value.extraArgs ?? current.extraArgs,
  };
}
