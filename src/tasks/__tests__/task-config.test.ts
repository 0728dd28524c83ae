import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../utils/errors.js';
import { applyTaskConfigPatch, deriveFilename, isReservedOption, resolveTaskConfig } from '../task-config.js';
import { makeConfig } from './helpers.js';

const serviceConfig = makeConfig('/srv/downloads');

describe('deriveFilename', () => {
  it('should use the decoded last path segment', () => {
    expect(deriveFilename('https://example.com/a/My%20File.iso?token=1')).toBe('My File.iso');
  });

  it('should generate a name when the URL has no file part', () => {
    expect(deriveFilename('https://example.com/', 42)).toBe('download_42');
    expect(deriveFilename('https://example.com/%E0%A4%A', 42)).toBe('download_42');
  });
});

describe('resolveTaskConfig', () => {
  it('should fill service defaults', () => {
    expect(resolveTaskConfig({ url: 'https://example.com/file.bin' }, serviceConfig)).toEqual({
      url: 'https://example.com/file.bin',
      directory: path.resolve('/srv/downloads'),
      filename: 'file.bin',
      split: 4,
      maxConnectionsPerServer: 16,
      maxTries: 5,
      retryWait: null,
      maxDownloadLimit: null,
      maxUploadLimit: null,
      fileAllocation: 'none',
      continueDownload: true,
      referer: null,
      userAgent: null,
      headers: [],
      extraArgs: [],
    });
  });

  it('should keep explicit values', () => {
    const config = resolveTaskConfig({
      url: 'ftp://mirror.example.org/pub/image.iso',
      directory: '/data/isos',
      filename: 'custom.iso',
      split: 16,
      maxDownloadLimit: '750K',
      headers: ['Authorization: Bearer test-token'],
    }, serviceConfig);

    expect(config.directory).toBe(path.resolve('/data/isos'));
    expect(config.filename).toBe('custom.iso');
    expect(config.split).toBe(16);
    expect(config.maxDownloadLimit).toBe('750K');
    expect(config.headers).toEqual(['Authorization: Bearer test-token']);
  });

  it('should list every problem in the error', () => {
    try {
      resolveTaskConfig({ url: 'gopher://example.com/x', split: 17, filename: '../escape' }, serviceConfig);
      expect.unreachable('resolveTaskConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual([
          'url: protocol must be one of http:, https:, ftp:, sftp:',
          'filename: must be a plain file name',
          'split: Number must be less than or equal to 16',
        ]);
        expect(error.message).toBe(`Invalid task configuration: ${error.issues.join('; ')}`);
      }
    }
  });

  it('should reject malformed headers and speed limits', () => {
    expect(() => resolveTaskConfig({ url: 'http://x/a', headers: ['no colon'] }, serviceConfig)).toThrow(ValidationError);
    expect(() => resolveTaskConfig({ url: 'http://x/a', maxDownloadLimit: 'fast' }, serviceConfig)).toThrow(ValidationError);
  });
});

describe('extraArgs', () => {
  it('should accept ordinary long options', () => {
    const config = resolveTaskConfig({
      url: 'http://x/a',
      extraArgs: ['--check-certificate=false', '--log-level=info', '--disk-cache=0'],
    }, serviceConfig);

    expect(config.extraArgs).toEqual(['--check-certificate=false', '--log-level=info', '--disk-cache=0']);
  });

  it('should reject options that move the output or run commands', () => {
    try {
      resolveTaskConfig({
        url: 'http://x/file.bin',
        extraArgs: ['--on-download-complete=/bin/sh', '--dir=/etc', '--out=other.bin', '--conf-path=/tmp/aria2.conf'],
      }, serviceConfig);
      expect.unreachable('resolveTaskConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual([
          'extraArgs.0: --on-download-complete cannot be set per task',
          'extraArgs.1: --dir cannot be set per task',
          'extraArgs.2: --out cannot be set per task',
          'extraArgs.3: --conf-path cannot be set per task',
        ]);
      }
    }
  });

  it('should reject abbreviations of reserved options', () => {
    expect(isReservedOption('--ou=elsewhere.bin')).toBe(true);
    expect(isReservedOption('--input-f=/tmp/list.txt')).toBe(true);
    expect(isReservedOption('--on-bt-download-complete=/bin/true')).toBe(true);
    expect(isReservedOption('--log-level=info')).toBe(false);
    expect(() => resolveTaskConfig({ url: 'http://x/a', extraArgs: ['--save-s=/tmp/s'] }, serviceConfig))
      .toThrow('extraArgs.0: --save-s cannot be set per task');
  });

  it('should reject short options and bare values', () => {
    expect(() => resolveTaskConfig({ url: 'http://x/a', extraArgs: ['-d', '/etc'] }, serviceConfig))
      .toThrow('extraArgs.0: must be a long option such as "--name=value"; extraArgs.1: must be a long option such as "--name=value"');
  });

  it('should apply the same rules to a patch', () => {
    const current = resolveTaskConfig({ url: 'http://x/a' }, serviceConfig);
    expect(() => applyTaskConfigPatch(current, { extraArgs: ['--dir=/etc'] })).toThrow(ValidationError);
  });
});

describe('applyTaskConfigPatch', () => {
  const current = resolveTaskConfig({ url: 'https://example.com/file.bin', referer: 'https://example.com/' }, serviceConfig);

  it('should change only the given fields', () => {
    const next = applyTaskConfigPatch(current, { split: 2, url: 'https://mirror.example.com/file.bin' });

    expect(next).toEqual({ ...current, split: 2, url: 'https://mirror.example.com/file.bin' });
  });

  it('should clear nullable fields set to null', () => {
    expect(applyTaskConfigPatch(current, { referer: null }).referer).toBeNull();
  });

  it('should reject an invalid patch', () => {
    expect(() => applyTaskConfigPatch(current, { fileAllocation: 'sparse' })).toThrow(ValidationError);
  });
});
