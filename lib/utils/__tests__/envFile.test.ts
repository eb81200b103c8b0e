import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadEnvFile, parseEnvText } from '../envFile';

describe('parseEnvText', () => {
  it('reads pairs and skips comments and junk', () => {
    const entries = parseEnvText('# local\nDIAG_CONVERT=1\r\nexport NAME = "Weekly Digest"\nQUOTE=\'x=y\'\nnot a pair\n1BAD=x\n');
    expect([...entries]).toEqual([
      ['DIAG_CONVERT', '1'],
      ['NAME', 'Weekly Digest'],
      ['QUOTE', 'x=y'],
    ]);
  });

  it('keeps unmatched quotes and empty values as written', () => {
    expect([...parseEnvText('A="open\nB=\n')]).toEqual([
      ['A', '"open'],
      ['B', ''],
    ]);
  });
});

describe('loadEnvFile', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('sets unset keys and leaves existing ones alone', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mc2ses-env-'));
    const file = path.join(dir, '.env.local');
    fs.writeFileSync(file, '# local settings\nMC2SES_TEST_NEW=from-file\nMC2SES_TEST_EXISTING=from-file\nnot a pair\n');
    vi.stubEnv('MC2SES_TEST_NEW', '');
    vi.stubEnv('MC2SES_TEST_EXISTING', 'from-env');

    expect(loadEnvFile(file)).toBe(true);
    expect(process.env.MC2SES_TEST_NEW).toBe('from-file');
    expect(process.env.MC2SES_TEST_EXISTING).toBe('from-env');

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns false quietly when the file does not exist', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadEnvFile(path.join(os.tmpdir(), 'mc2ses-no-such-dir', '.env.local'))).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });
});
