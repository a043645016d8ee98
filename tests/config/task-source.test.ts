import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { readTaskSource } from '../../src/config/task-source.js';
import { ConfigError } from '../../src/recorder/errors.js';

describe('readTaskSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `task-source-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the trimmed file content', async () => {
    const path = join(dir, 'task.txt');
    await writeFile(path, '  Open example.com and read the heading\nthen stop \n', 'utf-8');
    expect(await readTaskSource(path)).toBe('Open example.com and read the heading\nthen stop');
  });

  it('fails with ConfigError when the file is missing', async () => {
    await expect(readTaskSource(join(dir, 'missing.txt'))).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails with ConfigError when the file is blank', async () => {
    const path = join(dir, 'blank.txt');
    await writeFile(path, '\n  \n', 'utf-8');
    await expect(readTaskSource(path)).rejects.toThrow(`Task file ${path} is empty`);
  });
});
