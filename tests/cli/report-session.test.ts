import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { parseReportArgs, reportSession } from '../../src/cli/report-session.js';
import { JSON_LOG_FILE } from '../../src/sinks/jsonl-log-sink.js';
import { SUMMARY_FILE } from '../../src/logging/summary-writer.js';
import { RecorderIOError } from '../../src/recorder/errors.js';

describe('parseReportArgs', () => {
  it('resolves a positional directory against the working directory', () => {
    expect(parseReportArgs(['out/run-1', '--write'], {}, '/work')).toEqual({
      directory: '/work/out/run-1',
      write: true,
    });
  });

  it('falls back to ACTION_LOG_DIR', () => {
    expect(parseReportArgs([], { ACTION_LOG_DIR: '/data/logs' }, '/work')).toEqual({
      directory: '/data/logs',
      write: false,
    });
  });

  it('falls back to ./logs without ACTION_LOG_DIR', () => {
    expect(parseReportArgs([], {}, '/work').directory).toBe('/work/logs');
  });
});

describe('reportSession', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `report-session-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    const lines = [
      {
        sequenceIndex: 0,
        actionType: 'goto',
        targetSelector: 'https://example.com/',
        startedAt: '2026-03-01T10:00:00.000Z',
        completedAt: '2026-03-01T10:00:00.850Z',
        durationMs: 850,
        outcome: 'success',
      },
      {
        sequenceIndex: 1,
        actionType: 'click',
        targetSelector: '#login',
        startedAt: '2026-03-01T10:00:01.000Z',
        outcome: 'pending',
        incomplete: true,
      },
    ];
    await writeFile(join(dir, JSON_LOG_FILE), lines.map((l) => JSON.stringify(l)).join('\n') + '\n', 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const expected = (directory: string): string =>
    [
      '# Session Summary',
      `- Log directory: ${directory}`,
      '- Result: Incomplete',
      '- Duration: 00m 00s',
      '- Actions: 1/1 succeeded',
      '',
      '## Actions',
      '| # | Action | Outcome | Duration |',
      '|---|--------|---------|----------|',
      '| 0 | goto | success | 850ms |',
      '',
      '## Incomplete Actions',
      '- Action 1 was started but never completed',
      '',
    ].join('\n');

  it('builds the report from the JSON log without writing it', async () => {
    expect(await reportSession({ directory: dir, write: false })).toBe(expected(dir));
    await expect(stat(join(dir, SUMMARY_FILE))).rejects.toThrow();
  });

  it('writes summary.md with --write', async () => {
    await reportSession({ directory: dir, write: true });
    expect(await readFile(join(dir, SUMMARY_FILE), 'utf-8')).toBe(expected(dir));
  });

  it('fails when the directory has no log', async () => {
    await expect(reportSession({ directory: join(dir, 'nope'), write: false })).rejects.toBeInstanceOf(
      RecorderIOError,
    );
  });
});
