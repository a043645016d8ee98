import { describe, it, expect } from 'vitest';
import { loadRecorderConfigFromEnv, loadRunConfigFromEnv } from '../../src/config/env.js';
import { ConfigError } from '../../src/recorder/errors.js';

describe('loadRecorderConfigFromEnv', () => {
  it('defaults to ./logs under the working directory', () => {
    expect(loadRecorderConfigFromEnv({}, '/work')).toEqual({ logDirectory: '/work/logs' });
  });

  it('reads the directory, session id and element details flag', () => {
    const config = loadRecorderConfigFromEnv(
      {
        ACTION_LOG_DIR: '/var/log/actions',
        ACTION_LOG_SESSION_ID: 'run-7',
        ACTION_LOG_ELEMENT_DETAILS: 'TRUE',
      },
      '/work',
    );
    expect(config).toEqual({
      logDirectory: '/var/log/actions',
      sessionId: 'run-7',
      sinks: { elementDetails: true },
    });
  });

  it('resolves a relative directory and ignores blank values', () => {
    const config = loadRecorderConfigFromEnv(
      { ACTION_LOG_DIR: 'out/logs', ACTION_LOG_SESSION_ID: '  ', ACTION_LOG_ELEMENT_DETAILS: '0' },
      '/work',
    );
    expect(config).toEqual({ logDirectory: '/work/out/logs' });
  });

  it('rejects an unrecognized flag value', () => {
    expect(() => loadRecorderConfigFromEnv({ ACTION_LOG_ELEMENT_DETAILS: 'maybe' }, '/work')).toThrow(ConfigError);
  });
});

describe('loadRunConfigFromEnv', () => {
  it('requires TASK_FILE', () => {
    expect(() => loadRunConfigFromEnv({}, '/work')).toThrow('TASK_FILE is not set');
  });

  it('resolves the task file against the working directory', () => {
    expect(loadRunConfigFromEnv({ TASK_FILE: 'tasks/search.txt' }, '/work')).toEqual({
      recorder: { logDirectory: '/work/logs' },
      taskFile: '/work/tasks/search.txt',
    });
  });
});
