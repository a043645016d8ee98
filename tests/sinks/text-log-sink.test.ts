import { describe, it, expect } from 'vitest';
import { formatTextLine } from '../../src/sinks/text-log-sink.js';
import { singleLine, truncateText } from '../../src/sinks/log-sink.js';
import type { ActionRecord } from '../../src/types/action-record.js';

function makeRecord(overrides: Partial<ActionRecord> = {}): ActionRecord {
  return {
    sequenceIndex: 3,
    actionType: 'go_back',
    startedAt: '2026-03-01T10:00:00.000Z',
    outcome: 'pending',
    ...overrides,
  };
}

describe('formatTextLine', () => {
  it('formats a BEFORE line without a target', () => {
    expect(formatTextLine('BEFORE', makeRecord(), '2026-03-01T10:00:00.000Z')).toBe(
      '2026-03-01T10:00:00.000Z [0003] BEFORE go_back',
    );
  });

  it('formats an AFTER line with every optional field', () => {
    const record = makeRecord({
      sequenceIndex: 12,
      actionType: 'click',
      targetSelector: '#go',
      completedAt: '2026-03-01T10:00:01.000Z',
      durationMs: 45.6,
      outcome: 'error',
      errorDetail: 'Timeout\nwaiting for locator',
      pageChangeInfo: { changed: true, newUrl: 'https://example.com/next' },
    });

    expect(formatTextLine('AFTER', record, '2026-03-01T10:00:01.000Z')).toBe(
      '2026-03-01T10:00:01.000Z [0012] AFTER click target=#go outcome=error duration=46ms ' +
        'page_changed=https://example.com/next error=Timeout\\nwaiting for locator',
    );
  });

  it('omits page_changed when the page stayed the same', () => {
    const record = makeRecord({
      outcome: 'success',
      durationMs: 10,
      pageChangeInfo: { changed: false, previousUrl: 'https://example.com/', newUrl: 'https://example.com/' },
    });
    expect(formatTextLine('AFTER', record, 'T')).toBe('T [0003] AFTER go_back outcome=success duration=10ms');
  });

  it('keeps an action type with line breaks on one line', () => {
    const record = makeRecord({
      actionType: 'click\n2026-01-01T00:00:00.000Z [0009] AFTER forged outcome=success',
    });
    const line = formatTextLine('BEFORE', record, 'T');

    expect(line).toBe('T [0003] BEFORE click\\n2026-01-01T00:00:00.000Z [0009] AFTER forged outcome=success');
    expect(line.split('\n')).toHaveLength(1);
  });

  it('writes an empty target the same way the JSON log keeps it', () => {
    expect(formatTextLine('BEFORE', makeRecord({ targetSelector: '' }), 'T')).toBe('T [0003] BEFORE go_back target=');
  });

  it('marks incomplete records', () => {
    expect(formatTextLine('INCOMPLETE', makeRecord({ targetSelector: '#q' }), 'T')).toBe(
      'T [0003] INCOMPLETE go_back target=#q outcome=incomplete',
    );
  });
});

describe('singleLine', () => {
  it('escapes CRLF and LF line breaks', () => {
    expect(singleLine('a\r\nb\nc')).toBe('a\\nb\\nc');
  });

  it('escapes a lone carriage return', () => {
    expect(singleLine('a\rb')).toBe('a\\nb');
  });
});

describe('truncateText', () => {
  it('keeps short text as is', () => {
    expect(truncateText('short', 10)).toBe('short');
  });

  it('cuts long text to the limit including the ellipsis', () => {
    expect(truncateText('abcdefghij', 8)).toBe('abcde...');
  });
});
