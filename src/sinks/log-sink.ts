import { appendFile, writeFile } from 'node:fs/promises';
import type { ActionRecord } from '../types/action-record.js';
import { RecorderIOError, errorMessage } from '../recorder/errors.js';

export interface SinkContext {
  sessionId: string;
  directory: string;
  startedAt: string;
}

/**
 * One destination for a session's action records. The recorder drives every
 * sink through the same lifecycle, so sinks can be added, disabled or swapped
 * without touching the pairing state machine.
 */
export interface ActionLogSink {
  readonly name: string;
  open(context: SinkContext): Promise<void>;
  recordStarted(record: ActionRecord): Promise<void>;
  recordFinalized(record: ActionRecord): Promise<void>;
  recordIncomplete(record: ActionRecord, at: string): Promise<void>;
  close(at: string): Promise<void>;
}

export async function truncateFile(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf-8');
  } catch (err) {
    throw new RecorderIOError(`Cannot open ${path}: ${errorMessage(err)}`, path, err);
  }
}

export async function appendLines(path: string, lines: string[]): Promise<void> {
  if (lines.length === 0) return;
  try {
    await appendFile(path, lines.join('\n') + '\n', 'utf-8');
  } catch (err) {
    throw new RecorderIOError(`Cannot write ${path}: ${errorMessage(err)}`, path, err);
  }
}

/** Keep one event per line: embedded line breaks are escaped. */
export function singleLine(text: string): string {
  return text.replace(/\r\n|\r|\n/g, '\\n');
}

export function truncateText(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, max - 3) + '...';
}
