import { join } from 'node:path';
import type { ActionRecord } from '../types/action-record.js';
import { appendLines, singleLine, truncateFile, type ActionLogSink, type SinkContext } from './log-sink.js';

export const TEXT_LOG_FILE = 'automation_log.log';

export type TextLogPhase = 'BEFORE' | 'AFTER' | 'INCOMPLETE';

export function formatTextLine(phase: TextLogPhase, record: ActionRecord, at: string): string {
  const parts = [`${at} [${String(record.sequenceIndex).padStart(4, '0')}] ${phase} ${singleLine(record.actionType)}`];

  if (record.targetSelector !== undefined) {
    parts.push(`target=${singleLine(record.targetSelector)}`);
  }

  if (phase === 'AFTER') {
    parts.push(`outcome=${record.outcome}`);
    if (record.durationMs !== undefined) {
      parts.push(`duration=${Math.round(record.durationMs)}ms`);
    }
    if (record.pageChangeInfo?.changed) {
      parts.push(`page_changed=${record.pageChangeInfo.newUrl ?? 'yes'}`);
    }
    if (record.errorDetail) {
      parts.push(`error=${singleLine(record.errorDetail)}`);
    }
  }

  if (phase === 'INCOMPLETE') {
    parts.push('outcome=incomplete');
  }

  return parts.join(' ');
}

/**
 * Human-readable session log. Every event is one line, appended and awaited
 * before the recorder call resolves.
 */
export class TextLogSink implements ActionLogSink {
  readonly name = 'text';
  private path = '';

  async open(context: SinkContext): Promise<void> {
    this.path = join(context.directory, TEXT_LOG_FILE);
    await truncateFile(
      this.path,
      `# Action log - session: ${context.sessionId}\n# Started at: ${context.startedAt}\n`,
    );
  }

  async recordStarted(record: ActionRecord): Promise<void> {
    await appendLines(this.path, [formatTextLine('BEFORE', record, record.startedAt)]);
  }

  async recordFinalized(record: ActionRecord): Promise<void> {
    await appendLines(this.path, [formatTextLine('AFTER', record, record.completedAt ?? record.startedAt)]);
  }

  async recordIncomplete(record: ActionRecord, at: string): Promise<void> {
    await appendLines(this.path, [formatTextLine('INCOMPLETE', record, at)]);
  }

  async close(at: string): Promise<void> {
    await appendLines(this.path, [`# Ended at: ${at}`]);
  }
}
