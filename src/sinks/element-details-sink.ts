import { join } from 'node:path';
import type { ActionRecord, ElementInfo } from '../types/action-record.js';
import { appendLines, singleLine, truncateFile, truncateText, type ActionLogSink, type SinkContext } from './log-sink.js';

export const ELEMENT_DETAILS_FILE = 'element_details.log';

const SEPARATOR = '-'.repeat(80);

export function formatElementBlock(record: ActionRecord, info: ElementInfo): string[] {
  const lines = [`=== Element for [${record.sequenceIndex}] ${record.actionType} - ${record.startedAt} ===`];

  if (info.index !== undefined) lines.push(`Element Index: ${info.index}`);
  lines.push(`Tag: ${info.tagName}`);
  if (info.xpath) lines.push(`XPath: ${info.xpath}`);
  if (info.cssSelector) lines.push(`CSS Selector: ${info.cssSelector}`);

  const attributes = Object.entries(info.attributes);
  if (attributes.length > 0) {
    lines.push('Attributes:');
    for (const [key, value] of attributes) {
      lines.push(`  ${key}: ${singleLine(value)}`);
    }
  }

  if (info.isVisible !== undefined) lines.push(`Visible: ${info.isVisible}`);
  if (info.isEnabled !== undefined) lines.push(`Enabled: ${info.isEnabled}`);
  if (info.textContent) lines.push(`Text Content: ${singleLine(truncateText(info.textContent, 200))}`);
  if (info.position) lines.push(`Position: x=${info.position.x}, y=${info.position.y}`);
  if (info.size) lines.push(`Size: width=${info.size.width}, height=${info.size.height}`);
  if (info.parent) {
    lines.push(`Parent: ${info.parent.tagName}${info.parent.id ? `#${info.parent.id}` : ''}`);
  }
  if (info.children) {
    lines.push(`Children Count: ${info.children.count}`);
    if (info.children.tags.length > 0) lines.push(`Children Tags: ${info.children.tags.join(', ')}`);
  }

  lines.push(SEPARATOR, '');
  return lines;
}

export function formatChangesBlock(record: ActionRecord): string[] {
  const changes = Object.entries(record.elementChanges ?? {});
  if (changes.length === 0) return [];

  const lines = [`=== Changes after [${record.sequenceIndex}] ${record.actionType} - ${record.completedAt ?? ''} ===`];
  for (const [key, change] of changes) {
    lines.push(`  ${key}: ${formatValue(change.before)} -> ${formatValue(change.after)}`);
  }
  lines.push(SEPARATOR, '');
  return lines;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return singleLine(truncateText(value, 50));
  return String(value);
}

/** Detailed per-element log, one block per targeted element. */
export class ElementDetailsSink implements ActionLogSink {
  readonly name = 'element-details';
  private path = '';

  async open(context: SinkContext): Promise<void> {
    this.path = join(context.directory, ELEMENT_DETAILS_FILE);
    await truncateFile(
      this.path,
      `Element Details Log - Session: ${context.sessionId}\nStarted at: ${context.startedAt}\n${SEPARATOR}\n\n`,
    );
  }

  async recordStarted(record: ActionRecord): Promise<void> {
    if (!record.targetElementInfo) return;
    await appendLines(this.path, formatElementBlock(record, record.targetElementInfo));
  }

  async recordFinalized(record: ActionRecord): Promise<void> {
    await appendLines(this.path, formatChangesBlock(record));
  }

  async recordIncomplete(): Promise<void> {}

  async close(): Promise<void> {}
}
