import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ActionRecord } from '../types/action-record.js';
import { ActionRecordSchema } from '../schemas/action-record.schema.js';
import { ActionLogParseError, RecorderIOError, errorMessage } from '../recorder/errors.js';
import { JSON_LOG_FILE } from '../sinks/jsonl-log-sink.js';

/**
 * Parses line-delimited JSON log content. When an index appears more than
 * once the last line wins; the result is ordered by sequence index.
 */
export function parseActionLog(content: string): ActionRecord[] {
  const byIndex = new Map<number, ActionRecord>();
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      throw new ActionLogParseError(`Invalid JSON: ${errorMessage(err)}`, i + 1);
    }

    const parsed = ActionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ActionLogParseError(`Invalid action record: ${issue.path.join('.')} ${issue.message}`, i + 1);
    }
    byIndex.set(parsed.data.sequenceIndex, parsed.data);
  }

  return [...byIndex.values()].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
}

export async function readActionLog(directory: string): Promise<ActionRecord[]> {
  const path = join(directory, JSON_LOG_FILE);
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new RecorderIOError(`Cannot read ${path}: ${errorMessage(err)}`, path, err);
  }
  return parseActionLog(content);
}
