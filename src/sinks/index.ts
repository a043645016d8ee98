import type { RecorderConfig } from '../schemas/config.schema.js';
import type { ActionLogSink } from './log-sink.js';
import { TextLogSink } from './text-log-sink.js';
import { JsonlLogSink } from './jsonl-log-sink.js';
import { ElementDetailsSink } from './element-details-sink.js';

export function createSinks(config: RecorderConfig): ActionLogSink[] {
  const toggles = config.sinks ?? {};
  const sinks: ActionLogSink[] = [];
  if (toggles.text ?? true) sinks.push(new TextLogSink());
  if (toggles.json ?? true) sinks.push(new JsonlLogSink());
  if (toggles.elementDetails ?? false) sinks.push(new ElementDetailsSink());
  return sinks;
}

export type { ActionLogSink, SinkContext } from './log-sink.js';
export { TextLogSink, TEXT_LOG_FILE, formatTextLine } from './text-log-sink.js';
export { JsonlLogSink, JSON_LOG_FILE } from './jsonl-log-sink.js';
export { ElementDetailsSink, ELEMENT_DETAILS_FILE } from './element-details-sink.js';
