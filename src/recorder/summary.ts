import type { ActionRecord, ElementInfo } from '../types/action-record.js';
import type { ActionSummary, ActionTiming } from '../types/summary.js';

export function summarizeRecords(records: readonly ActionRecord[]): ActionSummary {
  const ordered = [...records].sort((a, b) => a.sequenceIndex - b.sequenceIndex);

  const byOutcome = { success: 0, error: 0 };
  const actions: ActionTiming[] = [];
  const elements: ElementInfo[] = [];
  const incomplete: number[] = [];
  let totalDurationMs = 0;

  for (const record of ordered) {
    if (record.outcome === 'pending') {
      incomplete.push(record.sequenceIndex);
      continue;
    }

    const durationMs = record.durationMs ?? 0;
    byOutcome[record.outcome]++;
    totalDurationMs += durationMs;
    actions.push({
      sequenceIndex: record.sequenceIndex,
      actionType: record.actionType,
      outcome: record.outcome,
      durationMs,
      ...(record.errorDetail !== undefined ? { errorDetail: record.errorDetail } : {}),
    });
    if (record.targetElementInfo) {
      elements.push(structuredClone(record.targetElementInfo));
    }
  }

  return {
    total: actions.length,
    byOutcome,
    totalDurationMs,
    actions,
    elements,
    incomplete,
  };
}
