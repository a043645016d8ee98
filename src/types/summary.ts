import type { ElementInfo, FinalOutcome } from './action-record.js';

export interface ActionTiming {
  sequenceIndex: number;
  actionType: string;
  outcome: FinalOutcome;
  durationMs: number;
  errorDetail?: string;
}

export interface ActionSummary {
  total: number;
  byOutcome: Record<FinalOutcome, number>;
  totalDurationMs: number;
  actions: ActionTiming[];
  elements: ElementInfo[];
  incomplete: number[];
}
