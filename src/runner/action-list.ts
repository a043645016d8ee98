import type { ActionRef } from '../types/action-ref.js';
import { errorMessage } from '../recorder/errors.js';

export interface ActionExecutor {
  execute(action: ActionRef): Promise<string | undefined>;
}

export type ActionListEvent =
  | { type: 'action_start'; actionIndex: number; action: ActionRef['type'] }
  | {
      type: 'action_end';
      actionIndex: number;
      ok: boolean;
      durationMs: number;
      result?: string;
      message?: string;
    };

export interface ActionListResult {
  ok: boolean;
  completed: number;
  abortedAt?: number;
}

/** Executes actions in order and stops at the first failure. */
export async function runActionList(
  executor: ActionExecutor,
  actions: readonly ActionRef[],
  emit: (event: ActionListEvent) => void,
): Promise<ActionListResult> {
  for (let i = 0; i < actions.length; i++) {
    const action = actions[i];
    emit({ type: 'action_start', actionIndex: i, action: action.type });

    const start = Date.now();
    try {
      const result = await executor.execute(action);
      emit({
        type: 'action_end',
        actionIndex: i,
        ok: true,
        durationMs: Date.now() - start,
        ...(result !== undefined ? { result } : {}),
      });
    } catch (err) {
      emit({
        type: 'action_end',
        actionIndex: i,
        ok: false,
        durationMs: Date.now() - start,
        message: errorMessage(err),
      });
      return { ok: false, completed: i, abortedAt: i };
    }
  }

  return { ok: true, completed: actions.length };
}
