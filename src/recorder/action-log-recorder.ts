import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ActionRecord, ElementInfo, FinalOutcome, FinalizeDetails } from '../types/action-record.js';
import type { ActionSummary } from '../types/summary.js';
import { RecorderConfigSchema, type RecorderConfig } from '../schemas/config.schema.js';
import { createSinks, type ActionLogSink } from '../sinks/index.js';
import { consoleLogger, type OperationalLogger } from '../logging/operational-logger.js';
import { diffElementInfo } from '../inspect/element-diff.js';
import { SessionHandle } from './session.js';
import { summarizeRecords } from './summary.js';
import {
  AlreadyFinalizedError,
  ConfigError,
  RecorderIOError,
  SessionClosedError,
  UnknownRecordError,
  errorMessage,
  type IncompleteRecordWarning,
} from './errors.js';

export interface Clock {
  /** Wall-clock time, used for timestamps. */
  now(): Date;
  /** Monotonic milliseconds, used for elapsed times. */
  monotonic(): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  monotonic: () => performance.now(),
};

export interface RecorderOptions {
  logger?: OperationalLogger;
  clock?: Clock;
}

/**
 * Records the before/after lifecycle of automation actions.
 *
 * Each record moves `pending -> success | error` exactly once. Calls on one
 * session are serialized, so two racing `recordAfter` calls for the same
 * index produce one success and one `AlreadyFinalizedError`. Sink write
 * failures after the session has started are reported to the operational
 * logger and never reach the caller.
 */
export class ActionLogRecorder {
  private logger: OperationalLogger;
  private clock: Clock;

  constructor(options: RecorderOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? systemClock;
  }

  async beginSession(config: RecorderConfig, extraSinks: ActionLogSink[] = []): Promise<SessionHandle> {
    const parsed = RecorderConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
      throw new ConfigError(`Invalid recorder config: ${issues.join('; ')}`);
    }

    const directory = resolve(parsed.data.logDirectory);
    try {
      await mkdir(directory, { recursive: true });
    } catch (err) {
      throw new RecorderIOError(`Cannot create log directory ${directory}: ${errorMessage(err)}`, directory, err);
    }

    const startedAt = this.clock.now().toISOString();
    const sessionId =
      parsed.data.sessionId ?? `session-${this.clock.now().getTime()}-${Math.random().toString(36).slice(2, 7)}`;
    const sinks = [...createSinks(parsed.data), ...extraSinks];

    for (const sink of sinks) {
      try {
        await sink.open({ sessionId, directory, startedAt });
      } catch (err) {
        if (err instanceof RecorderIOError) throw err;
        throw new RecorderIOError(`Cannot open sink "${sink.name}": ${errorMessage(err)}`, directory, err);
      }
    }

    this.logger.info(`Action log session ${sessionId} started in ${directory}`);
    return new SessionHandle(sessionId, directory, startedAt, sinks);
  }

  recordBefore(
    session: SessionHandle,
    actionType: string,
    targetSelector?: string,
    targetElementInfo?: ElementInfo,
  ): Promise<number> {
    return session.queue.run(async () => {
      this.assertOpen(session);

      const record: ActionRecord = {
        sequenceIndex: session.allocateIndex(),
        actionType,
        ...(targetSelector !== undefined ? { targetSelector } : {}),
        ...(targetElementInfo ? { targetElementInfo: structuredClone(targetElementInfo) } : {}),
        startedAt: this.clock.now().toISOString(),
        outcome: 'pending',
      };
      session.add(record, this.clock.monotonic());

      await this.dispatch(session, (sink) => sink.recordStarted(record));
      return record.sequenceIndex;
    });
  }

  recordAfter(
    session: SessionHandle,
    sequenceIndex: number,
    outcome: FinalOutcome,
    details: FinalizeDetails = {},
  ): Promise<void> {
    return session.queue.run(async () => {
      this.assertOpen(session);

      const entry = session.get(sequenceIndex);
      if (!entry) {
        this.logger.warn(`recordAfter for unknown action ${sequenceIndex} in session ${session.id}`);
        throw new UnknownRecordError(sequenceIndex);
      }
      if (entry.record.outcome !== 'pending') {
        this.logger.warn(`recordAfter for already finalized action ${sequenceIndex} in session ${session.id}`);
        throw new AlreadyFinalizedError(sequenceIndex);
      }

      const before = entry.record.targetElementInfo;
      const elementChanges =
        before && details.elementInfoAfter ? diffElementInfo(before, details.elementInfoAfter) : {};
      const elapsed = this.clock.monotonic() - entry.startedAtMonotonic;

      const record: ActionRecord = {
        ...entry.record,
        completedAt: this.clock.now().toISOString(),
        durationMs: Math.round(Math.max(0, elapsed) * 100) / 100,
        outcome,
        ...(outcome === 'error' ? { errorDetail: details.errorDetail ?? 'unknown error' } : {}),
        ...(details.pageChangeInfo ? { pageChangeInfo: structuredClone(details.pageChangeInfo) } : {}),
        ...(details.result !== undefined ? { result: details.result } : {}),
        ...(Object.keys(elementChanges).length > 0 ? { elementChanges } : {}),
      };
      session.replace(record);

      await this.dispatch(session, (sink) => sink.recordFinalized(record));
    });
  }

  /** Summary of the records finalized so far. Does not touch the session files. */
  summarize(session: SessionHandle): ActionSummary {
    return summarizeRecords(session.records());
  }

  /**
   * Closes every sink. Records still pending are written with an incomplete
   * marker. Calling it again is a no-op.
   */
  endSession(session: SessionHandle): Promise<void> {
    return session.queue.run(async () => {
      if (session.isClosed) return;
      session.markClosed();

      const at = this.clock.now().toISOString();
      for (const pending of session.pending()) {
        const record: ActionRecord = { ...pending, incomplete: true };
        session.replace(record);

        const warning: IncompleteRecordWarning = {
          kind: 'IncompleteRecordWarning',
          sessionId: session.id,
          sequenceIndex: record.sequenceIndex,
          actionType: record.actionType,
          startedAt: record.startedAt,
        };
        this.logger.warn(`Action ${record.sequenceIndex} (${record.actionType}) never completed`, warning);

        await this.dispatch(session, (sink) => sink.recordIncomplete(record, at));
      }

      await this.dispatch(session, (sink) => sink.close(at));
      this.logger.info(`Action log session ${session.id} ended`);
    });
  }

  /** Runs `fn` inside a session that is ended on every exit path. */
  async withSession<T>(
    config: RecorderConfig,
    fn: (session: SessionHandle) => Promise<T>,
    extraSinks: ActionLogSink[] = [],
  ): Promise<T> {
    const session = await this.beginSession(config, extraSinks);
    try {
      return await fn(session);
    } finally {
      await this.endSession(session);
    }
  }

  private assertOpen(session: SessionHandle): void {
    if (session.isClosed) throw new SessionClosedError(session.id);
  }

  private async dispatch(session: SessionHandle, write: (sink: ActionLogSink) => Promise<void>): Promise<void> {
    for (const sink of session.sinks) {
      try {
        await write(sink);
        session.noteSinkSuccess(sink.name);
      } catch (err) {
        if (session.noteSinkFailure(sink.name)) {
          this.logger.warn(`Action log sink "${sink.name}" failed in session ${session.id}: ${errorMessage(err)}`);
        }
      }
    }
  }
}
