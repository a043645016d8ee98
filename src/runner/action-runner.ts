import type { ElementInfo, FinalOutcome, FinalizeDetails } from '../types/action-record.js';
import type { ActionLogRecorder } from '../recorder/action-log-recorder.js';
import type { SessionHandle } from '../recorder/session.js';
import { errorMessage } from '../recorder/errors.js';
import { inspectElement, type ElementHandleLike } from '../inspect/element-inspector.js';
import { capturePageState, detectPageChange, type PageLike } from '../inspect/page-state.js';
import { consoleLogger, type OperationalLogger } from '../logging/operational-logger.js';

export interface ActionDescriptor {
  actionType: string;
  targetSelector?: string;
  elementIndex?: number;
  /** Resolves the targeted element, when the action has one. */
  resolveElement?: () => Promise<ElementHandleLike | null>;
}

/**
 * Wraps one browser action in a recordBefore/recordAfter pair. The record is
 * finalized on every exit path; errors from the action are rethrown after
 * they are recorded, errors from the recorder are only logged.
 */
export class ActionRunner {
  constructor(
    private recorder: ActionLogRecorder,
    private session: SessionHandle,
    private page: PageLike | null,
    private logger: OperationalLogger = consoleLogger,
  ) {}

  async run(descriptor: ActionDescriptor, execute: () => Promise<string | void>): Promise<string | undefined> {
    const pageBefore = await capturePageState(this.page);
    const elementBefore = await this.inspect(descriptor);

    let sequenceIndex: number | undefined;
    try {
      sequenceIndex = await this.recorder.recordBefore(
        this.session,
        descriptor.actionType,
        descriptor.targetSelector,
        elementBefore ?? undefined,
      );
    } catch (err) {
      this.logger.warn(`Could not record start of ${descriptor.actionType}: ${errorMessage(err)}`);
    }

    let outcome: FinalOutcome = 'error';
    const details: FinalizeDetails = {};
    try {
      const value = await execute();
      outcome = 'success';
      if (typeof value === 'string') details.result = value;
      return details.result;
    } catch (err) {
      details.errorDetail = errorMessage(err);
      throw err;
    } finally {
      const pageChange = detectPageChange(pageBefore, await capturePageState(this.page));
      details.pageChangeInfo = pageChange;
      if (!pageChange.changed && elementBefore) {
        const elementAfter = await this.inspect(descriptor);
        if (elementAfter) details.elementInfoAfter = elementAfter;
      }

      if (sequenceIndex !== undefined) {
        await this.finalize(sequenceIndex, descriptor.actionType, outcome, details);
      }
    }
  }

  private async finalize(
    sequenceIndex: number,
    actionType: string,
    outcome: FinalOutcome,
    details: FinalizeDetails,
  ): Promise<void> {
    try {
      await this.recorder.recordAfter(this.session, sequenceIndex, outcome, details);
    } catch (err) {
      this.logger.warn(`Could not record completion of ${actionType}: ${errorMessage(err)}`);
    }
  }

  private async inspect(descriptor: ActionDescriptor): Promise<ElementInfo | null> {
    if (!descriptor.resolveElement) return null;
    try {
      const handle = await descriptor.resolveElement();
      return handle ? await inspectElement(handle, descriptor.elementIndex) : null;
    } catch {
      return null;
    }
  }
}
