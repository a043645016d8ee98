export { ActionLogRecorder, systemClock } from './recorder/action-log-recorder.js';
export type { Clock, RecorderOptions } from './recorder/action-log-recorder.js';
export { SessionHandle } from './recorder/session.js';
export { summarizeRecords } from './recorder/summary.js';
export {
  RecorderIOError,
  UnknownRecordError,
  AlreadyFinalizedError,
  SessionClosedError,
  ConfigError,
  ActionLogParseError,
  UnsupportedActionError,
} from './recorder/errors.js';
export type { IncompleteRecordWarning } from './recorder/errors.js';

export {
  createSinks,
  TextLogSink,
  JsonlLogSink,
  ElementDetailsSink,
  TEXT_LOG_FILE,
  JSON_LOG_FILE,
  ELEMENT_DETAILS_FILE,
} from './sinks/index.js';
export type { ActionLogSink, SinkContext } from './sinks/index.js';

export { inspectElement, buildCssSelector } from './inspect/element-inspector.js';
export type { ElementHandleLike } from './inspect/element-inspector.js';
export { capturePageState, detectPageChange } from './inspect/page-state.js';
export type { PageLike, PageState } from './inspect/page-state.js';
export { diffElementInfo } from './inspect/element-diff.js';

export { ActionRunner } from './runner/action-runner.js';
export type { ActionDescriptor } from './runner/action-runner.js';
export { runActionList } from './runner/action-list.js';
export { PlaywrightActionEngine } from './engines/playwright-engine.js';
export type { PlaywrightPage, PlaywrightLocator } from './engines/playwright-engine.js';

export { readActionLog, parseActionLog } from './log-reader/action-log-reader.js';
export { buildSessionReport, writeSessionReport } from './logging/summary-writer.js';
export { consoleLogger, stderrLogger } from './logging/operational-logger.js';
export type { OperationalLogger } from './logging/operational-logger.js';

export { loadRecorderConfigFromEnv, loadRunConfigFromEnv } from './config/env.js';
export type { RunConfig } from './config/env.js';
export { readTaskSource } from './config/task-source.js';
export { RecorderConfigSchema } from './schemas/config.schema.js';
export type { RecorderConfig } from './schemas/config.schema.js';
export { ActionRecordSchema } from './schemas/action-record.schema.js';
export { ActionListSchema, ActionRefSchema } from './schemas/action-ref.schema.js';

export type * from './types/index.js';
