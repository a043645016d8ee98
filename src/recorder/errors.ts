export class RecorderIOError extends Error {
  constructor(
    message: string,
    public path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'RecorderIOError';
  }
}

export class UnknownRecordError extends Error {
  constructor(public sequenceIndex: number) {
    super(`No action record with sequence index ${sequenceIndex} was started in this session`);
    this.name = 'UnknownRecordError';
  }
}

export class AlreadyFinalizedError extends Error {
  constructor(public sequenceIndex: number) {
    super(`Action record ${sequenceIndex} is already finalized`);
    this.name = 'AlreadyFinalizedError';
  }
}

export class SessionClosedError extends Error {
  constructor(public sessionId: string) {
    super(`Session "${sessionId}" has already ended`);
    this.name = 'SessionClosedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ActionLogParseError extends Error {
  constructor(
    message: string,
    public line: number,
  ) {
    super(`${message} (line ${line})`);
    this.name = 'ActionLogParseError';
  }
}

export class UnsupportedActionError extends Error {
  constructor(public actionType: string) {
    super(`Unsupported action type: ${actionType}`);
    this.name = 'UnsupportedActionError';
  }
}

export type IncompleteRecordWarning = {
  kind: 'IncompleteRecordWarning';
  sessionId: string;
  sequenceIndex: number;
  actionType: string;
  startedAt: string;
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
