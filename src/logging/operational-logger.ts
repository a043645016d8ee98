export interface OperationalLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
}

export const consoleLogger: OperationalLogger = {
  info(message, data) {
    if (data) console.log(message, data);
    else console.log(message);
  },
  warn(message, data) {
    if (data) console.warn(message, data);
    else console.warn(message);
  },
};

/** For CLIs whose stdout carries JSONL events. */
export const stderrLogger: OperationalLogger = {
  info(message, data) {
    if (data) console.error(message, data);
    else console.error(message);
  },
  warn(message, data) {
    if (data) console.error(message, data);
    else console.error(message);
  },
};
