/**
 * Where pipeline progress goes. An oclif `Command` satisfies this shape,
 * so commands pass `this` straight through.
 */
export interface LogSink {
  log(message?: string): void;
  warn(message: string): void;
}

export const silentSink: LogSink = {
  log: () => {},
  warn: () => {},
};
