import { createConsola, LogLevels, type ConsolaInstance, type LogObject } from 'consola';

export interface CapturingLogger {
  logger: ConsolaInstance;
  records: LogObject[];
  /** `type` and first argument of every record, for compact assertions. */
  lines(): Array<[string, unknown]>;
}

/** A consola instance at trace level that keeps every record in memory. */
export function createCapturingLogger(): CapturingLogger {
  const records: LogObject[] = [];
  const logger = createConsola({
    level: LogLevels.trace,
    throttle: 0,
    reporters: [{ log: (logObj) => records.push(logObj) }],
  });
  return {
    logger,
    records,
    lines: () => records.map((r) => [r.type, r.args[0]]),
  };
}
