import { type LogEntry, StructuredLogger } from "../../src/logger.js";

export interface RecordingLogger {
  logger: StructuredLogger;
  entries: LogEntry[];
  /** Messages in emission order, e.g. `["merge_blocked"]`. */
  messages(): string[];
  find(message: string): LogEntry | undefined;
}

/** Silent logger capturing every entry in memory. */
export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ silent: true, onEntry: (entry) => entries.push(entry) });
  return {
    logger,
    entries,
    messages: () => entries.map((entry) => entry.message),
    find: (message) => entries.find((entry) => entry.message === message),
  };
}
