import type { LogLevel, MemoryLogWriter } from '@graphql-hive/logger';

/**
 * The messages captured by a memory writer, optionally only those at one
 * level.
 */
export function logMessages(
  writer: MemoryLogWriter,
  level?: LogLevel,
): Array<string | undefined> {
  return writer.logs
    .filter((log) => level === undefined || log.level === level)
    .map((log) => log.msg);
}
