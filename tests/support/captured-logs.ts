import { Logger, type LoggerService } from '@nestjs/common';

export interface CapturedLogLine {
  level: 'log' | 'error' | 'warn' | 'debug' | 'verbose' | 'fatal';
  entry: Record<string, unknown>;
}

/**
 * Routes every Nest `Logger` call into an array and parses the JSON entries.
 */
export function captureLogs(): CapturedLogLine[] {
  const lines: CapturedLogLine[] = [];
  const record = (level: CapturedLogLine['level']) => (message: unknown) => {
    const text = typeof message === 'string' ? message : JSON.stringify(message);
    let entry: Record<string, unknown>;
    try {
      const parsed: unknown = JSON.parse(text);
      entry = typeof parsed === 'object' && parsed !== null ? { ...parsed } : { message: text };
    } catch {
      entry = { message: text };
    }
    lines.push({ level, entry });
  };

  const logger: LoggerService = {
    log: record('log'),
    error: record('error'),
    warn: record('warn'),
    debug: record('debug'),
    verbose: record('verbose'),
    fatal: record('fatal'),
  };
  Logger.overrideLogger(logger);
  return lines;
}
