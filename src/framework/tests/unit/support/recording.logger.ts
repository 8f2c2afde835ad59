import type { Logger } from '../../../helpers/log.helper.js';

export type LogLevel = keyof Logger;

export interface LogLine {
  level: LogLevel;
  message: string;
}

/** Logger that keeps every line in memory instead of printing it */
export interface RecordingLogger extends Logger {
  readonly lines: LogLine[];
  messages(level: LogLevel): string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: LogLine[] = [];
  const record = (level: LogLevel) => (message: string): void => {
    lines.push({ level, message });
  };
  return {
    lines,
    messages: level => lines.filter(l => l.level === level).map(l => l.message),
    info: record('info'),
    success: record('success'),
    warn: record('warn'),
    error: record('error'),
    detail: record('detail'),
    debug: record('debug'),
  };
}
