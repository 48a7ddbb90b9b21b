import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogRecord = {
  time: Date;
  level: LogLevel;
  channel: string;
  message: string;
};

export type LogSink = (record: LogRecord) => void;

export interface OutputChannel {
  readonly name: string;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Derives a channel that shares this channel's sinks. */
  child(name: string): OutputChannel;
}

export const formatLogLine = (record: LogRecord): string => {
  return `${record.time.toISOString()} [${record.level}] [${record.channel}] ${record.message}`;
};

/**
 * Appends formatted lines to a file. After the first failed write the sink
 * stops writing and hands the error to `onError`.
 */
export const fileSink = (filePath: string, onError: (error: unknown) => void): LogSink => {
  let ready = false;
  let broken = false;

  return (record) => {
    if (broken) return;
    try {
      if (!ready) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        ready = true;
      }
      fs.appendFileSync(filePath, `${formatLogLine(record)}\n`);
    } catch (error) {
      broken = true;
      onError(error);
    }
  };
};

export const consoleSink: LogSink = (record) => {
  const line = `[${record.channel}] ${record.message}`;
  if (record.level === 'error') {
    console.error(line);
  } else if (record.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createOutputChannel = (
  name: string,
  sinks: LogSink[],
  now: () => Date = () => new Date()
): OutputChannel => {
  const emit = (level: LogLevel, message: string): void => {
    const record: LogRecord = { time: now(), level, channel: name, message };
    for (const sink of sinks) {
      sink(record);
    }
  };

  return {
    name,
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (childName) => createOutputChannel(childName, sinks, now)
  };
};

export const silentChannel = (name = 'silent'): OutputChannel => createOutputChannel(name, []);
