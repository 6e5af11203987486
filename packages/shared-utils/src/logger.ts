import { nowIso } from './date.js';

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (normalized === 'DEBUG' || normalized === 'WARN' || normalized === 'ERROR') {
    return normalized;
  }
  return 'INFO';
}

/**
 * JSON 한 줄 로그
 * - stdout은 리포트 출력 전용이므로 모든 레벨을 stderr로 보낸다.
 * - LOG_LEVEL 미만 레벨은 버린다. (기본 INFO)
 */
export class Logger {
  constructor(
    private serviceName: string,
    private minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
  ) {}

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    console.error(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error ? { message: error.message, stack: error.stack } : error;
    this.log('ERROR', message, errorData);
  }
}

export function createLogger(serviceName: string): Logger {
  return new Logger(serviceName);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
