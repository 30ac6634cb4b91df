export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? '').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

let currentLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

// Structured logging interface
export interface LogContext {
  module?: string;
  scanId?: string;
  address?: string;
  action?: string;
  duration?: number;
  error?: unknown;
  [key: string]: unknown;
}

export function formatMessage(level: string, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  let logLine = `[${timestamp}] [${level}]`;

  if (context?.module) {
    logLine += ` [${context.module}]`;
  }

  if (context?.scanId) {
    logLine += ` [scan:${context.scanId}]`;
  }

  if (context?.address) {
    logLine += ` [${context.address}]`;
  }

  logLine += ` ${message}`;

  if (context?.duration !== undefined) {
    logLine += ` (${context.duration}ms)`;
  }

  return logLine;
}

// While held, lines queue up instead of interleaving with the renderer's
// repaint on a shared terminal. releaseLogs() writes them out in order.
let heldLines: string[] | null = null;

export function holdLogs(): void {
  heldLines ??= [];
}

export function releaseLogs(): void {
  const lines = heldLines ?? [];
  heldLines = null;
  for (const line of lines) {
    console.error(line);
  }
}

// stdout belongs to the renderer; every log line goes to stderr.
function emit(line: string): void {
  if (heldLines) {
    heldLines.push(line);
  } else {
    console.error(line);
  }
}

export function debug(message: string, context?: LogContext) {
  if (currentLevel <= LogLevel.DEBUG) {
    emit(formatMessage('DEBUG', message, context));
  }
}

export function info(message: string, context?: LogContext) {
  if (currentLevel <= LogLevel.INFO) {
    emit(formatMessage('INFO', message, context));
  }
}

export function warn(message: string, context?: LogContext) {
  if (currentLevel <= LogLevel.WARN) {
    emit(formatMessage('WARN', message, context));
  }
}

export function error(message: string, context?: LogContext) {
  emit(formatMessage('ERROR', message, context));

  if (context?.error instanceof Error) {
    emit(context.error.stack || context.error.message);
  } else if (context?.error !== undefined) {
    emit(String(context.error));
  }
}
