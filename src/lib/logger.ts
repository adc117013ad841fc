import { appendFileSync } from 'fs';

export type LoggerOptions = {
  enabled: boolean;
  filePath: string | null;
};

let loggerOptions: LoggerOptions = {
  enabled: false,
  filePath: null,
};

export function configureLogger(options: Partial<LoggerOptions>): void {
  loggerOptions = { ...loggerOptions, ...options };
}

export function getLoggerOptions(): LoggerOptions {
  return { ...loggerOptions };
}

function formatLine(scope: string, kind: 'debug' | 'error', message: string, details?: Record<string, unknown>): string {
  const payload = details ? `${message} ${JSON.stringify(details)}` : message;
  return `[${scope}-${kind}] ${payload}`;
}

function appendToLogFile(line: string): void {
  if (!loggerOptions.filePath) return;

  try {
    appendFileSync(loggerOptions.filePath, `${new Date().toISOString()} ${line}\n`, 'utf8');
  } catch (error) {
    console.error('[debug-log-write-failed]', error);
  }
}

export function logDebug(scope: string, message: string, details?: Record<string, unknown>): void {
  if (!loggerOptions.enabled) return;
  const line = formatLine(scope, 'debug', message, details);
  console.info(line);
  appendToLogFile(line);
}

export function logError(scope: string, message: string, details?: Record<string, unknown>): void {
  const line = formatLine(scope, 'error', message, details);
  console.error(line);
  appendToLogFile(line);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
