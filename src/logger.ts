export type LogLevel = 'info' | 'warn' | 'error';

export type Logger = Record<LogLevel, (message: string) => void>;

export function createConsoleLogger(scope = 'etl'): Logger {
  return {
    info: (message) => console.log(`[${scope}] ${message}`),
    warn: (message) => console.warn(`[${scope}] ${message}`),
    error: (message) => console.error(`[${scope}] ${message}`),
  };
}
