export type LogLevel = 'info' | 'success' | 'action' | 'debug' | 'warn' | 'error';

const ICONS: Record<LogLevel, string> = {
  info: 'ℹ',
  success: '✓',
  action: '→',
  debug: '🔍',
  warn: '⚠',
  error: '✗'
};

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  action(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  silent?: boolean;
}

function debugFromEnv(): boolean {
  if (typeof process === 'undefined') return false;
  return process.env.CS_WATERMARK_DEBUG === '1';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug === true || debugFromEnv();

  const write = (level: LogLevel, message: string): void => {
    if (options.silent) return;
    if (level === 'debug' && !debugEnabled) return;
    const line = `[${ICONS[level]}] ${message}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    info: (message) => write('info', message),
    success: (message) => write('success', message),
    action: (message) => write('action', message),
    debug: (message) => write('debug', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message)
  };
}

export const silentLogger: Logger = createLogger({ silent: true });
