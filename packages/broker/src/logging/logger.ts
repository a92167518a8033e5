export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  requestId?: string;
  toolCallId?: string;
  provider?: string;
}

export type Logger = {
  readonly debug: (message: string, context?: LogContext) => void;
  readonly info: (message: string, context?: LogContext) => void;
  readonly warn: (message: string, context?: LogContext) => void;
  readonly error: (message: string, context?: LogContext) => void;
};

export type LoggerOptions = {
  readonly level?: LogLevel;
  /** Defaults to stderr: stdout carries protocol lines only. */
  readonly write?: (line: string) => void;
  readonly now?: () => Date;
};

function contextPrefix(context?: LogContext): string {
  if (!context) {
    return '';
  }

  const parts: string[] = [];
  if (context.requestId) parts.push(`request=${context.requestId}`);
  if (context.toolCallId) parts.push(`call=${context.toolCallId}`);
  if (context.provider) parts.push(`provider=${context.provider}`);

  return parts.length ? `[${parts.join(' ')}] ` : '';
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return null;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'warn'];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel) => (message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    write(`${now().toISOString()} ${level.toUpperCase()} ${contextPrefix(context)}${message}`);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
