export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
  branchId?: string;
}

export type LogTransport = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown, branchId?: string): void;
  info(message: string, data?: unknown, branchId?: string): void;
  warn(message: string, data?: unknown, branchId?: string): void;
  error(message: string, data?: unknown, branchId?: string): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalTransports: LogTransport[] = [];
let globalMinLevel: LogLevel = 'info';

/** Add a transport that receives all log entries */
export function addLogTransport(transport: LogTransport): () => void {
  globalTransports.push(transport);
  return () => {
    globalTransports = globalTransports.filter((t) => t !== transport);
  };
}

/** Set the minimum log level (entries below this are dropped) */
export function setLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/** Console transport, registered by default. Info and below go to stdout, warnings and errors to stderr. */
export function consoleTransport(entry: LogEntry): void {
  const prefix = entry.branchId ? `[${entry.scope}:${entry.branchId.slice(0, 8)}]` : `[${entry.scope}]`;
  const msg = entry.data !== undefined
    ? `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`
    : `${prefix} ${entry.message}`;

  switch (entry.level) {
    case 'debug':
    case 'info':
      process.stdout.write(`${msg}\n`);
      break;
    case 'warn':
      process.stderr.write(`WARN ${msg}\n`);
      break;
    case 'error':
      process.stderr.write(`ERROR ${msg}\n`);
      break;
  }
}

/** Redact API keys and bearer tokens from log messages */
export function redactSecrets(message: string): string {
  return message
    .replace(/\b(sk-[a-zA-Z0-9_-]{4})[a-zA-Z0-9_-]{16,}/g, '$1****')
    .replace(/(Bearer\s+)[^\s"']+/g, '$1****');
}

function emit(entry: LogEntry): void {
  if (LOG_LEVELS[entry.level] < LOG_LEVELS[globalMinLevel]) return;
  const sanitized = { ...entry, message: redactSecrets(entry.message) };
  for (const transport of globalTransports) {
    try {
      transport(sanitized);
    } catch (error) {
      // a failing transport must not break the caller
      process.stderr.write(`[logger] transport failed: ${String(error)}\n`);
    }
  }
}

/**
 * Create a scoped logger. Each module creates one:
 *   const log = createLogger('BranchLifecycle');
 *   log.info('Branch completed', { name }, branch.id);
 */
export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: unknown, branchId?: string): void {
    emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
      branchId,
    });
  }

  return {
    debug: (message, data, branchId) => log('debug', message, data, branchId),
    info: (message, data, branchId) => log('info', message, data, branchId),
    warn: (message, data, branchId) => log('warn', message, data, branchId),
    error: (message, data, branchId) => log('error', message, data, branchId),
  };
}

addLogTransport(consoleTransport);
