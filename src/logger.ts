/**
 * portcullis — Structured logger
 *
 * - Levels: debug, info, warn, error (silent disables output)
 * - ISO timestamp and component on every line
 * - JSONL output when PORTCULLIS_LOG_JSON=1, text otherwise
 * - Bound fields (runId, tool, ...) instead of a global correlation context
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport and
 * to CLI results.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minLevel(): number {
  const raw = (process.env['PORTCULLIS_LOG_LEVEL'] ?? 'info').toLowerCase();
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function emit(
  level: Exclude<LogLevel, 'silent'>,
  component: string,
  bound: LogFields,
  message: string,
  data?: LogFields,
): void {
  if (LEVEL_ORDER[level] < minLevel()) return;

  const ts = new Date().toISOString();
  const fields = { ...bound, ...data };
  const hasFields = Object.keys(fields).length > 0;

  let line: string;
  if (process.env['PORTCULLIS_LOG_JSON'] === '1') {
    line = JSON.stringify({ ts, level, component, msg: message, ...fields });
  } else {
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
    line = hasFields ? `${prefix} ${message} ${JSON.stringify(fields)}` : `${prefix} ${message}`;
  }
  process.stderr.write(line + '\n');
}

export interface Logger {
  debug(msg: string, data?: LogFields): void;
  info(msg: string, data?: LogFields): void;
  warn(msg: string, data?: LogFields): void;
  error(msg: string, data?: LogFields): void;
  child(component: string, fields?: LogFields): Logger;
}

export function createLogger(component: string, fields: LogFields = {}): Logger {
  return {
    debug: (msg, data) => emit('debug', component, fields, msg, data),
    info: (msg, data) => emit('info', component, fields, msg, data),
    warn: (msg, data) => emit('warn', component, fields, msg, data),
    error: (msg, data) => emit('error', component, fields, msg, data),
    child: (sub, extra) => createLogger(`${component}:${sub}`, { ...fields, ...extra }),
  };
}
