export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** `null` silences the logger; omitted means read it from the environment. */
  level?: LogLevel | null;
  sink?: LogSink;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Report text owns stdout; records go to stderr and stay quiet unless asked for.
export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const v = String(raw ?? '').trim().toLowerCase();
  if (!v) return 'warn';
  if (v === 'silent' || v === 'off' || v === 'none' || v === '0') return null;
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return 'warn';
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function serializeError(e: unknown): { name?: string; message?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (e instanceof Error) return { name: e.name, message: e.message, stack: e.stack };
  return { message: String(e) };
}

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  child(fields: Record<string, unknown>): Logger;
  /** Time an async step; success is logged at debug, failure at error and rethrown. */
  span<T>(name: string, fields: Record<string, unknown>, fn: () => Promise<T>): Promise<T>;
}

export function createLogger(baseFields: Record<string, unknown> = {}, options: LoggerOptions = {}): Logger {
  const level =
    options.level !== undefined ? options.level : parseLogLevel(process.env.ODINDOC_LOG_LEVEL ?? process.env.LOG_LEVEL);
  const threshold = level ? levelOrder[level] : Infinity;
  const sink = options.sink ?? stderrSink;

  const write = (lvl: LogLevel, msg: string, fields?: Record<string, unknown>) => {
    if (levelOrder[lvl] < threshold) return;
    sink(JSON.stringify({ ts: new Date().toISOString(), level: lvl, msg, ...baseFields, ...(fields ?? {}) }));
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }, { level, sink }),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        write('debug', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
  };
}
