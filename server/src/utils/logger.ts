type Fields = Record<string, unknown>;
type Level = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(v: string): v is Level {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

let configured: LogLevel | null = null;

/** Overrides `LOG_LEVEL` from the environment. */
export function setLogLevel(level: LogLevel) {
  configured = level;
}

function threshold(): number {
  const raw = (configured ?? process.env.LOG_LEVEL ?? 'info').toLowerCase();
  if (raw === 'silent') return Number.POSITIVE_INFINITY;
  return isLevel(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

function toErrorPayload(err: unknown): unknown {
  if (!err) return undefined;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}

function emit(level: Level, msg?: string, fields: Fields = {}) {
  if (LEVEL_RANK[level] < threshold()) return;
  const payload: Fields = {
    level,
    time: new Date().toISOString(),
    ...fields,
    msg: msg || (typeof fields.msg === 'string' ? fields.msg : ''),
  };
  // Normalize embedded error if present
  if ('err' in fields) {
    payload.err = toErrorPayload(fields.err);
  }
  const line = JSON.stringify(payload);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function bind(level: Level) {
  return (arg1?: string | Fields, arg2?: string) => {
    if (typeof arg1 === 'string') return emit(level, arg1);
    emit(level, arg2, arg1 || {});
  };
}

export const logger = {
  info: bind('info'),
  warn: bind('warn'),
  error: bind('error'),
  debug: bind('debug'),
};

export type { Fields };
