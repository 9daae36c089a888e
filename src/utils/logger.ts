/*
 * Structured logger with key redaction and LOG_LEVEL support.
 * Writes one JSON object per line so log shippers can ingest it as-is.
 */

type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type ActiveLevel = Exclude<Level, 'silent'>;

const LEVELS: Record<ActiveLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const KNOWN_LEVELS: readonly Level[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLevel(value: string): value is Level {
  return (KNOWN_LEVELS as readonly string[]).includes(value);
}

function currentLevel(): Level {
  const lvl = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(lvl) ? lvl : 'info';
}

function levelEnabled(lvl: ActiveLevel): boolean {
  const cur = currentLevel();
  if (cur === 'silent') return false;
  return LEVELS[lvl] >= LEVELS[cur];
}

// Keys whose values never reach the log line
const SENSITIVE_KEYS = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'password',
  'token',
  'rt_token',
  'rttoken',
  'apikey',
  'x-api-key',
  'secret',
  'databaseurl',
  'connectionstring',
]);

function isObject(val: unknown): val is Record<string, unknown> {
  return !!val && typeof val === 'object' && !Array.isArray(val);
}

export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    if (/^(Bearer|token)\s+/i.test(value)) return `${value.split(/\s+/)[0]} [REDACTED]`;
    // credentials embedded in connection strings
    if (/^[a-z]+:\/\/[^:/\s]+:[^@\s]+@/i.test(value)) return value.replace(/\/\/([^:/\s]+):[^@\s]+@/, '//$1:[REDACTED]@');
  }
  return value;
}

export function redactObject(input: Record<string, unknown>, allowList: string[] = []): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(input)) {
    const lowered = k.toLowerCase();
    if (SENSITIVE_KEYS.has(lowered) && !allowList.includes(lowered)) {
      out[k] = '[REDACTED]';
      continue;
    }
    if (isObject(v)) out[k] = redactObject(v, allowList);
    else if (Array.isArray(v)) out[k] = v.map((i) => (isObject(i) ? redactObject(i, allowList) : redactValue(i)));
    else out[k] = redactValue(v);
  }
  return out;
}

function normalizeContext(ctx?: unknown): Record<string, unknown> | undefined {
  if (ctx == null) return undefined;
  if (ctx instanceof Error) return { error: ctx.message, errorName: ctx.name };
  if (isObject(ctx)) return ctx;
  return { value: ctx };
}

function write(level: ActiveLevel, msg: string, ctx?: unknown) {
  if (!levelEnabled(level)) return;
  const base: Record<string, unknown> = {
    level,
    msg,
    timestamp: new Date().toISOString(),
  };
  const normalized = normalizeContext(ctx);
  const payload = normalized ? { ...base, ...redactObject(normalized) } : base;
  const line = JSON.stringify(payload);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

function toContext(args: unknown[]): unknown {
  if (args.length === 0) return undefined;
  if (args.length === 1) return args[0];
  return args;
}

export const logger = {
  debug: (msg: string, ...ctx: unknown[]) => write('debug', msg, toContext(ctx)),
  info: (msg: string, ...ctx: unknown[]) => write('info', msg, toContext(ctx)),
  warn: (msg: string, ...ctx: unknown[]) => write('warn', msg, toContext(ctx)),
  error: (msg: string, ...ctx: unknown[]) => write('error', msg, toContext(ctx)),
};

export type { Level };
