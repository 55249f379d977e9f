import fs from 'fs';
import path from 'path';

export type Level = 'debug' | 'info' | 'warn' | 'error';

export const LEVELS: readonly Level[] = ['debug', 'info', 'warn', 'error'];

export type LogSink = {
  debug: (message: string, meta?: unknown) => void;
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
};

export type Logger = LogSink & {
  dir: string;
  file: string;
  level: Level;
  log: (level: Level, message: string, meta?: unknown) => void;
};

export type LoggerOptions = { dir?: string; level?: Level };

export function isLevel(v: string): v is Level {
  return (LEVELS as readonly string[]).includes(v);
}

function serializeMeta(meta: unknown): unknown {
  if (meta instanceof Error) return { name: meta.name, message: meta.message };
  return meta;
}

/**
 * JSON-lines logger writing to `<dir>/latest.log`. Older `.log` files in
 * the directory are removed when the logger is created.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const root = options.dir || process.env.LOG_DIR || path.join(process.cwd(), 'debug', 'logs');
  fs.mkdirSync(root, { recursive: true });
  const file = path.join(root, 'latest.log');
  const envLevel = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  const level: Level = options.level ?? (isLevel(envLevel) ? envLevel : 'info');
  const threshold = LEVELS.indexOf(level);

  for (const f of fs.readdirSync(root)) {
    if (f.endsWith('.log') && f !== path.basename(file)) {
      fs.rmSync(path.join(root, f), { force: true });
    }
  }
  fs.writeFileSync(file, '');

  let failed = false;
  function append(line: string) {
    try {
      fs.appendFileSync(file, line + '\n');
    } catch (e) {
      if (failed) return;
      failed = true;
      process.stderr.write(`[sheetcrop] log file ${file} is not writable: ${String(e)}\n`);
    }
  }

  function log(entryLevel: Level, message: string, meta?: unknown) {
    if (LEVELS.indexOf(entryLevel) < threshold) return;
    const entry = {
      t: new Date().toISOString(),
      level: entryLevel,
      msg: message,
      meta: meta === undefined ? undefined : serializeMeta(meta),
    };
    append(JSON.stringify(entry));
  }

  return {
    dir: root,
    file,
    level,
    log,
    debug: (m, meta) => log('debug', m, meta),
    info: (m, meta) => log('info', m, meta),
    warn: (m, meta) => log('warn', m, meta),
    error: (m, meta) => log('error', m, meta),
  };
}
