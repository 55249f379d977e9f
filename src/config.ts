import fs from 'fs';
import path from 'path';
import type { Level } from './utils/logger';
import { isLevel } from './utils/logger';
import { DEFAULT_KICAD_CLI } from './renderService';
import { DEFAULT_SUPERSAMPLE } from './pipeline/crop';

export type Config = {
  kicadCli: string;
  supersample: number;
  logDir: string;
  logLevel: Level;
  debug: boolean;
  debugDir: string;
};

type Env = Record<string, string | undefined>;

export function parseEnvFile(contents: string): Record<string, string> {
  const out: Record<string, string> = {};
  contents.split(/\r?\n/).forEach(line => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) return;
    out[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim();
  });
  return out;
}

/** Copies `.env` entries into `env` without overriding values already set. */
export function loadEnvFile(dir = process.cwd(), env: Env = process.env): void {
  const envPath = path.join(dir, '.env');
  if (!fs.existsSync(envPath)) return;
  const entries = parseEnvFile(fs.readFileSync(envPath, 'utf8'));
  for (const [key, value] of Object.entries(entries)) {
    if (!env[key]) env[key] = value;
  }
}

function isTruthy(v: string | undefined): boolean {
  return ['1', 'true', 'yes'].includes(String(v || '').toLowerCase());
}

export function parseSupersample(v: string | undefined): number | null {
  if (v === undefined || v.trim() === '') return null;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : null;
}

export function loadConfig(env: Env = process.env, cwd = process.cwd()): Config {
  const level = String(env.LOG_LEVEL || 'info').toLowerCase();
  return {
    kicadCli: env.SHEETCROP_KICAD_CLI || DEFAULT_KICAD_CLI,
    supersample: parseSupersample(env.SHEETCROP_SUPERSAMPLE) ?? DEFAULT_SUPERSAMPLE,
    logDir: env.LOG_DIR || path.join(cwd, 'debug', 'logs'),
    logLevel: isLevel(level) ? level : 'info',
    debug: isTruthy(env.SHEETCROP_DEBUG),
    debugDir: path.join(cwd, 'debug', 'crops'),
  };
}
