/**
 * Unified runtime configuration loader.
 *
 * Goals:
 *  - Provide a single parsed, typed surface for environment driven behavior.
 *  - Keep process.env reads out of the citekey / CSL services (they call getRuntimeConfig()).
 *
 * Variables (all optional):
 *  CITE_LOG_LEVEL, CITE_LOG_JSON, CITE_LOG_FILE, CITE_LOG_SYNC,
 *  CITE_PRUNE_DEPTH, CITE_ALLOW_INVALID_CSL,
 *  CITE_STANDARDIZE_CACHE_SIZE, CITE_CSL_SCHEMA
 */
import path from 'path';
import { getBooleanEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  sync: boolean;
  file?: string;
  rawFileValue?: string;
  sentinelRequested: boolean;
}

interface PruneConfig {
  enabled: boolean;
  maxDepth: number;
}

interface StandardizeConfig {
  cacheSize: number;
}

interface SchemaConfig {
  file?: string; // override of the pinned schemas/csl-data.json
}

export interface RuntimeConfig {
  logging: LoggingConfig;
  prune: PruneConfig;
  standardize: StandardizeConfig;
  schema: SchemaConfig;
}

const CWD = process.cwd();

function toAbsolute(raw: string): string {
  return path.isAbsolute(raw) ? raw : path.resolve(CWD, raw);
}

function numberFromEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if(!raw) return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}

function clamp(value: number, min: number, max: number): number {
  if(value < min) return min;
  if(value > max) return max;
  return value;
}

function optionalStringFromEnv(name: string): string | undefined {
  const raw = process.env[name];
  if(raw && raw.trim().length) return raw.trim();
  return undefined;
}

function parseLogLevel(): LogLevel {
  const raw = (process.env.CITE_LOG_LEVEL || '').trim().toLowerCase();
  const match = LOG_LEVELS.find(l => l === raw);
  return match ?? 'info';
}

function resolveLogFile(): { file?: string; raw?: string; sentinelRequested: boolean } {
  const raw = process.env.CITE_LOG_FILE;
  if(!raw) return { raw: undefined, sentinelRequested: false };
  const normalized = raw.trim().toLowerCase();
  const isSentinel = raw === '1' || ['true','yes','on'].includes(normalized);
  if(isSentinel){
    return {
      file: toAbsolute(path.join('logs','citekey-csl.log')),
      raw,
      sentinelRequested: true,
    };
  }
  return { file: toAbsolute(raw), raw, sentinelRequested: false };
}

function parseLoggingConfig(): LoggingConfig {
  const fileInfo = resolveLogFile();
  return {
    level: parseLogLevel(),
    json: getBooleanEnv('CITE_LOG_JSON'),
    sync: getBooleanEnv('CITE_LOG_SYNC'),
    file: fileInfo.file,
    rawFileValue: fileInfo.raw,
    sentinelRequested: fileInfo.sentinelRequested,
  };
}

function parsePruneConfig(): PruneConfig {
  return {
    enabled: !getBooleanEnv('CITE_ALLOW_INVALID_CSL'),
    maxDepth: Math.trunc(clamp(numberFromEnv('CITE_PRUNE_DEPTH', 5), 0, 50)),
  };
}

function parseStandardizeConfig(): StandardizeConfig {
  return {
    cacheSize: Math.trunc(clamp(numberFromEnv('CITE_STANDARDIZE_CACHE_SIZE', 5000), 1, 1_000_000)),
  };
}

function parseSchemaConfig(): SchemaConfig {
  const file = optionalStringFromEnv('CITE_CSL_SCHEMA');
  return { file: file ? toAbsolute(file) : undefined };
}

export function loadRuntimeConfig(): RuntimeConfig {
  return {
    logging: parseLoggingConfig(),
    prune: parsePruneConfig(),
    standardize: parseStandardizeConfig(),
    schema: parseSchemaConfig(),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}
