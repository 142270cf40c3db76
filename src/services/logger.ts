import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key
  msg?: string;
  data?: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

let logFileHandle: fs.WriteStream | null = null;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

let exitHookInstalled = false;

// Lazily opened on first emit when CITE_LOG_FILE is set
function initializeFileLogging(): void {
  const cfg = loggingCfg();
  const logFile = cfg.file;
  if (!logFile || logFileHandle) return;

  try {
    const logDir = path.dirname(logFile);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const existed = fs.existsSync(logFile);
    logFileHandle = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf8' });
    logFileHandle.write(`\n=== citekey-csl session started: ${new Date().toISOString()} ===\n`);
    if (!exitHookInstalled) {
      exitHookInstalled = true;
      process.on('exit', () => {
        if (logFileHandle && !logFileHandle.destroyed) {
          logFileHandle.write(`=== Session Ended: ${new Date().toISOString()} ===\n\n`);
          logFileHandle.end();
        }
      });
    }

    if (levelEnabled('info')) {
      const diag: LogRecord = {
        ts: new Date().toISOString(),
        level: 'info',
        evt: 'logger_init',
        data: {
          file: logFile,
          requested: cfg.rawFileValue,
          sentinel: cfg.sentinelRequested,
          created: !existed,
          size: existed ? fs.statSync(logFile).size : 0,
          pid: process.pid,
          cwd: process.cwd(),
        },
      };
      // written directly; emit() would re-enter file initialization
      const line = formatLogRecord(diag, cfg.json);
      console.error(line);
      logFileHandle.write(line + '\n');
    }
  } catch (error) {
    // stderr stays the only sink
    console.error(`[logger] Failed to initialize file logging to ${logFile}: ${error}`);
  }
}

/** Close the log file; the next record reopens it from the current config. */
export function closeLogFile(): Promise<void> {
  const handle = logFileHandle;
  logFileHandle = null;
  if (!handle || handle.destroyed) return Promise.resolve();
  return new Promise(resolve => handle.end(() => resolve()));
}

export function levelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[loggingCfg().level];
}

export function formatLogRecord(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg||''];
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  if(!levelEnabled(rec.level)) return;
  const cfg = loggingCfg();
  if (!logFileHandle && cfg.file) {
    initializeFileLogging();
  }

  const logLine = formatLogRecord(rec, cfg.json);
  console.error(logLine);

  if (logFileHandle && !logFileHandle.destroyed) {
    logFileHandle.write(logLine + '\n');
    if(cfg.sync) {
      const fd: unknown = Reflect.get(logFileHandle, 'fd');
      if(typeof fd === 'number') fs.fsyncSync(fd);
    }
  }
}

export function log(level: LogLevel, evt: string, fields: Omit<LogRecord,'level'|'evt'|'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt:string, f?:unknown)=> log('debug', evt, { data:f });
export const logInfo = (evt:string, f?:unknown)=> log('info', evt, { data:f });
export const logWarn = (evt:string, f?:unknown)=> log('warn', evt, { data:f });
export const logError = (evt:string, f?:unknown)=> log('error', evt, { data:f });
