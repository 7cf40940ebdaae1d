// File-based logging system for termscroll components
// Provides structured logging with multiple output formats

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { Env } from './env.ts';
import { getCacheDir } from './xdg.ts';
import { ensureError } from './utils/error.ts';

/**
 * Get default log file path (~/.cache/termscroll/logs/termscroll.log)
 */
function getDefaultLogFile(): string {
  return join(getCacheDir(), 'logs', 'termscroll.log');
}

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
  sessionId?: string;
}

export interface LoggerOptions {
  // Path to log file; an empty string disables file output
  logFile?: string;

  level?: LogLevel;

  format?: 'json' | 'text' | 'structured';
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;

  bufferSize?: number;
  flushInterval?: number; // in milliseconds

  // Console output
  consoleOutput?: boolean;
  consoleLevel?: LogLevel;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  currentFileSize: number;
  bufferSize: number;
  lastFlush: Date;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class Logger {
  private _options: Required<LoggerOptions>;
  private _buffer: LogEntry[] = [];
  private _stats: LoggerStats;
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _currentLogFile?: string;
  private _disabled = false;
  private _sessionId: string;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? getDefaultLogFile(),
      level: options.level || 'INFO',
      format: options.format || 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize || 100,
      flushInterval: options.flushInterval ?? 1000,
      consoleOutput: options.consoleOutput ?? false,
      consoleLevel: options.consoleLevel || 'WARN',
    };

    this._sessionId = this._generateSessionId();
    this._stats = {
      totalEntries: 0,
      entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
      currentFileSize: 0,
      bufferSize: 0,
      lastFlush: new Date(),
    };
  }

  private _generateSessionId(): string {
    return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }

  get isDisabled(): boolean {
    return this._disabled;
  }

  get logFile(): string | undefined {
    return this._currentLogFile;
  }

  initialize(): void {
    if (this._currentLogFile || this._disabled) {
      return;
    }

    if (this._options.logFile.trim() === '') {
      this._disabled = true;
      return;
    }

    this._currentLogFile = this._options.logFile;

    try {
      mkdirSync(dirname(this._currentLogFile), { recursive: true });
    } catch (error) {
      this._disable(`Failed to create log directory for "${this._currentLogFile}"`, error);
      return;
    }

    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => {
        this._flushSync();
      }, this._options.flushInterval);
      // Never keep the host process alive just to flush logs
      this._flushTimer.unref();
    }

    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: {
        sessionId: this._sessionId,
        logFile: this._currentLogFile,
      },
      source: 'Logger',
    });
  }

  private _disable(reason: string, error: unknown): void {
    this._disabled = true;
    this._buffer = [];
    this._stats.bufferSize = 0;
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
    console.error(`${reason}: ${ensureError(error).message}. File logging disabled.`);
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this._options.level];
  }

  private _shouldConsole(level: LogLevel): boolean {
    return this._options.consoleOutput &&
           LOG_LEVELS[level] >= LOG_LEVELS[this._options.consoleLevel];
  }

  formatEntry(entry: LogEntry): string {
    switch (this._options.format) {
      case 'json':
        return JSON.stringify({
          ...entry,
          timestamp: entry.timestamp.toISOString(),
          error: entry.error ? {
            message: entry.error.message,
            stack: entry.error.stack,
            name: entry.error.name,
          } : undefined,
        }) + '\n';

      case 'text': {
        let text = '';
        if (this._options.includeTimestamp) {
          text += `[${entry.timestamp.toISOString()}] `;
        }
        if (this._options.includeLevel) {
          text += `${entry.level.padEnd(5)} `;
        }
        if (this._options.includeSource && entry.source) {
          text += `[${entry.source}] `;
        }
        text += entry.message;
        if (entry.context && Object.keys(entry.context).length > 0) {
          text += ` | ${JSON.stringify(entry.context)}`;
        }
        if (entry.error) {
          text += ` | ERROR: ${entry.error.message}`;
        }
        return text + '\n';
      }

      case 'structured':
      default: {
        let structured = '';
        if (this._options.includeTimestamp) {
          structured += `${entry.timestamp.toISOString()} `;
        }
        if (this._options.includeLevel) {
          structured += `[${entry.level}] `;
        }
        if (this._options.includeSource && entry.source) {
          structured += `${entry.source}: `;
        }
        structured += entry.message;

        if (entry.context && Object.keys(entry.context).length > 0) {
          structured += ' | ' + Object.entries(entry.context)
            .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
            .join(', ');
        }
        if (entry.error) {
          structured += `\n  Error: ${entry.error.message}`;
          if (entry.error.stack) {
            structured += `\n  Stack: ${entry.error.stack}`;
          }
        }
        return structured + '\n';
      }
    }
  }

  private _writeEntry(entry: LogEntry): void {
    if (!this._currentLogFile && !this._disabled) {
      this.initialize();
    }

    if (this._shouldConsole(entry.level)) {
      const formatted = this.formatEntry(entry).trim();
      if (entry.level === 'ERROR' || entry.level === 'FATAL') {
        console.error(formatted);
      } else if (entry.level === 'WARN') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this._disabled) {
      return;
    }

    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;

    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    if (this._buffer.length >= this._options.bufferSize) {
      this._flushSync();
    }
  }

  private _flushSync(): void {
    if (this._buffer.length === 0 || this._disabled || !this._currentLogFile) return;

    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      appendFileSync(this._currentLogFile, content, 'utf8');
      this._stats.currentFileSize += Buffer.byteLength(content, 'utf8');
      this._stats.lastFlush = new Date();
      this._stats.bufferSize = this._buffer.length;
    } catch (error) {
      this._disable(`Failed to write to log file "${this._currentLogFile}"`, error);
    }
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    if (!this._shouldLog(level)) return;
    this._writeEntry({
      timestamp: new Date(),
      level,
      message,
      error,
      context,
      source,
      sessionId: this._sessionId,
    });
  }

  // Public logging methods

  trace(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('TRACE', message, context, source);
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  warn(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('FATAL', message, context, source, error);
  }

  // Utility methods

  flush(): void {
    this._flushSync();
  }

  setLevel(level: LogLevel): void {
    this._options.level = level;
  }

  getLevel(): LogLevel {
    return this._options.level;
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  close(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }

    if (this._disabled || !this._currentLogFile) {
      return;
    }

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: {
        sessionId: this._sessionId,
        totalEntries: this._stats.totalEntries,
      },
      source: 'Logger',
      sessionId: this._sessionId,
    });

    this._flushSync();
  }
}

// Environment variable configuration helpers
function getLogLevelFromEnv(): LogLevel | undefined {
  const envLevel = Env.get('TERMSCROLL_LOG_LEVEL')?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return undefined;
}

// log.level and log.file from TermscrollConfig, once it is initialized
let configuredSettings: LoggingSettings | undefined;

function createDefaultLoggerOptions(): LoggerOptions {
  const configuredLevel = configuredSettings?.level?.toUpperCase();
  const level = configuredLevel && isLogLevel(configuredLevel) ? configuredLevel : getLogLevelFromEnv();
  const logFile = configuredSettings ? configuredSettings.logFile : Env.get('TERMSCROLL_LOG_FILE');
  return {
    level: level || 'INFO',
    // An empty log file path disables logging
    logFile: logFile ?? getDefaultLogFile(),
    format: 'structured',
    includeTimestamp: true,
    includeLevel: true,
    includeSource: true,
    bufferSize: 100,
    flushInterval: 1000,
    // Console output would corrupt the terminal UI
    consoleOutput: false,
    consoleLevel: 'ERROR',
  };
}

let globalLogger: Logger | undefined;
// True while globalLogger was created from the default options
let globalLoggerIsDefault = false;

export function createLogger(options?: LoggerOptions): Logger {
  const mergedOptions = { ...createDefaultLoggerOptions(), ...options };
  const logger = new Logger(mergedOptions);
  logger.initialize();
  return logger;
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(createDefaultLoggerOptions());
    globalLogger.initialize();
    globalLoggerIsDefault = true;
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger | undefined): void {
  globalLogger = logger;
  globalLoggerIsDefault = false;
}

export interface LoggingSettings {
  level?: string;
  logFile?: string;
}

/**
 * Apply configured log settings. Pass undefined to fall back to the
 * environment. A default global logger is closed and recreated on next use;
 * one installed with setGlobalLogger() is left alone.
 */
export function configureLogging(settings: LoggingSettings | undefined): void {
  configuredSettings = settings;
  if (globalLogger && globalLoggerIsDefault) {
    const previous = globalLogger;
    globalLogger = undefined;
    globalLoggerIsDefault = false;
    previous.close();
  }
}

// Component-specific logger interface that automatically includes source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  flush: () => void;
}

/**
 * Logger bound to a component name. Resolves the global logger on every
 * call, so a logger installed later with setGlobalLogger() is picked up by
 * module-level component loggers.
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
    flush: () => getGlobalLogger().flush(),
  };
}

// Convenience functions using global logger
export const log = {
  trace: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().trace(message, context, source),

  debug: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().debug(message, context, source),

  info: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().info(message, context, source),

  warn: (message: string, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().warn(message, context, source),

  error: (message: string, error?: Error, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().error(message, error, context, source),

  fatal: (message: string, error?: Error, context?: Record<string, unknown>, source?: string) =>
    getGlobalLogger().fatal(message, error, context, source),
};
