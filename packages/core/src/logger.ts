/**
 * Structured logger for flashsync.
 *
 * Writes debug logs to `.flashsync/logs/` so users can attach a log file
 * when reporting a sync problem. Console echo (`--verbose`) goes through
 * the `onLog` hook.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ─── Types ──────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Logs go to `<projectDir>/.flashsync/logs/`; no file when omitted */
  projectDir?: string;
  /** Command name, used as the log file prefix */
  command?: string;
  /** An optional callback invoked on every log entry (for testing / custom sinks) */
  onLog?: (entry: LogEntry) => void;
  /** Keep entries in memory (default true) */
  capture?: boolean;
}

// ─── Logger ─────────────────────────────────────────────────────────

export class Logger {
  private logFilePath: string | null = null;
  private onLog?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private capture: boolean;
  private fileStream: fs.WriteStream | null = null;
  private fileClosed: Promise<void> = Promise.resolve();

  constructor(opts: LoggerOptions = {}) {
    this.onLog = opts.onLog;
    this.capture = opts.capture ?? true;

    if (opts.projectDir) {
      const logDir = path.join(opts.projectDir, '.flashsync', 'logs');
      fs.mkdirSync(logDir, { recursive: true });

      const timestamp = new Date()
        .toISOString()
        .replace(/[:.]/g, '-')
        .replace('T', '_')
        .slice(0, 19);
      this.logFilePath = path.join(logDir, `${opts.command ?? 'run'}-${timestamp}.log`);
      const stream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.fileClosed = new Promise((resolve) => stream.once('close', () => resolve()));
      // Errors switch file logging off
      stream.on('error', (error) => this.disableFile(error));
      this.fileStream = stream;
      this.info('logger', 'Log session started', { logFile: this.logFilePath });
    }
  }

  /** Path to the current log file, or '' when logging in memory only */
  get filePath(): string {
    return this.logFilePath ?? '';
  }

  /** All entries captured this session (in-memory) */
  get allEntries(): readonly LogEntry[] {
    return this.entries;
  }

  // ── Public logging methods ────────────────────────────────────────

  debug(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', category, message, data);
  }

  // ── Specialised helpers ───────────────────────────────────────────

  /** Log an LLM request being sent */
  llmRequest(opts: { operation: string; model: string; promptChars: number }): void {
    this.debug('llm', `Sending ${opts.operation} request to ${opts.model}`, {
      promptChars: opts.promptChars,
    });
  }

  /** Log an LLM response received */
  llmResponse(opts: {
    operation: string;
    model: string;
    inputTokens: number;
    outputTokens: number;
    latencyMs: number;
  }): void {
    this.debug('llm', `Response from ${opts.model} (${opts.operation})`, {
      inputTokens: opts.inputTokens,
      outputTokens: opts.outputTokens,
      latencyMs: opts.latencyMs,
    });
  }

  /** Log an LLM error with full API details */
  llmError(opts: {
    operation: string;
    model: string;
    statusCode?: number;
    errorMessage: string;
    attempt?: number;
    maxAttempts?: number;
  }): void {
    const data: Record<string, unknown> = {
      operation: opts.operation,
      model: opts.model,
    };
    if (opts.statusCode !== undefined) data.statusCode = opts.statusCode;
    if (opts.attempt !== undefined) data.attempt = `${opts.attempt}/${opts.maxAttempts ?? '?'}`;
    this.error('llm', opts.errorMessage, data);
  }

  /** Log a card service call */
  remoteRequest(opts: { method: string; url: string; status: number; latencyMs: number }): void {
    this.debug('remote', `${opts.method} ${opts.url} -> ${opts.status}`, {
      latencyMs: opts.latencyMs,
    });
  }

  /** Log cache hit/miss counts for one pipeline stage */
  cacheEvent(opts: { domain: string; hits: number; misses: number }): void {
    this.info('cache', `${opts.domain}: ${opts.hits} hit(s), ${opts.misses} miss(es)`);
  }

  /** Resolves once the log file is closed and everything written to it is on disk */
  flushed(): Promise<void> {
    return this.fileClosed;
  }

  /** Flush and close the log file */
  close(): void {
    if (this.fileStream) {
      this.info('logger', 'Log session ended', {
        totalEntries: this.entries.length,
      });
      this.fileStream.end();
      this.fileStream = null;
    }
  }

  // ── Core write ────────────────────────────────────────────────────

  private disableFile(error: Error): void {
    const logFile = this.logFilePath;
    this.fileStream = null;
    this.logFilePath = null;
    this.warn('logger', `Log file disabled: ${error.message}`, { logFile });
  }

  private log(
    level: LogLevel,
    category: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      ...(data ? { data } : {}),
    };

    if (this.capture) this.entries.push(entry);
    this.onLog?.(entry);

    this.fileStream?.write(this.format(entry) + '\n');
  }

  private format(entry: LogEntry): string {
    const ts = entry.timestamp;
    const lvl = entry.level.toUpperCase().padEnd(5);
    const cat = `[${entry.category}]`.padEnd(10);
    let line = `${ts} ${lvl} ${cat} ${entry.message}`;
    if (entry.data) {
      line += ' ' + JSON.stringify(entry.data);
    }
    return line;
  }
}

// ─── Per-run logger (set once per CLI run) ──────────────────────────

let globalLogger: Logger | null = null;
const silentLogger = new Logger({ capture: false });

/** Initialise the run logger. Call once at CLI startup. */
export function initLogger(opts: LoggerOptions): Logger {
  if (globalLogger) {
    globalLogger.close();
  }
  globalLogger = new Logger(opts);
  return globalLogger;
}

/** Get the current run logger, or a silent logger if none was initialised. */
export function getLogger(): Logger {
  return globalLogger ?? silentLogger;
}
