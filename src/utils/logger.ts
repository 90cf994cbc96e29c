import { AsyncLocalStorage } from 'async_hooks';
import { createWriteStream, mkdirSync, WriteStream } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
  runId?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/** JSON-lines file receiving every event logged on behalf of one run. */
class RunLog {
  readonly path: string;
  readonly runId: string;
  private stream: WriteStream;

  constructor(path: string, runId: string) {
    mkdirSync(dirname(path), { recursive: true });
    this.path = path;
    this.runId = runId;
    this.stream = createWriteStream(path, { flags: 'a' });
  }

  write(line: string): void {
    this.stream.write(line + '\n');
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end(() => resolve());
    });
  }
}

class Logger {
  private minLevel: LogLevel;
  private runLogs = new AsyncLocalStorage<RunLog>();

  constructor() {
    const level = process.env.LOG_LEVEL?.toLowerCase();
    this.minLevel = isLogLevel(level) ? level : 'info';
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Run `task` with its own run log. Everything logged from inside `task`,
   * including its async continuations, is also appended to the file at
   * `path`; concurrent runs each keep their own file.
   */
  async withRunLog<T>(path: string, runId: string, task: () => Promise<T>): Promise<T> {
    const runLog = new RunLog(path, runId);
    try {
      return await this.runLogs.run(runLog, task);
    } finally {
      await runLog.close();
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify(entry);
  }

  private log(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    const runLog = this.runLogs.getStore();
    // The run log keeps every event regardless of the console level
    if (!this.shouldLog(level) && !runLog) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...(data && { data }),
      ...(runLog && { runId: runLog.runId }),
    };

    const formatted = this.formatEntry(entry);

    runLog?.write(formatted);

    if (!this.shouldLog(level)) return;

    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
    };
    const reset = '\x1b[0m';

    if (process.env.NODE_ENV === 'production') {
      console.log(formatted);
    } else {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      console.log(`${colors[level]}[${entry.timestamp}] [${level.toUpperCase()}] [${component}] ${message}${dataStr}${reset}`);
    }
  }

  debug(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', component, message, data);
  }

  info(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', component, message, data);
  }

  warn(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', component, message, data);
  }

  error(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', component, message, data);
  }

  api(method: string, url: string, status: number, latencyMs: number, data?: Record<string, unknown>): void {
    this.debug('HTTP', `${method} ${url}`, { status, latencyMs, ...data, type: 'API_CALL' });
  }

  transfer(event: string, data: Record<string, unknown>, level: LogLevel = 'debug'): void {
    this.log(level, 'Transfer', event, { ...data, type: 'TRANSFER_EVENT' });
  }
}

export const logger = new Logger();
