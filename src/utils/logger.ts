import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LoggerOptions {
  logPath?: string;
  debug?: boolean;
}

export class Logger {
  private logPath: string;
  private component: string;
  private debugEnabled: boolean;

  constructor(component: string, options: LoggerOptions = {}) {
    this.component = component;
    this.logPath = options.logPath ?? Logger.defaultLogPath();
    this.debugEnabled = options.debug ?? process.env.JUNIT_LAUNCH_DEBUG === '1';
    this.ensureLogDirectory();
  }

  static defaultLogPath(cwd: string = process.cwd()): string {
    return path.join(cwd, '.junit-launch', 'debug.log');
  }

  /**
   * Logger for a sub-component writing to the same file with the same level
   */
  child(component: string): Logger {
    return new Logger(component, { logPath: this.logPath, debug: this.debugEnabled });
  }

  getLogPath(): string {
    return this.logPath;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  private ensureLogDirectory(): void {
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    } catch {
      // Directory might already exist
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
    return `${timestamp} ${level.padEnd(5)} | [${this.component}] ${message}${dataStr}`;
  }

  private writeLog(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    try {
      const formattedMessage = this.formatMessage(level, message, data);
      fs.appendFileSync(this.logPath, formattedMessage + '\n', 'utf8');
    } catch {
      // Logging must never break a launch
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.debugEnabled) {
      this.writeLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.writeLog('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.writeLog('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData: Record<string, unknown> = { ...data };
    if (error instanceof Error) {
      errorData.error = error.message;
      errorData.stack = error.stack;
    } else if (error !== undefined) {
      errorData.error = String(error);
    }
    this.writeLog('ERROR', message, Object.keys(errorData).length > 0 ? errorData : undefined);
  }

  /**
   * Log lifecycle events with consistent narrative structure
   */
  lifecycle(event: string, details?: Record<string, unknown>): void {
    this.info(`Lifecycle: ${event}`, details);
  }

  /**
   * Log command execution
   */
  command(cmd: string, args?: readonly string[]): void {
    this.info(`Executing command: ${cmd}`, { args });
  }

  /**
   * Log decision points
   */
  decision(description: string, choice: string, reason?: string): void {
    this.info(`Decision: ${description}`, { choice, reason });
  }
}
