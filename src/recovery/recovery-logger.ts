/**
 * Recovery Logger
 * Keeps a structured record of a recovery run and optionally writes it out as markdown
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: RecoveryStage;
  event: string;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Pipeline stages for categorization
 */
export type RecoveryStage = 'init' | 'scan' | 'classify' | 'plan' | 'copy' | 'summary';

export type LogSink = (entry: LogEntry) => void;

export interface RecoveryLoggerOptions {
  /** Keep debug entries (one per matched or copied file) */
  verbose?: boolean;
  /** Markdown file written by flush() */
  logFile?: string;
  /** Receives every kept entry as it is logged */
  sink?: LogSink;
}

/**
 * Recovery logger class
 */
export class RecoveryLogger {
  private readonly verbose: boolean;
  private readonly logFile?: string;
  private readonly sink?: LogSink;
  private entries: LogEntry[] = [];

  constructor(options: RecoveryLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.logFile = options.logFile;
    this.sink = options.sink;
  }

  /**
   * Log an entry
   */
  log(
    stage: RecoveryStage,
    event: string,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info'
  ): void {
    if (level === 'debug' && !this.verbose) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      stage,
      event,
      message,
      data,
      level,
    };

    this.entries.push(entry);
    this.sink?.(entry);
  }

  debug(stage: RecoveryStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'debug');
  }

  info(stage: RecoveryStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'info');
  }

  warn(stage: RecoveryStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'warn');
  }

  error(stage: RecoveryStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'error');
  }

  success(stage: RecoveryStage, event: string, message: string, data?: Record<string, unknown>): void {
    this.log(stage, event, message, data, 'success');
  }

  /**
   * Log stage start
   */
  stageStart(stage: RecoveryStage, description: string, data?: Record<string, unknown>): void {
    this.info(stage, 'stage_start', `Starting: ${description}`, data);
  }

  /**
   * Log stage completion
   */
  stageComplete(stage: RecoveryStage, description: string, data?: Record<string, unknown>): void {
    this.success(stage, 'stage_complete', `Completed: ${description}`, data);
  }

  /**
   * Log stage failure
   */
  stageFailed(stage: RecoveryStage, description: string, error: string, data?: Record<string, unknown>): void {
    this.error(stage, 'stage_failed', `Failed: ${description} - ${error}`, data);
  }

  /**
   * Write the markdown log, if a log file was configured
   */
  async flush(): Promise<void> {
    if (!this.logFile) return;
    await fs.mkdir(path.dirname(this.logFile), { recursive: true });
    await fs.writeFile(this.logFile, this.formatMarkdown(), 'utf-8');
  }

  /**
   * Format log entries as markdown
   */
  formatMarkdown(): string {
    const lines: string[] = [
      '# Recovery Log',
      '',
      '---',
      '',
    ];

    // Group entries by date
    const entriesByDate = new Map<string, LogEntry[]>();

    for (const entry of this.entries) {
      const date = entry.timestamp.split('T')[0];
      const dateEntries = entriesByDate.get(date) ?? [];
      dateEntries.push(entry);
      entriesByDate.set(date, dateEntries);
    }

    for (const [date, dateEntries] of entriesByDate) {
      lines.push(`## Session: ${date}`);
      lines.push('');

      for (const entry of dateEntries) {
        const time = entry.timestamp.split('T')[1].split('.')[0];

        lines.push(`### [${time}] ${getLevelIcon(entry.level)} **${entry.stage}** - ${entry.message}`);

        if (entry.data && Object.keys(entry.data).length > 0) {
          lines.push('');
          lines.push('```json');
          lines.push(JSON.stringify(entry.data, null, 2));
          lines.push('```');
        }

        lines.push('');
      }
    }

    lines.push('---');
    lines.push('');
    lines.push('## Summary Statistics');
    lines.push('');
    lines.push(`- **Total Entries:** ${this.entries.length}`);
    lines.push(`- **Errors:** ${this.entries.filter((e) => e.level === 'error').length}`);
    lines.push(`- **Warnings:** ${this.entries.filter((e) => e.level === 'warn').length}`);
    lines.push(`- **Successful Steps:** ${this.entries.filter((e) => e.level === 'success').length}`);
    lines.push('');

    return lines.join('\n');
  }

  /**
   * Get all log entries
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Get entries for a specific stage
   */
  getEntriesForStage(stage: RecoveryStage): LogEntry[] {
    return this.entries.filter((e) => e.stage === stage);
  }

  /**
   * Get warning and error entries
   */
  getProblems(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'warn' || e.level === 'error');
  }
}

/**
 * Get icon for log level
 */
export function getLevelIcon(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}
