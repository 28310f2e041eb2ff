/**
 * Timetable Logger - component-tagged console logging
 * Optional per-run log file and raw HTML dumps of pages that failed to parse
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from './config.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

interface LogRecord {
  time: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
}

// ANSI escape codes
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  [LogLevel.DEBUG]: { label: 'DEBUG', color: DIM },
  [LogLevel.INFO]: { label: 'INFO', color: GREEN },
  [LogLevel.WARN]: { label: 'WARN', color: '\x1b[33m' },
  [LogLevel.ERROR]: { label: 'ERROR', color: '\x1b[31m' },
};

function fileLine(record: LogRecord): string {
  const data = record.data === undefined ? '' : ` ${JSON.stringify(record.data)}`;
  return `${record.time} [${LEVEL_STYLE[record.level].label}] [${record.component}] ${record.message}${data}`;
}

export class Logger {
  private readonly minLevel: LogLevel;
  private logDir: string;
  private sessionFile: string | null = null;
  private pending: LogRecord[] = [];

  constructor(minLevel: LogLevel, logDir: string = path.join(process.cwd(), 'logs')) {
    this.minLevel = minLevel;
    this.logDir = logDir;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  /**
   * Record everything logged from now on into `<dir>/<name>-<timestamp>.log`.
   * Raw HTML dumps follow the session into the same directory.
   */
  startSession(name: string = 'timetable', dir: string = this.logDir): string {
    this.logDir = dir;
    fs.mkdirSync(dir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.sessionFile = path.join(dir, `${name}-${stamp}.log`);
    this.pending = [];
    this.info('Logger', `Session started: ${this.sessionFile}`);
    return this.sessionFile;
  }

  /**
   * Write out buffered records and stop recording
   */
  endSession() {
    if (this.sessionFile && this.pending.length > 0) {
      fs.appendFileSync(this.sessionFile, this.pending.map(fileLine).join('\n') + '\n');
    }
    this.sessionFile = null;
    this.pending = [];
  }

  private log(level: LogLevel, component: string, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const time = new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
    const { label, color } = LEVEL_STYLE[level];
    console.log(`${DIM}${time}${RESET} ${color}${label.padEnd(5)}${RESET} ${CYAN}[${component}]${RESET} ${message}`);

    if (data !== undefined) {
      const body = JSON.stringify(data, null, 2).replace(/\n/g, '\n     ');
      console.log(`${DIM}  └─ ${body}${RESET}`);
    }

    if (this.sessionFile) {
      this.pending.push({ time, level, component, message, data });
    }
  }

  debug(component: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown) {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown) {
    this.log(LogLevel.ERROR, component, message, data);
  }

  /**
   * Boxed key/value table printed at the end of a CLI run
   */
  summary(title: string, stats: Record<string, number | string>) {
    const rows = Object.entries(stats).map(([key, value]) =>
      `${key.padEnd(20)} ${String(typeof value === 'number' ? value.toLocaleString() : value).padStart(12)}`
    );
    const width = Math.max(title.length, ...rows.map(row => row.length)) + 2;
    const line = (text: string, color = '') => `${CYAN}│${RESET} ${color}${text.padEnd(width - 2)}${RESET} ${CYAN}│${RESET}`;

    console.log(`\n${CYAN}╭${'─'.repeat(width)}╮${RESET}`);
    console.log(line(title, GREEN));
    console.log(`${CYAN}├${'─'.repeat(width)}┤${RESET}`);
    rows.forEach(row => console.log(line(row)));
    console.log(`${CYAN}╰${'─'.repeat(width)}╯${RESET}\n`);
  }

  /**
   * Dump a page that could not be parsed, for later inspection
   */
  saveRawHTML(reason: string, label: string, html: string): string {
    fs.mkdirSync(this.logDir, { recursive: true });
    const filename = `raw-${reason}-${label.replace(/[^A-Za-z0-9_-]+/g, '_')}-${Date.now()}.html`;
    const filepath = path.join(this.logDir, filename);
    fs.writeFileSync(filepath, html);
    this.warn('Logger', `Saved raw HTML: ${filename}`);
    return filepath;
  }
}

export const logger = new Logger(loadConfig().debug ? LogLevel.DEBUG : LogLevel.INFO);
