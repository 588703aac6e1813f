// src/utils/logger.ts
import { CFG } from '../config.js';

interface LogLevel {
  ERROR: 0;
  WARN: 1;
  INFO: 2;
  DEBUG: 3;
}

type LevelName = keyof LogLevel;

const LOG_LEVELS: LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

export type LogMeta = Record<string, unknown>;

function isLevelName(value: string): value is LevelName {
  return Object.hasOwn(LOG_LEVELS, value);
}

class Logger {
  private level: number;

  constructor(level: LevelName = 'INFO') {
    this.level = LOG_LEVELS[level];
  }

  private log(level: LevelName, message: string, meta?: LogMeta) {
    if (LOG_LEVELS[level] > this.level) return;
    const timestamp = new Date().toISOString();

    if (level === 'ERROR') {
      console.error(`[${timestamp}] ${level}: ${message}`, meta || '');
    } else if (level === 'WARN') {
      console.warn(`[${timestamp}] ${level}: ${message}`, meta || '');
    } else {
      console.log(`[${timestamp}] ${level}: ${message}`, meta || '');
    }
  }

  error(message: string, meta?: LogMeta) {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('DEBUG', message, meta);
  }
}

const configured = CFG.logLevel.toUpperCase();

export const logger = new Logger(isLevelName(configured) ? configured : 'INFO');
