// src/logger.ts

import type { LogContext, LogEntry, LoggerInstance, LogLevel } from './types/rotator-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'session' | 'peer' | 'protocol' | 'direction';

const HEADER_KEYS = ['logger', 'session', 'peer', 'protocol', 'direction'] as const;

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = [
    'timestamp',
    'level',
    'logger',
    'session',
    'peer',
    'protocol',
    'direction',
  ];
  private watchCallback: ((entry: LogEntry) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @param level - Log level (trace, debug, info, warn, error)
   * @param args - Arguments to be logged
   * @param context - Context object with additional information
   * @returns Formatted log message parts
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && context.logger)
      headerParts.push(`[${context.logger}]`);
    if (this.logFormat.includes('session') && context.session != null)
      headerParts.push(`[#${context.session}]`);
    if (this.logFormat.includes('peer') && context.peer) headerParts.push(`[${context.peer}]`);
    if (this.logFormat.includes('direction') && context.direction) {
      const protocol = this.logFormat.includes('protocol') && context.protocol;
      headerParts.push(protocol ? ` ${context.direction} ${protocol}:` : ` ${context.direction}:`);
    } else if (this.logFormat.includes('protocol') && context.protocol) {
      headerParts.push(` ${context.protocol}:`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Anything outside the header fields is appended as JSON
    const contextToPrint: Record<string, unknown> = { ...context };
    for (const key of HEADER_KEYS) delete contextToPrint[key];
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  /**
   * Determines whether a log message should be logged based on level and category.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const categoryLevel = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (categoryLevel === 'none') return false;
    const threshold = categoryLevel ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted: string[] = this.format(level, args, context);
    // console.trace would print a stack
    const method = level === 'trace' ? 'debug' : level;
    console[method](...formatted);
  }

  /**
   * Splits the arguments into the main arguments and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  trace(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('trace', newArgs, context);
  }

  debug(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('debug', newArgs, context);
  }

  info(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('info', newArgs, context);
  }

  warn(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('warn', newArgs, context);
  }

  error(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('error', newArgs, context);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  disable(): void {
    this.enabled = false;
  }

  isLevel(value: string): value is LogLevel {
    return this.LEVELS.some(level => level === value);
  }

  disableColors(): void {
    this.useColors = false;
  }

  setLogFormat(fields: LogField[]): void {
    this.logFormat = [...fields];
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  watch(callback: (entry: LogEntry) => void): void {
    this.watchCallback = callback;
  }

  /**
   * Creates a logger instance bound to a category.
   * @param name - Category name, shown in the header and used for per-category levels
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const emit = (level: LogLevel, args: unknown[]): void => {
      const { args: newArgs, context } = this.splitArgsAndContext(args);
      this.output(level, newArgs, { ...context, logger: name });
    };
    return {
      trace: (...args: unknown[]) => emit('trace', args),
      debug: (...args: unknown[]) => emit('debug', args),
      info: (...args: unknown[]) => emit('info', args),
      warn: (...args: unknown[]) => emit('warn', args),
      error: (...args: unknown[]) => emit('error', args),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error)
  );
}

/** Process-wide logger shared by every category */
export const logger = new Logger();

export default Logger;
