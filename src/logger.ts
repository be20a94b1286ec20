// src/logger.ts

import { RECORD_DESCRIPTIONS, UNKNOWN_RECORD_DESCRIPTION } from './constants/constants.js';
import type { LogContext, LogField, LoggerInstance, LogLevel } from './types/wits-types.js';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;
type ContextField = Exclude<LogField, 'timestamp' | 'level'>;

const VALID_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'transport',
  'source',
  'frameIndex',
  'symbolCode',
  'recordType',
  'line',
];

const HEADER_KEYS: ReadonlySet<string> = new Set(VALID_FIELDS);

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'highlight' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    highlight: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private groupLevel: number = 0;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logStats: {
    bySource: Record<string, number>;
    bySymbolCode: Record<string, number>;
    byRecordType: Record<number, number>;
  } = { bySource: {}, bySymbolCode: {}, byRecordType: {} };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'transport', 'source', 'frameIndex', 'symbolCode', 'line'];
  private customFormatters: Partial<Record<ContextField, (value: unknown) => string>> = {};
  private filters: {
    source: Set<string>;
    symbolCode: Set<string>;
    recordType: Set<number>;
  } = { source: new Set(), symbolCode: new Set(), recordType: new Set() };
  private highlightRules: Array<Pick<LogContext, 'source' | 'symbolCode' | 'recordType'>> = [];
  private watchCallback: WatchCallback | null = null;
  private logRateLimit: number = 100;
  private lastLogTime: number = 0;

  private static readonly DEFAULT_FORMATTERS: Record<ContextField, (value: unknown) => string> = {
    logger: v => `[${v}]`,
    transport: v => `[T:${v}]`,
    source: v => `[SRC:${v}]`,
    frameIndex: v => `[FR:${v}]`,
    symbolCode: v => `[SYM:${v}]`,
    recordType: v => {
      const description =
        typeof v === 'number' ? RECORD_DESCRIPTIONS[v] ?? UNKNOWN_RECORD_DESCRIPTION : UNKNOWN_RECORD_DESCRIPTION;
      return `[REC:${v}/${description}]`;
    },
    line: v => `[L:${v}]`,
  };

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private isHighlighted(context: LogContext): boolean {
    return this.highlightRules.some(
      rule =>
        (rule.source == null || rule.source === context.source) &&
        (rule.symbolCode == null || rule.symbolCode === context.symbolCode) &&
        (rule.recordType == null || rule.recordType === context.recordType)
    );
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns Header, indent, message parts and the colour reset sequence
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const highlight: string = this.useColors && this.isHighlighted(context) ? this.COLORS.highlight : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    for (const field of this.logFormat) {
      if (field === 'timestamp') {
        headerParts.push(`[${this.getTimestamp()}]`);
        continue;
      }
      if (field === 'level') {
        headerParts.push(`[${level.toUpperCase()}]`);
        continue;
      }
      const value = merged[field];
      if (value == null) continue;
      const formatter = this.customFormatters[field] ?? Logger.DEFAULT_FORMATTERS[field];
      headerParts.push(formatter(value));
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    // Поля, не попавшие в заголовок, выводим как JSON
    const extra: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      if (value === undefined || HEADER_KEYS.has(key)) continue;
      extra[key] = value;
    }
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return [`${color}${highlight}${headerParts.join('')}`, this.getIndent(), ...formattedArgs, reset];
  }

  /**
   * Determines whether a message passes the enabled flag, mute filters and level thresholds.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.source != null && this.filters.source.has(context.source)) return false;
    if (context.symbolCode != null && this.filters.symbolCode.has(context.symbolCode)) return false;
    if (context.recordType != null && this.filters.recordType.has(context.recordType)) return false;

    const category = context.logger;
    if (category != null && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === undefined || categoryLevel === 'none') return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate: boolean = false): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;
    if (context.source != null)
      this.logStats.bySource[context.source] = (this.logStats.bySource[context.source] ?? 0) + 1;
    if (context.symbolCode != null)
      this.logStats.bySymbolCode[context.symbolCode] = (this.logStats.bySymbolCode[context.symbolCode] ?? 0) + 1;
    if (context.recordType != null)
      this.logStats.byRecordType[context.recordType] = (this.logStats.byRecordType[context.recordType] ?? 0) + 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (!immediate && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    const formatted: string[] = this.format(level, args, context);
    if (this.useColors) {
      const head = formatted[0] ?? '';
      const indent = formatted[1] ?? '';
      console[level](head + indent, ...formatted.slice(2));
    } else {
      console[level](...formatted.filter(part => part !== ''));
    }
  }

  /**
   * Splits the trailing context object off the argument list.
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

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra }, level === 'warn' || level === 'error');
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  group(): void {
    this.groupLevel++;
  }

  groupEnd(): void {
    if (this.groupLevel > 0) this.groupLevel--;
  }

  setLevel(level: LogLevel): void {
    if (!this.LEVELS.includes(level)) throw new Error(`Unknown log level: ${level}`);
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level)) throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setTransportType(type: string): void {
    this.globalContext.transport = type;
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: ContextField, formatter: (value: unknown) => string): void {
    if (!(field in Logger.DEFAULT_FORMATTERS)) {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  mute({ source, symbolCode, recordType }: Partial<LogContext> = {}): void {
    if (source != null) this.filters.source.add(source);
    if (symbolCode != null) this.filters.symbolCode.add(symbolCode);
    if (recordType != null) this.filters.recordType.add(recordType);
  }

  unmute({ source, symbolCode, recordType }: Partial<LogContext> = {}): void {
    if (source != null) this.filters.source.delete(source);
    if (symbolCode != null) this.filters.symbolCode.delete(symbolCode);
    if (recordType != null) this.filters.recordType.delete(recordType);
  }

  highlight({ source, symbolCode, recordType }: Partial<LogContext> = {}): void {
    this.highlightRules.push({ source, symbolCode, recordType });
  }

  clearHighlights(): void {
    this.highlightRules = [];
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  summary(): void {
    console.log('\x1b[1;36m=== Logger Summary ===\x1b[0m');
    console.log(`Trace Messages: ${this.logCounts.trace}`);
    console.log(`Debug Messages: ${this.logCounts.debug}`);
    console.log(`Info Messages: ${this.logCounts.info}`);
    console.log(`Warn Messages: ${this.logCounts.warn}`);
    console.log(`Error Messages: ${this.logCounts.error}`);
    console.log(`Total Messages: ${Object.values(this.logCounts).reduce((sum, count) => sum + count, 0)}`);
    console.log(`By Source: ${JSON.stringify(this.logStats.bySource, null, 2)}`);
    console.log(`By Symbol Code: ${JSON.stringify(this.logStats.bySymbolCode, null, 2)}`);
    console.log(
      `By Record Type: ${JSON.stringify(
        Object.entries(this.logStats.byRecordType).reduce((acc: Record<string, number>, [rt, count]) => {
          acc[`${rt}/${RECORD_DESCRIPTIONS[Number(rt)] ?? UNKNOWN_RECORD_DESCRIPTION}`] = count;
          return acc;
        }, {}),
        null,
        2
      )}`
    );
    console.log(`Rate Limit: ${this.logRateLimit}ms`);
    console.log(`Current Level: ${this.currentLevel}`);
    console.log(
      `Categories: ${Object.keys(this.categoryLevels).length ? JSON.stringify(this.categoryLevels, null, 2) : 'None'}`
    );
    console.log(
      `Filters: source=${JSON.stringify([...this.filters.source])}, symbolCode=${JSON.stringify([...this.filters.symbolCode])}, recordType=${JSON.stringify([...this.filters.recordType])}`
    );
    console.log('\x1b[1;36m=====================\x1b[0m');
  }

  /**
   * Creates a logger instance bound to a category.
   * @param name - Category name, shown in the [logger] header field
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Error) {
    return false;
  }
  return Object.values(value).every(
    v => v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

/** Process-wide logger shared by the library modules */
export const rootLogger = new Logger();
rootLogger.setLevel('error');

export default Logger;
