// src/utils/diagnostics.ts

import Logger from '../logger.js';
import type {
  DecodedFrame,
  DiagnosticsOptions,
  DiagnosticsStats,
  LoggerInstance,
} from '../types/wits-types.js';

const loggerInstance = new Logger();
loggerInstance.setLevel('info');
loggerInstance.setLogFormat(['timestamp', 'level', 'logger']);
loggerInstance.setCustomFormatter('logger', value => (value ? `[${value}]` : ''));

const LAST_ERRORS_LIMIT = 10;

export interface AnalysisResult {
  warnings: string[];
  isHealthy: boolean;
  stats: DiagnosticsStats;
}

function increment(counts: Record<string, number>, key: string, by: number = 1): void {
  counts[key] = (counts[key] ?? 0) + by;
}

/**
 * Collects statistics about decoded frames: issue counts by kind, unknown codes and symbol usage.
 */
class Diagnostics {
  private errorRateThreshold: number;
  private logger: LoggerInstance;
  private startTime: number;
  private framesDecoded: number = 0;
  private structuralErrors: number = 0;
  private framesWithIssues: number = 0;
  private dataPoints: number = 0;
  private symbolLookupErrors: number = 0;
  private valueCoercionErrors: number = 0;
  private conversionWarnings: number = 0;
  private unknownCodes: Record<string, number> = {};
  private symbolCounts: Record<string, number> = {};
  private lastFrameTimestamp: string | null = null;
  private lastErrors: string[] = [];

  constructor(options: DiagnosticsOptions = {}) {
    this.errorRateThreshold = options.errorRateThreshold ?? 10;
    this.logger = loggerInstance.createLogger(options.loggerName ?? 'Diagnostics');
    this.logger.setLevel('warn');
    this.startTime = Date.now();
  }

  /**
   * Resets all counters and restarts the uptime clock.
   */
  reset(): void {
    this.startTime = Date.now();
    this.framesDecoded = 0;
    this.structuralErrors = 0;
    this.framesWithIssues = 0;
    this.dataPoints = 0;
    this.symbolLookupErrors = 0;
    this.valueCoercionErrors = 0;
    this.conversionWarnings = 0;
    this.unknownCodes = {};
    this.symbolCounts = {};
    this.lastFrameTimestamp = null;
    this.lastErrors = [];
  }

  /**
   * Adds one decoded frame to the statistics.
   */
  recordFrame(frame: DecodedFrame): void {
    this.framesDecoded++;
    this.dataPoints += frame.dataPoints.length;
    this.conversionWarnings += frame.warnings.length;
    this.lastFrameTimestamp = frame.timestamp.toISOString();

    for (const point of frame.dataPoints) increment(this.symbolCounts, point.symbolCode);

    for (const issue of frame.issues) {
      switch (issue.kind) {
        case 'structural':
          this.structuralErrors++;
          break;
        case 'symbol-lookup':
          this.symbolLookupErrors++;
          increment(this.unknownCodes, issue.code ?? '');
          break;
        case 'value-coercion':
          this.valueCoercionErrors++;
          break;
      }
      this.lastErrors.push(issue.message);
    }
    if (this.lastErrors.length > LAST_ERRORS_LIMIT) {
      this.lastErrors = this.lastErrors.slice(-LAST_ERRORS_LIMIT);
    }

    if (frame.issues.length > 0) {
      this.framesWithIssues++;
      this.logger.debug(`Frame with ${frame.issues.length} issues`, { source: frame.source });
      this.sendNotification(frame.source);
    }
  }

  private sendNotification(source: string): void {
    const rate = this.errorRate;
    if (rate === null || rate <= this.errorRateThreshold) return;
    this.logger.warn('Excessive decode errors detected', {
      source,
      errorRate: rate.toFixed(2),
      framesWithIssues: this.framesWithIssues,
    });
  }

  /** Percentage of frames that carried at least one issue */
  get errorRate(): number | null {
    return this.framesDecoded === 0 ? null : (this.framesWithIssues / this.framesDecoded) * 100;
  }

  get uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  get framesPerSecond(): number {
    const elapsed = (Date.now() - this.startTime) / 1000;
    return elapsed <= 0 ? 0 : this.framesDecoded / elapsed;
  }

  /**
   * Checks the statistics against the configured threshold.
   */
  analyze(): AnalysisResult {
    const warnings: string[] = [];
    const rate = this.errorRate;
    if (rate !== null && rate > this.errorRateThreshold) {
      warnings.push(`High error rate: ${rate.toFixed(2)}% (threshold: ${this.errorRateThreshold}%)`);
    }
    if (this.structuralErrors > 0) {
      warnings.push(`Structural errors: ${this.structuralErrors}`);
    }
    const unknown = Object.keys(this.unknownCodes);
    if (unknown.length > 0) {
      warnings.push(`Unknown symbol codes: ${unknown.sort().join(', ')}`);
    }
    return { warnings, isHealthy: warnings.length === 0, stats: this.getStats() };
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: this.uptimeSeconds,
      framesDecoded: this.framesDecoded,
      structuralErrors: this.structuralErrors,
      framesWithIssues: this.framesWithIssues,
      dataPoints: this.dataPoints,
      symbolLookupErrors: this.symbolLookupErrors,
      valueCoercionErrors: this.valueCoercionErrors,
      conversionWarnings: this.conversionWarnings,
      errorRate: this.errorRate,
      framesPerSecond: this.framesPerSecond,
      unknownCodes: { ...this.unknownCodes },
      symbolCounts: { ...this.symbolCounts },
      lastFrameTimestamp: this.lastFrameTimestamp,
      lastErrors: [...this.lastErrors],
    };
  }

  serialize(): string {
    return JSON.stringify(this.getStats(), null, 2);
  }

  /**
   * Adds the counters of another instance into this one.
   */
  mergeWith(other: Diagnostics): void {
    this.framesDecoded += other.framesDecoded;
    this.structuralErrors += other.structuralErrors;
    this.framesWithIssues += other.framesWithIssues;
    this.dataPoints += other.dataPoints;
    this.symbolLookupErrors += other.symbolLookupErrors;
    this.valueCoercionErrors += other.valueCoercionErrors;
    this.conversionWarnings += other.conversionWarnings;
    for (const [code, count] of Object.entries(other.unknownCodes)) increment(this.unknownCodes, code, count);
    for (const [code, count] of Object.entries(other.symbolCounts)) increment(this.symbolCounts, code, count);
    this.lastErrors = [...this.lastErrors, ...other.lastErrors].slice(-LAST_ERRORS_LIMIT);
    if (other.lastFrameTimestamp !== null &&
      (this.lastFrameTimestamp === null || other.lastFrameTimestamp > this.lastFrameTimestamp)) {
      this.lastFrameTimestamp = other.lastFrameTimestamp;
    }
  }
}

export { Diagnostics };
