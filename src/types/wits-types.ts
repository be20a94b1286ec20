// src/types/wits-types.ts

import type { WitsDataType } from '../constants/constants.js';
import type { WitsDecodeError } from '../errors.js';

// !=============================================================================
// ! Symbols
// !=============================================================================

/** One measurement channel of the WITS symbol tables */
export interface WitsSymbol {
  readonly code: string;
  readonly recordType: number;
  readonly name: string;
  readonly description: string;
  readonly dataType: WitsDataType;
  readonly metricUnit: string;
  readonly fpsUnit: string;
}

/** Shape of one entry in the symbol data file */
export interface SymbolDefinition {
  code: string;
  name: string;
  description: string;
  type: string;
  metric: string;
  fps: string;
}

// !=============================================================================
// ! Units
// !=============================================================================

export type UnitSystem = 'metric' | 'fps';

export type UnitCategory =
  | 'length'
  | 'pressure'
  | 'flow-rate'
  | 'density'
  | 'temperature'
  | 'force'
  | 'torque'
  | 'volume'
  | 'dimensionless'
  | 'drilling-rate'
  | 'time'
  | 'angle'
  | 'dogleg'
  | 'rotary-speed'
  | 'pump-rate'
  | 'percent'
  | 'conductivity'
  | 'concentration'
  | 'gamma-ray'
  | 'resistivity';

/** Linear unit: value_in_base = value * factor */
export interface LinearUnitDefinition {
  kind: 'linear';
  category: UnitCategory;
  factor: number;
  label: string;
}

/** Affine unit (temperature, base °C) */
export interface AffineUnitDefinition {
  kind: 'affine';
  category: UnitCategory;
  toBase: (value: number) => number;
  fromBase: (value: number) => number;
  label: string;
}

export type UnitDefinition = LinearUnitDefinition | AffineUnitDefinition;

// !=============================================================================
// ! Decoded data
// !=============================================================================

export type ParsedValue = number | string | null;

/** One decoded measurement */
export interface DataPoint {
  readonly symbolCode: string;
  readonly symbolName: string;
  readonly symbolDescription: string;
  readonly recordType: number;
  readonly rawValue: string;
  /** null when the raw text did not coerce to the declared type */
  readonly parsedValue: ParsedValue;
  readonly unit: string;
}

export type DecodeIssueKind = 'structural' | 'symbol-lookup' | 'value-coercion';

export type IssueSeverity = 'error' | 'warning';

/** One decoded protocol frame */
export interface DecodedFrame {
  readonly source: string;
  readonly timestamp: Date;
  readonly unitSystem: UnitSystem;
  readonly dataPoints: readonly DataPoint[];
  readonly errors: readonly string[];
  readonly issues: readonly WitsDecodeError[];
  /** Conversion post-pass failures; never mixed into `errors` */
  readonly warnings: readonly string[];
}

/** Flat view over several frames */
export interface CombinedResult {
  readonly source: string;
  readonly timestamp: Date;
  readonly frameCount: number;
  readonly dataPoints: readonly DataPoint[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

export interface DataPointRecord {
  symbol_code: string;
  symbol_name: string;
  description: string;
  record_type: number;
  raw_value: string;
  parsed_value: ParsedValue;
  unit: string;
}

export interface FrameRecord {
  timestamp: string;
  source: string;
  unit_system: UnitSystem;
  data_points: DataPointRecord[];
  errors: string[];
  warnings: string[];
}

export interface CombinedRecord {
  timestamp: string;
  source: string;
  frames: number;
  data_points: DataPointRecord[];
  errors: string[];
  warnings: string[];
}

// !=============================================================================
// ! Decoder options
// !=============================================================================

export interface DecodeOptions {
  /** Unit system of the attached units. Default: 'metric' */
  unitSystem?: UnitSystem;
  /** Unknown symbol codes become error-severity issues. Default: false */
  strict?: boolean;
  /** Provenance label copied into every frame. Default: 'unknown' */
  source?: string;
  /** Re-express numeric values in this system after decoding */
  convertTo?: UnitSystem;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context fields rendered into the log header */
export interface LogContext {
  source?: string;
  symbolCode?: string;
  recordType?: number;
  frameIndex?: number;
  line?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField =
  | 'timestamp'
  | 'level'
  | 'logger'
  | 'transport'
  | 'source'
  | 'frameIndex'
  | 'symbolCode'
  | 'recordType'
  | 'line';

/** Category logger returned by Logger.createLogger */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Frame sources
// !=============================================================================

/**
 * Capability consumed by the decoder: a lazy sequence of raw text chunks (or whole frames)
 * plus an idempotent close.
 */
export interface FrameSource {
  chunks(): AsyncIterable<string | Uint8Array>;
  close(): Promise<void>;
  /** Frames the source injected itself (handshakes) that readers should drop */
  isOwnFrame?(frame: string): boolean;
}

export interface HandshakeOptions {
  /** Packet to send. Default: DEFAULT_HANDSHAKE_PACKET */
  packet?: string;
  /** Resend interval in ms. Default: 30000 */
  intervalMs?: number;
}

export interface TcpSourceOptions {
  /** Sent once after the connection opens; `true` sends `&&\r\n`. Default: nothing */
  request?: string | boolean;
  /** Periodic keep-alive frame, disabled when false */
  handshake?: HandshakeOptions | false;
  connectTimeout?: number;
  encoding?: BufferEncoding;
}

export interface SerialSourceOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'odd' | 'mark' | 'space';
}

export interface FileSourceOptions {
  encoding?: BufferEncoding;
  highWaterMark?: number;
}

export interface FrameReaderOptions {
  /** Drop frames the source reports as its own. Default: true */
  skipOwnFrames?: boolean;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsOptions {
  loggerName?: string;
  /** Percentage of frames with issues above which a warning is logged */
  errorRateThreshold?: number;
}

export interface DiagnosticsStats {
  uptimeSeconds: number;
  framesDecoded: number;
  structuralErrors: number;
  framesWithIssues: number;
  dataPoints: number;
  symbolLookupErrors: number;
  valueCoercionErrors: number;
  conversionWarnings: number;
  errorRate: number | null;
  framesPerSecond: number;
  unknownCodes: Record<string, number>;
  symbolCounts: Record<string, number>;
  lastFrameTimestamp: string | null;
  lastErrors: string[];
}
