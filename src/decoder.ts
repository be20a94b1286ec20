// src/decoder.ts

import { splitFrames } from './framers/frame-extractor.js';
import { RecordParser, validateFrame } from './record-parser.js';
import { getDefaultCatalog, type SymbolCatalog } from './symbols/symbol-catalog.js';
import { UnitConverter } from './units/unit-converter.js';
import { FrameReader } from './transport/frame-reader.js';
import { Diagnostics } from './utils/diagnostics.js';
import { rootLogger } from './logger.js';
import { WitsDecodeError, WitsEmptyInputError } from './errors.js';
import type {
  CombinedRecord,
  CombinedResult,
  DataPoint,
  DataPointRecord,
  DecodedFrame,
  DecodeOptions,
  FrameReaderOptions,
  FrameRecord,
  FrameSource,
  LogLevel,
  UnitSystem,
} from './types/wits-types.js';

const logger = rootLogger.createLogger('WitsDecoder');

const DEFAULT_SOURCE = 'unknown';

interface ResolvedDecodeOptions {
  unitSystem: UnitSystem;
  strict: boolean;
  source: string;
  convertTo: UnitSystem | null;
}

function resolveOptions(options: DecodeOptions = {}): ResolvedDecodeOptions {
  return {
    unitSystem: options.unitSystem ?? 'metric',
    strict: options.strict ?? false,
    source: options.source ?? DEFAULT_SOURCE,
    convertTo: options.convertTo ?? null,
  };
}

function decodeWith(
  parser: RecordParser,
  catalog: SymbolCatalog,
  text: string,
  options: ResolvedDecodeOptions
): DecodedFrame {
  const frame = parser.parse(text, options);
  return options.convertTo === null ? frame : convertFrame(frame, options.convertTo, catalog);
}

function batchWith(
  parser: RecordParser,
  catalog: SymbolCatalog,
  text: string,
  options: ResolvedDecodeOptions
): DecodedFrame[] {
  if (text.trim().length === 0) {
    throw new WitsEmptyInputError();
  }
  const frames = splitFrames(text);
  if (frames.length === 0) {
    // No complete frame: report the whole input as one malformed frame
    return [decodeWith(parser, catalog, text, options)];
  }
  return frames.map(frame => decodeWith(parser, catalog, frame, options));
}

/**
 * Decodes one frame with the bundled symbol catalog.
 * Per-line problems end up in `errors`/`issues`; only empty input throws.
 */
export function decodeFrame(text: string, options: DecodeOptions = {}): DecodedFrame {
  const catalog = getDefaultCatalog();
  return decodeWith(new RecordParser(catalog), catalog, text, resolveOptions(options));
}

/**
 * Decodes every `&&…!!` frame of a multi-frame text independently, in order.
 */
export function decodeBatch(text: string, options: DecodeOptions = {}): DecodedFrame[] {
  const catalog = getDefaultCatalog();
  return batchWith(new RecordParser(catalog), catalog, text, resolveOptions(options));
}

/**
 * Flattens several frames into one report, keeping per-frame order.
 */
export function combineFrames(frames: readonly DecodedFrame[], source?: string): CombinedResult {
  return {
    source: source ?? frames[0]?.source ?? DEFAULT_SOURCE,
    timestamp: new Date(),
    frameCount: frames.length,
    dataPoints: frames.flatMap(frame => frame.dataPoints),
    errors: frames.flatMap(frame => frame.errors),
    warnings: frames.flatMap(frame => frame.warnings),
  };
}

/**
 * Re-expresses every numeric data point in the `target` unit system.
 * Points that cannot be converted keep their value and unit; the reason is added to `warnings`.
 */
export function convertFrame(
  frame: DecodedFrame,
  target: UnitSystem,
  catalog: SymbolCatalog = getDefaultCatalog()
): DecodedFrame {
  const warnings: string[] = [...frame.warnings];
  const dataPoints = frame.dataPoints.map((point: DataPoint): DataPoint => {
    if (typeof point.parsedValue !== 'number') return point;
    const symbol = catalog.get(point.symbolCode);
    if (symbol === undefined) return point;
    const targetUnit = target === 'metric' ? symbol.metricUnit : symbol.fpsUnit;
    if (targetUnit === point.unit) return point;
    if (!UnitConverter.isConvertible(point.unit, targetUnit)) {
      warnings.push(`failed to convert ${point.symbolCode}: cannot convert ${point.unit} to ${targetUnit}`);
      return point;
    }
    return Object.freeze({
      ...point,
      parsedValue: UnitConverter.convert(point.parsedValue, point.unit, targetUnit),
      unit: targetUnit,
    });
  });
  return { ...frame, unitSystem: target, dataPoints, warnings };
}

/**
 * Caller policy hook for strict processing: throws the first error-severity issue.
 */
export function assertNoSevereIssues(frames: DecodedFrame | readonly DecodedFrame[]): void {
  const list: readonly DecodedFrame[] = 'issues' in frames ? [frames] : frames;
  for (const frame of list) {
    const severe = frame.issues.find((issue: WitsDecodeError) => issue.severity === 'error');
    if (severe) throw severe;
  }
}

function pointToRecord(point: DataPoint): DataPointRecord {
  return {
    symbol_code: point.symbolCode,
    symbol_name: point.symbolName,
    description: point.symbolDescription,
    record_type: point.recordType,
    raw_value: point.rawValue,
    parsed_value: point.parsedValue,
    unit: point.unit,
  };
}

/** JSON-ready record of one frame */
export function frameToRecord(frame: DecodedFrame): FrameRecord {
  return {
    timestamp: frame.timestamp.toISOString(),
    source: frame.source,
    unit_system: frame.unitSystem,
    data_points: frame.dataPoints.map(pointToRecord),
    errors: [...frame.errors],
    warnings: [...frame.warnings],
  };
}

/** JSON-ready record of a combined view */
export function combinedToRecord(result: CombinedResult): CombinedRecord {
  return {
    timestamp: result.timestamp.toISOString(),
    source: result.source,
    frames: result.frameCount,
    data_points: result.dataPoints.map(pointToRecord),
    errors: [...result.errors],
    warnings: [...result.warnings],
  };
}

export interface WitsDecoderOptions extends DecodeOptions {
  catalog?: SymbolCatalog;
  /** Collect decode statistics in `decoder.diagnostics` */
  diagnostics?: boolean;
}

/**
 * Decoder bound to one set of options, one catalog and optional diagnostics.
 */
export class WitsDecoder {
  private readonly options: ResolvedDecodeOptions;
  private readonly catalog: SymbolCatalog;
  private readonly parser: RecordParser;
  private readonly _diagnostics: Diagnostics | null;

  constructor(options: WitsDecoderOptions = {}) {
    this.options = resolveOptions(options);
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.parser = new RecordParser(this.catalog);
    this._diagnostics = options.diagnostics ? new Diagnostics() : null;
  }

  /**
   * Sets the level of the shared library logger. Process-wide: every decoder and source logs through it.
   */
  enableLogger(level: LogLevel = 'info'): void {
    rootLogger.setLevel(level);
  }

  /** Back to errors only */
  disableLogger(): void {
    rootLogger.setLevel('error');
  }

  public get diagnostics(): Diagnostics | null {
    return this._diagnostics;
  }

  public get unitSystem(): UnitSystem {
    return this.options.unitSystem;
  }

  public validate(text: string): boolean {
    return validateFrame(text);
  }

  public decode(text: string, overrides: DecodeOptions = {}): DecodedFrame {
    const frame = decodeWith(this.parser, this.catalog, text, this.merge(overrides));
    this._diagnostics?.recordFrame(frame);
    return frame;
  }

  public decodeBatch(text: string, overrides: DecodeOptions = {}): DecodedFrame[] {
    const frames = batchWith(this.parser, this.catalog, text, this.merge(overrides));
    for (const frame of frames) this._diagnostics?.recordFrame(frame);
    logger.debug(`Batch decoded ${frames.length} frames`, { source: this.merge(overrides).source });
    return frames;
  }

  /**
   * Decodes frames from a source as they arrive. The source is closed when iteration stops.
   */
  public async *stream(
    source: FrameSource,
    readerOptions: FrameReaderOptions = {}
  ): AsyncGenerator<DecodedFrame, void, undefined> {
    const reader = new FrameReader(source, readerOptions);
    let frameIndex = 0;
    try {
      for (;;) {
        const text = await reader.next();
        if (text === null) break;
        const frame = this.decode(text);
        logger.debug(`Frame decoded with ${frame.dataPoints.length} points`, {
          source: this.options.source,
          frameIndex,
        });
        frameIndex++;
        yield frame;
      }
    } finally {
      await reader.close();
    }
  }

  private merge(overrides: DecodeOptions): ResolvedDecodeOptions {
    return {
      unitSystem: overrides.unitSystem ?? this.options.unitSystem,
      strict: overrides.strict ?? this.options.strict,
      source: overrides.source ?? this.options.source,
      convertTo: overrides.convertTo ?? this.options.convertTo,
    };
  }
}
