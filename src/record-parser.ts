// src/record-parser.ts

import {
  DATA_TYPE_NAMES,
  FRAME_END,
  FRAME_START,
  INTEGER_RANGES,
  SYMBOL_CODE_LENGTH,
  WitsDataType,
} from './constants/constants.js';
import {
  WitsDecodeError,
  WitsEmptyInputError,
  WitsStructuralError,
  WitsSymbolLookupError,
  WitsValueCoercionError,
} from './errors.js';
import { rootLogger } from './logger.js';
import { getDefaultCatalog, type SymbolCatalog } from './symbols/symbol-catalog.js';
import type { DataPoint, DecodedFrame, ParsedValue, UnitSystem, WitsSymbol } from './types/wits-types.js';

const logger = rootLogger.createLogger('RecordParser');

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export interface ParseOptions {
  unitSystem: UnitSystem;
  strict: boolean;
  source: string;
}

type Coercion = { ok: true; value: ParsedValue } | { ok: false };

/**
 * Converts raw line text to the symbol's declared type.
 */
export function coerceValue(raw: string, dataType: WitsDataType): Coercion {
  switch (dataType) {
    case WitsDataType.ALPHA:
      return { ok: true, value: raw };
    case WitsDataType.SHORT:
    case WitsDataType.LONG: {
      if (!INTEGER_PATTERN.test(raw)) return { ok: false };
      const value = Number.parseInt(raw, 10);
      const { min, max } = INTEGER_RANGES[dataType];
      return value >= min && value <= max ? { ok: true, value } : { ok: false };
    }
    case WitsDataType.FLOAT:
      return FLOAT_PATTERN.test(raw) ? { ok: true, value: Number.parseFloat(raw) } : { ok: false };
  }
}

/**
 * Structural check only: the trimmed text starts with `&&` and ends with `!!`.
 */
export function validateFrame(text: string): boolean {
  const trimmed = text.trim();
  return (
    trimmed.length >= FRAME_START.length + FRAME_END.length &&
    trimmed.startsWith(FRAME_START) &&
    trimmed.endsWith(FRAME_END)
  );
}

function buildDataPoint(symbol: WitsSymbol, rawValue: string, parsedValue: ParsedValue, unitSystem: UnitSystem): DataPoint {
  return Object.freeze({
    symbolCode: symbol.code,
    symbolName: symbol.name,
    symbolDescription: symbol.description,
    recordType: symbol.recordType,
    rawValue,
    parsedValue,
    unit: unitSystem === 'metric' ? symbol.metricUnit : symbol.fpsUnit,
  });
}

/**
 * Turns the text of one frame into data points plus the issues found on the way.
 * Per-line problems are collected, never thrown.
 */
export class RecordParser {
  constructor(private readonly catalog: SymbolCatalog = getDefaultCatalog()) {}

  /**
   * Decodes one frame.
   * @throws WitsEmptyInputError if the text is empty or whitespace only
   */
  public parse(frameText: string, options: ParseOptions): DecodedFrame {
    if (frameText.trim().length === 0) {
      throw new WitsEmptyInputError();
    }

    const timestamp = new Date();
    const dataPoints: DataPoint[] = [];
    const issues: WitsDecodeError[] = [];

    if (!validateFrame(frameText)) {
      const issue = new WitsStructuralError();
      logger.warn(issue.message, { source: options.source });
      issues.push(issue);
      return this.frame(options, timestamp, dataPoints, issues);
    }

    const trimmed = frameText.trim();
    const body = trimmed.slice(FRAME_START.length, trimmed.length - FRAME_END.length);
    const lines = body.split(/\r?\n/);

    lines.forEach((rawLine: string, index: number) => {
      const line = rawLine.trim();
      if (line.length === 0) return;
      const lineNumber = index + 1;

      const code = line.slice(0, SYMBOL_CODE_LENGTH);
      const symbol = line.length >= SYMBOL_CODE_LENGTH ? this.catalog.get(code) : undefined;
      if (symbol === undefined) {
        const issue = new WitsSymbolLookupError(code, lineNumber, options.strict ? 'error' : 'warning');
        logger.debug(issue.message, { source: options.source, symbolCode: code, line: lineNumber });
        issues.push(issue);
        return;
      }

      const rawValue = line.slice(SYMBOL_CODE_LENGTH).trim();
      const coercion = coerceValue(rawValue, symbol.dataType);
      if (!coercion.ok) {
        const issue = new WitsValueCoercionError(code, rawValue, DATA_TYPE_NAMES[symbol.dataType], lineNumber);
        logger.debug(issue.message, { source: options.source, symbolCode: code, line: lineNumber });
        issues.push(issue);
      }
      dataPoints.push(buildDataPoint(symbol, rawValue, coercion.ok ? coercion.value : null, options.unitSystem));
    });

    logger.trace(`Decoded ${dataPoints.length} data points`, { source: options.source });
    return this.frame(options, timestamp, dataPoints, issues);
  }

  private frame(
    options: ParseOptions,
    timestamp: Date,
    dataPoints: DataPoint[],
    issues: WitsDecodeError[]
  ): DecodedFrame {
    return {
      source: options.source,
      timestamp,
      unitSystem: options.unitSystem,
      dataPoints,
      errors: issues.map(issue => issue.message),
      issues,
      warnings: [],
    };
  }
}
