// src/errors.ts

import type { DecodeIssueKind, IssueSeverity } from './types/wits-types.js';
import { FRAME_END, FRAME_START } from './constants/constants.js';

/**
 * Base class for all WITS errors
 */
export class WitsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WitsError';
  }
}

// --- Decode issues ---
// These are collected per frame and returned to the caller, not thrown by the parser.

/**
 * Base class for problems found while decoding a single frame
 */
export class WitsDecodeError extends WitsError {
  readonly kind: DecodeIssueKind;
  readonly severity: IssueSeverity;
  /** 1-based line number inside the frame, 0 for frame-level problems */
  readonly line: number;
  readonly code: string | null;

  constructor(
    kind: DecodeIssueKind,
    message: string,
    severity: IssueSeverity,
    line: number = 0,
    code: string | null = null
  ) {
    super(message);
    this.name = 'WitsDecodeError';
    this.kind = kind;
    this.severity = severity;
    this.line = line;
    this.code = code;
  }
}

/**
 * Frame is missing its start or end marker
 */
export class WitsStructuralError extends WitsDecodeError {
  constructor(message: string = `frame must start with '${FRAME_START}' and end with '${FRAME_END}'`) {
    super('structural', `structural error: ${message}`, 'error');
    this.name = 'WitsStructuralError';
  }
}

/**
 * Symbol code is not present in the catalog
 */
export class WitsSymbolLookupError extends WitsDecodeError {
  constructor(code: string, line: number, severity: IssueSeverity) {
    super('symbol-lookup', `unknown symbol code ${code}`, severity, line, code);
    this.name = 'WitsSymbolLookupError';
  }
}

/**
 * Raw value does not parse as the symbol's declared type
 */
export class WitsValueCoercionError extends WitsDecodeError {
  readonly rawValue: string;

  constructor(code: string, rawValue: string, expected: string, line: number) {
    super(
      'value-coercion',
      `invalid value for ${code}: '${rawValue}' is not a valid ${expected}`,
      'error',
      line,
      code
    );
    this.name = 'WitsValueCoercionError';
    this.rawValue = rawValue;
  }
}

// --- Units ---

/**
 * Conversion between two units is impossible
 */
export class WitsConversionError extends WitsError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, message?: string) {
    super(message ?? `cannot convert ${from} to ${to}: incompatible unit categories`);
    this.name = 'WitsConversionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Unit label is not in the unit table
 */
export class WitsUnknownUnitError extends WitsConversionError {
  readonly unit: string;

  constructor(unit: string) {
    super(unit, unit, `unknown unit: ${unit}`);
    this.name = 'WitsUnknownUnitError';
    this.unit = unit;
  }
}

// --- Input and state ---

/**
 * Error class for empty decode input
 */
export class WitsEmptyInputError extends WitsError {
  constructor(message: string = 'Cannot decode empty input') {
    super(message);
    this.name = 'WitsEmptyInputError';
  }
}

/**
 * Error class for pushing into an extractor whose stream already ended
 */
export class WitsExtractorClosedError extends WitsError {
  constructor(message: string = 'Frame extractor has already ended; create a new one per stream') {
    super(message);
    this.name = 'WitsExtractorClosedError';
  }
}

/**
 * Error class for invalid symbol catalog data
 */
export class WitsCatalogError extends WitsError {
  constructor(message: string) {
    super(`Invalid symbol catalog: ${message}`);
    this.name = 'WitsCatalogError';
  }
}

// --- Transport errors ---

/**
 * Base class for frame source errors
 */
export class WitsTransportError extends WitsError {
  constructor(message: string) {
    super(message);
    this.name = 'WitsTransportError';
  }
}

/**
 * Error class for failed connections
 */
export class WitsConnectionError extends WitsTransportError {
  constructor(target: string, reason: string) {
    super(`Failed to connect to ${target}: ${reason}`);
    this.name = 'WitsConnectionError';
  }
}

/**
 * Error class for reading from a source that was closed before streaming started
 */
export class WitsSourceClosedError extends WitsTransportError {
  constructor(message: string = 'Frame source is closed') {
    super(message);
    this.name = 'WitsSourceClosedError';
  }
}
