// src/constants/constants.ts

/**
 * WITS Level 0 frame markers
 */
export const FRAME_START = '&&';
export const FRAME_END = '!!';

/** Every data line starts with a 4-character symbol code */
export const SYMBOL_CODE_LENGTH = 4;

/**
 * WITS data type codes as they appear in the symbol tables
 */
export enum WitsDataType {
  ALPHA = 'A',
  SHORT = 'S',
  LONG = 'L',
  FLOAT = 'F',
}

export const DATA_TYPE_NAMES: Record<WitsDataType, string> = {
  [WitsDataType.ALPHA]: 'Alphanumeric',
  [WitsDataType.SHORT]: 'Short Integer',
  [WitsDataType.LONG]: 'Long Integer',
  [WitsDataType.FLOAT]: 'Float',
};

/** Signed ranges accepted for the integer types */
export const INTEGER_RANGES = {
  [WitsDataType.SHORT]: { min: -32768, max: 32767 },
  [WitsDataType.LONG]: { min: -2147483648, max: 2147483647 },
} as const;

/**
 * Human readable labels of the predefined WITS record types
 */
export const RECORD_DESCRIPTIONS: Readonly<Record<number, string>> = {
  1: 'General Time-Based',
  2: 'Drilling - Depth Based',
  3: 'Drilling - Connections',
  4: 'Hydraulics',
  5: 'Trip - Time',
  6: 'Trip - Connections',
  7: 'Survey / Directional',
  8: 'MWD Formation Evaluation',
  9: 'MWD Mechanical',
  10: 'Pressure Evaluation',
  11: 'Mud Tank Volumes',
  12: 'Chromatograph Cycle-Based',
  13: 'Chromatograph Depth-Based',
  14: 'Lagged Continuous Mud Properties',
  15: 'Cuttings / Lithology',
  16: 'Hydraulics Calculations',
  17: 'Cementing',
  18: 'Drill Stem Testing',
  19: 'Configuration',
  20: 'Mud Report',
  21: 'Bit Report',
  22: 'Remarks',
  23: 'Well Identification',
} as const;

export const UNKNOWN_RECORD_DESCRIPTION = 'Unknown';

/** Header written into handshake frames so our own packets can be recognised */
export const HANDSHAKE_HEADER = '1984WITSSTREAM';

/** Keep-alive frame sent to servers that drop silent clients */
export const DEFAULT_HANDSHAKE_PACKET = `&&\r\n${HANDSHAKE_HEADER}\r\n0111-9999\r\n!!\r\n`;

/** Request sent once after connecting to servers that stream only on demand */
export const DEFAULT_REQUEST_PACKET = '&&\r\n';

export const DEFAULT_HANDSHAKE_INTERVAL_MS = 30000;
