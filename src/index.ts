// src/index.ts

export {
  WitsDecoder,
  decodeFrame,
  decodeBatch,
  combineFrames,
  convertFrame,
  assertNoSevereIssues,
  frameToRecord,
  combinedToRecord,
  type WitsDecoderOptions,
} from './decoder.js';
export { RecordParser, coerceValue, validateFrame, type ParseOptions } from './record-parser.js';
export { FrameExtractor, splitFrames } from './framers/frame-extractor.js';
export { SymbolCatalog, getDefaultCatalog } from './symbols/symbol-catalog.js';
export { UnitConverter } from './units/unit-converter.js';
export { UNITS, UNIT_LABELS } from './units/units.js';
export { Diagnostics, type AnalysisResult } from './utils/diagnostics.js';
export { FrameReader } from './transport/frame-reader.js';
export { IterableSource } from './transport/iterable-source.js';
export { FileSource } from './transport/node-transports/file-source.js';
export { TcpSource } from './transport/node-transports/tcp-source.js';
export {
  SerialSource,
  type SerialPortFactory,
  type SerialPortLike,
  type SerialPortSettings,
} from './transport/node-transports/serial-source.js';
export { default as Logger, rootLogger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/wits-types.js';
