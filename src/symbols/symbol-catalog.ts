// src/symbols/symbol-catalog.ts

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  RECORD_DESCRIPTIONS,
  SYMBOL_CODE_LENGTH,
  UNKNOWN_RECORD_DESCRIPTION,
  WitsDataType,
} from '../constants/constants.js';
import { WitsCatalogError } from '../errors.js';
import { UnitConverter } from '../units/unit-converter.js';
import { rootLogger } from '../logger.js';
import type { SymbolDefinition, WitsSymbol } from '../types/wits-types.js';

const logger = rootLogger.createLogger('SymbolCatalog');

// Sources run from src/symbols, the build from dist/src/symbols
const SYMBOL_DATA_URLS = [
  new URL('../../data/wits-symbols.json', import.meta.url),
  new URL('../../../data/wits-symbols.json', import.meta.url),
];
const CODE_PATTERN = /^\d{4}$/;
const DATA_TYPES: ReadonlySet<string> = new Set(Object.values(WitsDataType));

function isDataType(value: string): value is WitsDataType {
  return DATA_TYPES.has(value);
}

/**
 * Checks one raw entry of the data file and turns it into a frozen symbol.
 */
function toSymbol(definition: SymbolDefinition): WitsSymbol {
  const { code, name, description, type, metric, fps } = definition;
  if (code.length !== SYMBOL_CODE_LENGTH || !CODE_PATTERN.test(code)) {
    throw new WitsCatalogError(`symbol code '${code}' must be ${SYMBOL_CODE_LENGTH} digits`);
  }
  if (!isDataType(type)) {
    throw new WitsCatalogError(`symbol ${code} has unknown data type '${type}'`);
  }
  for (const unit of [metric, fps]) {
    if (!UnitConverter.isKnown(unit)) {
      throw new WitsCatalogError(`symbol ${code} uses unknown unit '${unit}'`);
    }
  }
  return Object.freeze({
    code,
    recordType: Number.parseInt(code.slice(0, 2), 10),
    name,
    description,
    dataType: type,
    metricUnit: metric,
    fpsUnit: fps,
  });
}

function isSymbolDefinition(value: unknown): value is SymbolDefinition {
  if (typeof value !== 'object' || value === null) return false;
  return ['code', 'name', 'description', 'type', 'metric', 'fps'].every(
    key => typeof Reflect.get(value, key) === 'string'
  );
}

/**
 * Read-only lookup table of WITS symbols keyed by their 4-digit code.
 */
export class SymbolCatalog implements Iterable<WitsSymbol> {
  private readonly symbols: ReadonlyMap<string, WitsSymbol>;
  private readonly byRecord: ReadonlyMap<number, readonly WitsSymbol[]>;

  constructor(definitions: Iterable<SymbolDefinition>) {
    const symbols = new Map<string, WitsSymbol>();
    for (const definition of definitions) {
      const symbol = toSymbol(definition);
      if (symbols.has(symbol.code)) {
        throw new WitsCatalogError(`duplicate symbol code ${symbol.code}`);
      }
      symbols.set(symbol.code, symbol);
    }

    const ordered = [...symbols.values()].sort((a, b) => a.code.localeCompare(b.code));
    const byRecord = new Map<number, WitsSymbol[]>();
    for (const symbol of ordered) {
      const group = byRecord.get(symbol.recordType);
      if (group) group.push(symbol);
      else byRecord.set(symbol.recordType, [symbol]);
    }

    this.symbols = new Map(ordered.map(symbol => [symbol.code, symbol]));
    this.byRecord = new Map(
      [...byRecord].map(([recordType, group]): [number, readonly WitsSymbol[]] => [recordType, Object.freeze(group)])
    );
  }

  /**
   * Parses a JSON array of symbol definitions.
   * @throws WitsCatalogError on malformed data
   */
  static fromJSON(json: string): SymbolCatalog {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (err: unknown) {
      throw new WitsCatalogError(err instanceof Error ? err.message : String(err));
    }
    if (!Array.isArray(data)) {
      throw new WitsCatalogError('expected an array of symbol definitions');
    }
    const definitions: SymbolDefinition[] = [];
    data.forEach((entry: unknown, index: number) => {
      if (!isSymbolDefinition(entry)) {
        throw new WitsCatalogError(`entry ${index} is missing a required string field`);
      }
      definitions.push(entry);
    });
    return new SymbolCatalog(definitions);
  }

  get size(): number {
    return this.symbols.size;
  }

  get(code: string): WitsSymbol | undefined {
    return this.symbols.get(code);
  }

  has(code: string): boolean {
    return this.symbols.has(code);
  }

  /** Symbols of one record type in code order */
  byRecordType(recordType: number): readonly WitsSymbol[] {
    return this.byRecord.get(recordType) ?? [];
  }

  /**
   * Case-insensitive match against name, description or code.
   */
  search(text: string): Map<string, WitsSymbol> {
    const needle = text.toLowerCase();
    const matches = new Map<string, WitsSymbol>();
    for (const symbol of this.symbols.values()) {
      if (
        symbol.code.includes(needle) ||
        symbol.name.toLowerCase().includes(needle) ||
        symbol.description.toLowerCase().includes(needle)
      ) {
        matches.set(symbol.code, symbol);
      }
    }
    return matches;
  }

  /** Distinct record types present in the catalog, ascending */
  recordTypes(): number[] {
    return [...this.byRecord.keys()].sort((a, b) => a - b);
  }

  recordDescription(recordType: number): string {
    return RECORD_DESCRIPTIONS[recordType] ?? UNKNOWN_RECORD_DESCRIPTION;
  }

  [Symbol.iterator](): Iterator<WitsSymbol> {
    return this.symbols.values();
  }
}

let defaultCatalog: SymbolCatalog | null = null;

/**
 * Returns the catalog built from the bundled symbol table, loading it on first use.
 */
export function getDefaultCatalog(): SymbolCatalog {
  if (defaultCatalog === null) {
    const paths = SYMBOL_DATA_URLS.map(url => fileURLToPath(url));
    const path = paths.find(candidate => existsSync(candidate));
    if (path === undefined) {
      throw new WitsCatalogError(`symbol table not found (looked in ${paths.join(', ')})`);
    }
    defaultCatalog = SymbolCatalog.fromJSON(readFileSync(path, 'utf8'));
    logger.debug(`Loaded ${defaultCatalog.size} symbols from ${path}`);
  }
  return defaultCatalog;
}
