import { describe, it, expect } from 'vitest';
import { SymbolCatalog, getDefaultCatalog } from '../src/symbols/symbol-catalog.js';
import { RECORD_DESCRIPTIONS, WitsDataType } from '../src/constants/constants.js';
import { WitsCatalogError } from '../src/errors.js';
import type { SymbolDefinition } from '../src/types/wits-types.js';

const depth: SymbolDefinition = {
  code: '0108',
  name: 'DBTM',
  description: 'Depth Bit (meas)',
  type: 'F',
  metric: 'M',
  fps: 'F',
};

describe('SymbolCatalog', () => {
  const catalog = getDefaultCatalog();

  it('loads the bundled symbol table once', () => {
    expect(catalog.size).toBe(467);
    expect(getDefaultCatalog()).toBe(catalog);
  });

  it('looks symbols up by code', () => {
    const symbol = catalog.get('0108');
    expect(symbol).toEqual({
      code: '0108',
      recordType: 1,
      name: 'DBTM',
      description: 'Depth Bit (meas)',
      dataType: WitsDataType.FLOAT,
      metricUnit: 'M',
      fpsUnit: 'F',
    });
    expect(Object.isFrozen(symbol)).toBe(true);
    expect(catalog.get('9999')).toBeUndefined();
    expect(catalog.has('0121')).toBe(true);
  });

  it('groups symbols by record type in code order', () => {
    const general = catalog.byRecordType(1);
    expect(general[0]?.code).toBe('0101');
    expect(general.every(symbol => symbol.recordType === 1)).toBe(true);
    expect(catalog.byRecordType(24)).toEqual([]);
    expect(Object.isFrozen(general)).toBe(true);
  });

  it('has symbols for every labelled record type', () => {
    const labelled = Object.keys(RECORD_DESCRIPTIONS).map(Number);
    expect(catalog.recordTypes()).toEqual(labelled);
    for (const recordType of labelled) {
      const symbols = catalog.byRecordType(recordType);
      expect(symbols[0]?.name).toBe('WELLID');
      expect(symbols.length).toBeGreaterThan(7);
    }
    expect(catalog.get('1310')?.name).toBe('METH');
    expect(catalog.get('1813')?.fpsUnit).toBe('PSI');
  });

  it('describes record types', () => {
    expect(catalog.recordDescription(1)).toBe('General Time-Based');
    expect(catalog.recordDescription(99)).toBe('Unknown');
  });

  it('searches code, name and description case-insensitively', () => {
    const hits = catalog.search('HOOKLOAD');
    expect(hits.has('0114')).toBe(true);
    expect([...catalog.search('DBTM').keys()]).toEqual(['0108', '0409', '0508', '0610']);
  });

  it('iterates in code order', () => {
    const small = new SymbolCatalog([{ ...depth, code: '0110', name: 'DMEA' }, depth]);
    expect([...small].map(symbol => symbol.code)).toEqual(['0108', '0110']);
  });

  it('rejects duplicate codes', () => {
    expect(() => new SymbolCatalog([depth, depth])).toThrow('Invalid symbol catalog: duplicate symbol code 0108');
  });

  it('rejects malformed definitions', () => {
    expect(() => new SymbolCatalog([{ ...depth, code: '108' }])).toThrow(WitsCatalogError);
    expect(() => new SymbolCatalog([{ ...depth, type: 'X' }])).toThrow(
      "Invalid symbol catalog: symbol 0108 has unknown data type 'X'"
    );
    expect(() => new SymbolCatalog([{ ...depth, fps: 'FURLONG' }])).toThrow(
      "Invalid symbol catalog: symbol 0108 uses unknown unit 'FURLONG'"
    );
  });

  it('parses JSON definitions', () => {
    expect(SymbolCatalog.fromJSON(JSON.stringify([depth])).get('0108')?.name).toBe('DBTM');
    expect(() => SymbolCatalog.fromJSON('{}')).toThrow(
      'Invalid symbol catalog: expected an array of symbol definitions'
    );
    expect(() => SymbolCatalog.fromJSON('[{"code":"0108"}]')).toThrow(
      'Invalid symbol catalog: entry 0 is missing a required string field'
    );
    expect(() => SymbolCatalog.fromJSON('[')).toThrow(WitsCatalogError);
  });
});
