import { describe, it, expect } from 'vitest';
import {
  WitsCatalogError,
  WitsConnectionError,
  WitsConversionError,
  WitsDecodeError,
  WitsError,
  WitsStructuralError,
  WitsSymbolLookupError,
  WitsTransportError,
  WitsUnknownUnitError,
  WitsValueCoercionError,
} from '../src/index.js';

describe('error hierarchy', () => {
  it('sets names and keeps the base classes', () => {
    const lookup = new WitsSymbolLookupError('9999', 2, 'warning');
    expect(lookup.name).toBe('WitsSymbolLookupError');
    expect(lookup).toBeInstanceOf(WitsDecodeError);
    expect(lookup).toBeInstanceOf(WitsError);
    expect(lookup).toBeInstanceOf(Error);
    expect(lookup.kind).toBe('symbol-lookup');

    const unit = new WitsUnknownUnitError('FURLONG');
    expect(unit).toBeInstanceOf(WitsConversionError);
    expect(unit.unit).toBe('FURLONG');

    expect(new WitsConnectionError('rig:5000', 'refused')).toBeInstanceOf(WitsTransportError);
    expect(new WitsCatalogError('bad').message).toBe('Invalid symbol catalog: bad');
  });

  it('carries decode details', () => {
    const structural = new WitsStructuralError();
    expect(structural.severity).toBe('error');
    expect(structural.line).toBe(0);
    expect(structural.code).toBeNull();

    const coercion = new WitsValueCoercionError('0108', 'abc', 'Float', 4);
    expect(coercion.rawValue).toBe('abc');
    expect(coercion.line).toBe(4);
    expect(coercion.code).toBe('0108');
    expect(coercion.message).toBe("invalid value for 0108: 'abc' is not a valid Float");
  });
});
