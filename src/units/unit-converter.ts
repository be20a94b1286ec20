// src/units/unit-converter.ts

import { UNITS, UNIT_LABELS } from './units.js';
import { WitsConversionError, WitsUnknownUnitError } from '../errors.js';
import type { UnitCategory, UnitDefinition } from '../types/wits-types.js';

function lookup(unit: string): UnitDefinition {
  if (!Object.hasOwn(UNITS, unit)) {
    throw new WitsUnknownUnitError(unit);
  }
  const definition = UNITS[unit];
  if (definition === undefined) {
    throw new WitsUnknownUnitError(unit);
  }
  return definition;
}

/**
 * Conversion between the units of the WITS symbol tables.
 * Linear categories convert through their base unit; temperature uses the affine formulas.
 */
export class UnitConverter {
  static isKnown(unit: string): boolean {
    return Object.hasOwn(UNITS, unit);
  }

  static category(unit: string): UnitCategory {
    return lookup(unit).category;
  }

  static label(unit: string): string {
    return lookup(unit).label;
  }

  /**
   * Lists unit labels, optionally restricted to one category.
   */
  static units(category?: UnitCategory): string[] {
    if (category === undefined) return [...UNIT_LABELS];
    return UNIT_LABELS.filter(unit => lookup(unit).category === category);
  }

  /** Two units are convertible iff both are known and share a category */
  static isConvertible(from: string, to: string): boolean {
    if (!UnitConverter.isKnown(from) || !UnitConverter.isKnown(to)) return false;
    return lookup(from).category === lookup(to).category;
  }

  /**
   * Linear multiplier from `from` to `to`.
   * @returns 1 for identical units, undefined for affine (temperature) pairs
   * @throws WitsConversionError when the units are not convertible
   */
  static factor(from: string, to: string): number | undefined {
    if (from === to) return 1;
    const source = lookup(from);
    const target = lookup(to);
    if (source.category !== target.category) {
      throw new WitsConversionError(from, to);
    }
    if (source.kind !== 'linear' || target.kind !== 'linear') return undefined;
    return source.factor / target.factor;
  }

  /**
   * Converts a value between two units of the same category.
   * @throws WitsConversionError when the categories differ or a unit is unknown
   */
  static convert(value: number, from: string, to: string): number {
    if (from === to) return value;
    const source = lookup(from);
    const target = lookup(to);
    if (source.category !== target.category) {
      throw new WitsConversionError(from, to);
    }
    if (source.kind === 'linear' && target.kind === 'linear') {
      return value * (source.factor / target.factor);
    }
    const base = source.kind === 'linear' ? value * source.factor : source.toBase(value);
    return target.kind === 'linear' ? base / target.factor : target.fromBase(base);
  }

  /**
   * Human readable formula for a conversion, e.g. `PSI = KPA × 0.145...`.
   */
  static describe(from: string, to: string): string {
    const factor = UnitConverter.factor(from, to);
    if (from === to) return `${to} = ${from} (same unit)`;
    if (factor !== undefined) return `${to} = ${from} × ${factor}`;
    if (from === 'DEGC' && to === 'DEGF') return 'DEGF = DEGC × 9/5 + 32';
    if (from === 'DEGF' && to === 'DEGC') return 'DEGC = (DEGF − 32) × 5/9';
    return `${to} = f(${from})`;
  }
}
