// src/units/units.ts

import type { UnitCategory, UnitDefinition } from '../types/wits-types.js';

const linear = (category: UnitCategory, factor: number, label: string): UnitDefinition =>
  Object.freeze({ kind: 'linear', category, factor, label });

const affine = (
  category: UnitCategory,
  toBase: (value: number) => number,
  fromBase: (value: number) => number,
  label: string
): UnitDefinition => Object.freeze({ kind: 'affine', category, toBase, fromBase, label });

const FOOT = 0.3048;
const POUND_FORCE_KN = 0.0044482216152605;
const US_GALLON_L = 3.785411784;
const BARREL_M3 = 0.158987294928;

/**
 * Unit labels used by the WITS symbol tables. Factors are relative to the base unit of the category:
 * m, kPa, L/min, kg/m³, kN, kN·m, m³, m/h, s, deg, deg/30m, rpm, spm, %, mmho/m, ppm, API, ohm·m.
 * Temperature is affine with °C as base.
 */
export const UNITS: Readonly<Record<string, UnitDefinition>> = Object.freeze({
  // length
  M: linear('length', 1, 'meters'),
  F: linear('length', FOOT, 'feet'),
  MM: linear('length', 0.001, 'millimeters'),
  CM: linear('length', 0.01, 'centimeters'),
  IN: linear('length', 0.0254, 'inches'),

  // pressure
  KPA: linear('pressure', 1, 'kilopascals'),
  MPA: linear('pressure', 1000, 'megapascals'),
  BAR: linear('pressure', 100, 'bar'),
  PSI: linear('pressure', 6.894757293168361, 'pounds per square inch'),

  // flow-rate
  LPM: linear('flow-rate', 1, 'liters per minute'),
  M3PM: linear('flow-rate', 1000, 'cubic meters per minute'),
  GPM: linear('flow-rate', US_GALLON_L, 'US gallons per minute'),
  BPM: linear('flow-rate', BARREL_M3 * 1000, 'barrels per minute'),

  // density
  KGM3: linear('density', 1, 'kilograms per cubic meter'),
  GCC: linear('density', 1000, 'grams per cubic centimeter'),
  PPG: linear('density', 119.82642731689663, 'pounds per US gallon'),

  // temperature
  DEGC: affine('temperature', v => v, v => v, 'degrees Celsius'),
  DEGF: affine('temperature', v => ((v - 32) * 5) / 9, v => (v * 9) / 5 + 32, 'degrees Fahrenheit'),

  // force
  KN: linear('force', 1, 'kilonewtons'),
  KDN: linear('force', 10, 'kilodecanewtons'),
  LBF: linear('force', POUND_FORCE_KN, 'pounds force'),
  KLB: linear('force', POUND_FORCE_KN * 1000, 'kilopounds'),

  // torque
  KNM: linear('torque', 1, 'kilonewton meters'),
  FTLB: linear('torque', POUND_FORCE_KN * FOOT, 'foot pounds'),
  KFLB: linear('torque', POUND_FORCE_KN * FOOT * 1000, 'kilofoot pounds'),

  // volume
  M3: linear('volume', 1, 'cubic meters'),
  L: linear('volume', 0.001, 'liters'),
  BBL: linear('volume', BARREL_M3, 'barrels'),

  // drilling-rate
  MHR: linear('drilling-rate', 1, 'meters per hour'),
  FHR: linear('drilling-rate', FOOT, 'feet per hour'),

  // time
  SEC: linear('time', 1, 'seconds'),
  MIN: linear('time', 60, 'minutes'),
  HR: linear('time', 3600, 'hours'),

  // angle
  DEG: linear('angle', 1, 'degrees'),

  // dogleg severity
  DM30: linear('dogleg', 1, 'degrees per 30 meters'),
  DF100: linear('dogleg', 30 / (100 * FOOT), 'degrees per 100 feet'),

  // rotary-speed, pump-rate
  RPM: linear('rotary-speed', 1, 'revolutions per minute'),
  SPM: linear('pump-rate', 1, 'strokes per minute'),

  // percent, conductivity, concentration
  PCT: linear('percent', 1, 'percent'),
  MMHO: linear('conductivity', 1, 'millimhos per meter'),
  PPM: linear('concentration', 1, 'parts per million'),

  // formation evaluation
  API: linear('gamma-ray', 1, 'API gamma ray units'),
  OHMM: linear('resistivity', 1, 'ohm meters'),

  // dimensionless
  UNITLESS: linear('dimensionless', 1, 'no unit'),
});

export const UNIT_LABELS: readonly string[] = Object.freeze(Object.keys(UNITS));
